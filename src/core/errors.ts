/**
 * Error taxonomy shared by the MCP, skills and apps modules.
 *
 * Single-target operations throw these unmodified; batch actions catch them
 * per target and keep going.
 */

export type NotFoundKind = "server" | "agent" | "tool";

/** Unknown server, agent or tool identifier. Raised before any file is touched. */
export class NotFoundError extends Error {
  readonly kind: NotFoundKind;
  readonly id: string;

  constructor(kind: NotFoundKind, id: string, known: readonly string[] = []) {
    const hint = known.length > 0 ? ` (known: ${known.join(", ")})` : "";
    super(`Unknown ${kind}: ${id}${hint}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

/** An existing configuration file is not valid in its declared format. */
export class ConfigParseError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigParseError";
    this.path = path;
  }
}

/** Reading, writing or creating a directory failed. */
export class ConfigIoError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(message + reason, { cause });
    this.name = "ConfigIoError";
    this.path = path;
  }
}

/** The servers collection exists but has a shape that can't hold servers. */
export class ConfigConflictError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "ConfigConflictError";
    this.path = path;
  }
}

export class HomeDirectoryUnresolvedError extends Error {
  constructor(reason: string) {
    super(`Could not resolve the home directory: ${reason}`);
    this.name = "HomeDirectoryUnresolvedError";
  }
}

export class SkillInstallError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SkillInstallError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

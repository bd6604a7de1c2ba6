/**
 * MCP sync model: servers, targets and how each target stores its servers.
 *
 * Design principles:
 * - Catalog records are immutable and built once per process
 * - A target owns exactly one servers collection in one file
 * - Only the server's own sub-entry is ever added, replaced or removed
 */

export interface McpServer {
  /** Identifier used on the command line and as the config key */
  readonly id: string;
  /** Display name */
  readonly name: string;
  /** Arguments passed to the launcher, in order */
  readonly args: readonly string[];
  /** One-line description for listings */
  readonly description: string;
}

/** Value written to the `type` field of a structured server entry */
export type ConnectionType = "stdio" | "local";

/** JSON file holding servers under a single top-level key */
export interface StructuredConfigMethod {
  readonly kind: "structured";
  readonly path: string;
  /** Literal top-level key, e.g. "mcpServers" or "amp.mcpServers" (not a path) */
  readonly serversKey: string;
  /** Entry key to use instead of the server id */
  readonly serverKeyOverride?: string;
  readonly connectionType?: ConnectionType;
  /** Add `tools: ["*"]` to each entry */
  readonly includeToolsField: boolean;
}

/** TOML file with one `[mcp_servers.<id>]` table per server */
export interface TextTableConfigMethod {
  readonly kind: "text-table";
  readonly path: string;
}

export type ConfigMethod = StructuredConfigMethod | TextTableConfigMethod;

/**
 * What counts as evidence that a tool is installed. Editor-style tools without
 * a dependable CLI binary are detected through their configuration directory.
 */
export type InstallSignal =
  | "binary"
  | "config-dir"
  | "binary-or-config-dir"
  | "binary-or-config-file";

export interface McpTarget {
  /** Display name, also the target's identity */
  readonly name: string;
  /** Executable looked up on the search path */
  readonly binaryName: string;
  readonly installSignal: InstallSignal;
  readonly configMethod: ConfigMethod;
}

/** Launch descriptor written into a target's configuration */
export interface ServerEntry {
  command: string;
  args: string[];
  type?: ConnectionType;
  env?: Record<string, string>;
  tools?: string[];
}

/** Outcome of a single enable/disable call */
export interface ConfigChange {
  /** File that was (or would have been) written */
  path: string;
  /** False when the call found nothing to do and wrote nothing */
  changed: boolean;
  /** False when the file had to be re-serialized from scratch */
  preservedFormatting: boolean;
  warnings: string[];
}

export type EnablementStatus = "enabled" | "disabled" | "not-installed" | "unknown";

import type { ToolDefinition } from "./catalog.js";
import { commandOutput } from "../utils/binaries.js";
import { REGISTRY_TIMEOUT_MS, VERSION_CHECK_TIMEOUT_MS } from "../utils/constants.js";

export interface ToolVersion {
  name: string;
  identifier: string;
  /** First line of `--version`, null when the tool can't be run */
  installed: string | null;
  /** Latest published version, null when unknown */
  latest: string | null;
}

export type CommandRunner = (
  binary: string,
  args: string[],
  timeoutMs: number
) => Promise<string | null>;

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export interface VersionSources {
  registryUrl: string;
  run?: CommandRunner;
  fetch?: Fetcher;
}

export async function installedVersion(
  tool: ToolDefinition,
  run: CommandRunner = commandOutput
): Promise<string | null> {
  const output = await run(tool.binary, ["--version"], VERSION_CHECK_TIMEOUT_MS);
  const firstLine = output?.split(/\r?\n/, 1)[0].trim();
  if (!firstLine) return null;
  return tool.versionSuffix ? firstLine.replace(tool.versionSuffix, "") : firstLine;
}

/**
 * `dist-tags.latest` for a package. Network, HTTP and shape errors all
 * resolve to null so one unreachable package never fails the listing.
 */
export async function fetchNpmLatest(
  pkg: string,
  registryUrl: string,
  fetcher: Fetcher = fetch
): Promise<string | null> {
  const url = `${registryUrl}/${pkg.replace("/", "%2F")}`;
  try {
    const response = await fetcher(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(REGISTRY_TIMEOUT_MS),
    });
    if (!response.ok) return null;

    const body: unknown = await response.json();
    return latestTag(body);
  } catch {
    return null;
  }
}

/** Version assigned by the first `VER=` line of an install script. */
export async function fetchInstallScriptVersion(
  url: string,
  fetcher: Fetcher = fetch
): Promise<string | null> {
  try {
    const response = await fetcher(url, { signal: AbortSignal.timeout(REGISTRY_TIMEOUT_MS) });
    if (!response.ok) return null;
    return scriptVersion(await response.text());
  } catch {
    return null;
  }
}

export function scriptVersion(script: string): string | null {
  for (const line of script.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("VER=")) continue;
    const value = trimmed.slice("VER=".length).trim().replace(/^["']+|["']+$/g, "");
    return value.length > 0 ? value : null;
  }
  return null;
}

function latestTag(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("dist-tags" in body)) return null;
  const tags = body["dist-tags"];
  if (typeof tags !== "object" || tags === null || !("latest" in tags)) return null;
  return typeof tags.latest === "string" ? tags.latest : null;
}

/** Installed and latest versions for every tool, looked up concurrently. */
export async function collectVersions(
  tools: readonly ToolDefinition[],
  sources: VersionSources
): Promise<ToolVersion[]> {
  return Promise.all(
    tools.map(async (tool) => {
      const [installed, latest] = await Promise.all([
        installedVersion(tool, sources.run),
        latestVersion(tool, sources),
      ]);
      return { name: tool.name, identifier: tool.binary, installed, latest };
    })
  );
}

function latestVersion(tool: ToolDefinition, sources: VersionSources): Promise<string | null> {
  if (tool.npmPackage) {
    return fetchNpmLatest(tool.npmPackage, sources.registryUrl, sources.fetch);
  }
  if (tool.installScriptUrl) {
    return fetchInstallScriptVersion(tool.installScriptUrl, sources.fetch);
  }
  return Promise.resolve(null);
}

/** Dotted numeric core of a version string, e.g. "codex-cli 0.21.0" → [0, 21, 0] */
export function versionParts(version: string): number[] {
  const match = /\d+(?:\.\d+)*/.exec(version.replace(/^v/, ""));
  return match ? match[0].split(".").map(Number) : [];
}

export function isNewerVersion(latest: string, installed: string): boolean {
  const a = versionParts(latest);
  const b = versionParts(installed);
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const l = a[i] ?? 0;
    const r = b[i] ?? 0;
    if (l !== r) return l > r;
  }
  return false;
}

/** Loose match used for the "up to date" check: either string contains the other. */
export function isSameVersion(installed: string, latest: string): boolean {
  return installed.includes(latest) || latest.includes(installed);
}

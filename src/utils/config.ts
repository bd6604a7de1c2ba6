import { homedir } from "node:os";
import { HomeDirectoryUnresolvedError } from "../core/errors.js";
import { DEFAULT_NPM_REGISTRY } from "./constants.js";

export interface RuntimeConfig {
  /** Home directory every tool path is resolved against */
  homeDir: string;
  /** npm registry base URL used for version lookups */
  registryUrl: string;
}

/**
 * Resolve the home directory. `AI_CLI_HOME` wins over the OS lookup so the
 * whole tool can be pointed at a sandbox.
 */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AI_CLI_HOME?.trim();
  if (override) return override;

  let home = "";
  try {
    home = homedir();
  } catch (err) {
    throw new HomeDirectoryUnresolvedError(
      err instanceof Error ? err.message : String(err)
    );
  }
  if (!home) {
    throw new HomeDirectoryUnresolvedError("the OS returned an empty path");
  }
  return home;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    homeDir: resolveHomeDir(env),
    registryUrl: (env.NPM_REGISTRY_URL?.trim() || DEFAULT_NPM_REGISTRY).replace(
      /\/+$/,
      ""
    ),
  };
}

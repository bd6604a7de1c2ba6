import { loadConfig, type RuntimeConfig } from "../utils/config.js";
import { errorMessage } from "../core/errors.js";
import { log } from "../utils/logger.js";
import { EXIT_ERROR } from "../utils/constants.js";

/** Load runtime configuration or exit; nothing works without a home directory. */
export function runtimeConfig(): RuntimeConfig {
  try {
    return loadConfig();
  } catch (err) {
    return exitWithError(err);
  }
}

export function exitWithError(err: unknown, code: number = EXIT_ERROR): never {
  log.error(errorMessage(err));
  process.exit(code);
}

export function banner(title: string): void {
  console.log();
  log.heading(title);
  log.dim("=".repeat(title.length));
  console.log();
}

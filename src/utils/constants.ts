export const VERSION = "0.1.0";
export const CLI_NAME = "ai-cli";

// Every catalog server is launched through the package runner
export const SERVER_LAUNCHER = "npx";

export const DEFAULT_NPM_REGISTRY = "https://registry.npmjs.org";
export const REGISTRY_TIMEOUT_MS = 10_000;
export const VERSION_CHECK_TIMEOUT_MS = 5_000;

// Sentinel accepted by `mcp enable` / `mcp disable`
export const ALL_SERVERS = "all";

// Where skills are looked for inside a cloned repository, in priority order
export const SKILL_DISCOVERY_PATHS = [
  "",
  "skills",
  "skills/.curated",
  "skills/.experimental",
] as const;
export const SKILL_FILE = "SKILL.md";
export const SKILL_SEARCH_MAX_DEPTH = 5;
export const SKILL_DESCRIPTION_WIDTH = 60;

// Exit codes following Unix conventions
export const EXIT_OK = 0; // Every target succeeded or was skipped
export const EXIT_FAILURE = 1; // At least one target failed
export const EXIT_ERROR = 2; // Usage or fatal error (unknown id, no home directory)

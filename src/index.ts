// Public API for programmatic usage
export { serverCatalog, findServer, resolveServers } from "./core/servers.js";
export { buildTargets, isTargetInstalled, configPath } from "./core/targets.js";
export { enableServer, disableServer, isServerEnabled } from "./core/adapter.js";
export { scanTargets } from "./core/scanner.js";
export { StatusMatrix } from "./core/status.js";
export {
  createMcpContext,
  listStatus,
  enableMany,
  disableMany,
  doctor,
} from "./core/actions.js";
export {
  NotFoundError,
  ConfigParseError,
  ConfigIoError,
  ConfigConflictError,
  HomeDirectoryUnresolvedError,
  SkillInstallError,
} from "./core/errors.js";
export { buildAgents, findAgent } from "./skills/agents.js";
export { discoverSkills, parseSkillFrontmatter } from "./skills/discovery.js";
export { installSkills, removeSkill, listSkills } from "./skills/install.js";
export { toolCatalog } from "./apps/catalog.js";
export { collectVersions, fetchNpmLatest, isNewerVersion } from "./apps/versions.js";
export { loadConfig } from "./utils/config.js";
export type {
  McpServer,
  McpTarget,
  ConfigMethod,
  ConfigChange,
  EnablementStatus,
} from "./core/types.js";
export type { McpContext, BatchReport, TargetOutcome, DoctorEntry } from "./core/actions.js";
export type { SkillAgent } from "./skills/agents.js";
export type { Skill } from "./skills/discovery.js";
export type { ToolVersion } from "./apps/versions.js";

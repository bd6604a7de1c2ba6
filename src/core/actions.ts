import type { ConfigChange, McpServer, McpTarget } from "./types.js";
import type { StatusMatrix } from "./status.js";
import { findOnPath, type BinaryLocator } from "../utils/binaries.js";
import { pathExists } from "../utils/fs.js";
import { ALL_SERVERS } from "../utils/constants.js";
import { errorMessage } from "./errors.js";
import { resolveServers, serverCatalog } from "./servers.js";
import { buildTargets, configPath, isTargetInstalled } from "./targets.js";
import { disableServer, enableServer } from "./adapter.js";
import { scanTargets } from "./scanner.js";

/** Everything the MCP actions need; tests swap in their own. */
export interface McpContext {
  servers: readonly McpServer[];
  targets: readonly McpTarget[];
  locate: BinaryLocator;
}

export type BatchAction = "enable" | "disable";

export interface ServerFailure {
  server: string;
  error: string;
}

export type TargetOutcome =
  | { target: string; status: "ok"; changes: ConfigChange[] }
  | { target: string; status: "skipped"; reason: string }
  | {
      target: string;
      status: "failed";
      /** First failure, the one shown on the summary line */
      error: string;
      failures: ServerFailure[];
      changes: ConfigChange[];
    };

export interface BatchReport {
  action: BatchAction;
  /** "all servers" or the single server id */
  label: string;
  servers: string[];
  outcomes: TargetOutcome[];
  counts: { ok: number; skipped: number; failed: number };
}

export interface StatusReport {
  servers: readonly McpServer[];
  targets: readonly McpTarget[];
  matrix: StatusMatrix;
}

export interface DoctorEntry {
  target: string;
  installed: boolean;
  configPath: string;
  configExists: boolean;
}

export function createMcpContext(
  homeDir: string,
  locate: BinaryLocator = findOnPath
): McpContext {
  return {
    servers: serverCatalog(),
    targets: buildTargets(homeDir),
    locate,
  };
}

/** Catalog plus the full (target × server) status matrix. */
export async function listStatus(ctx: McpContext): Promise<StatusReport> {
  const matrix = await scanTargets(ctx.targets, ctx.servers, ctx.locate);
  return { servers: ctx.servers, targets: ctx.targets, matrix };
}

export function enableMany(
  ctx: McpContext,
  selector: string,
  onOutcome?: (outcome: TargetOutcome) => void
): Promise<BatchReport> {
  return runBatch(ctx, selector, "enable", onOutcome);
}

export function disableMany(
  ctx: McpContext,
  selector: string,
  onOutcome?: (outcome: TargetOutcome) => void
): Promise<BatchReport> {
  return runBatch(ctx, selector, "disable", onOutcome);
}

/**
 * Apply one action for the selected servers to every installed target, in
 * registry order. The selector is resolved before any file is touched; after
 * that, failures are recorded per target and the batch carries on.
 */
async function runBatch(
  ctx: McpContext,
  selector: string,
  action: BatchAction,
  onOutcome?: (outcome: TargetOutcome) => void
): Promise<BatchReport> {
  const selected = resolveServers(selector, ctx.servers, ALL_SERVERS);
  const apply = action === "enable" ? enableServer : disableServer;

  const outcomes: TargetOutcome[] = [];
  for (const target of ctx.targets) {
    const outcome = await applyToTarget(target, selected, ctx.locate, apply);
    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  return {
    action,
    label: selector === ALL_SERVERS ? "all servers" : selector,
    servers: selected.map((s) => s.id),
    outcomes,
    counts: {
      ok: outcomes.filter((o) => o.status === "ok").length,
      skipped: outcomes.filter((o) => o.status === "skipped").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
    },
  };
}

async function applyToTarget(
  target: McpTarget,
  servers: readonly McpServer[],
  locate: BinaryLocator,
  apply: (target: McpTarget, server: McpServer) => Promise<ConfigChange>
): Promise<TargetOutcome> {
  let installed: boolean;
  try {
    installed = await isTargetInstalled(target, locate);
  } catch (err) {
    return {
      target: target.name,
      status: "failed",
      error: errorMessage(err),
      failures: [],
      changes: [],
    };
  }
  if (!installed) {
    return { target: target.name, status: "skipped", reason: "Not installed" };
  }

  const changes: ConfigChange[] = [];
  const failures: ServerFailure[] = [];
  for (const server of servers) {
    try {
      changes.push(await apply(target, server));
    } catch (err) {
      failures.push({ server: server.id, error: errorMessage(err) });
    }
  }

  if (failures.length > 0) {
    return {
      target: target.name,
      status: "failed",
      error: failures[0].error,
      failures,
      changes,
    };
  }
  return { target: target.name, status: "ok", changes };
}

/** Read-only diagnostic: installation and config file presence per target. */
export async function doctor(ctx: McpContext): Promise<DoctorEntry[]> {
  const entries: DoctorEntry[] = [];
  for (const target of ctx.targets) {
    const path = configPath(target);
    entries.push({
      target: target.name,
      installed: await isTargetInstalled(target, ctx.locate),
      configPath: path,
      configExists: await pathExists(path),
    });
  }
  return entries;
}

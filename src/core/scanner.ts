import type { EnablementStatus, McpServer, McpTarget } from "./types.js";
import type { BinaryLocator } from "../utils/binaries.js";
import { StatusMatrix } from "./status.js";
import { isTargetInstalled } from "./targets.js";
import { isServerEnabled } from "./adapter.js";

/** Statuses produced by one target's worker */
interface TargetBatch {
  target: string;
  statuses: Array<[serverId: string, status: EnablementStatus]>;
}

/**
 * Determine every (target, server) status with one concurrent worker per
 * target. Workers return their batch and the results are merged here once
 * all of them have settled, so each target's keys are written by exactly one
 * place. A worker never rejects: its own failure turns its entries into
 * "unknown".
 */
export async function scanTargets(
  targets: readonly McpTarget[],
  servers: readonly McpServer[],
  locate: BinaryLocator
): Promise<StatusMatrix> {
  const batches = await Promise.all(
    targets.map((target) => scanTarget(target, servers, locate))
  );

  const matrix = new StatusMatrix();
  for (const batch of batches) {
    for (const [serverId, status] of batch.statuses) {
      matrix.set(batch.target, serverId, status);
    }
  }
  return matrix;
}

export async function scanTarget(
  target: McpTarget,
  servers: readonly McpServer[],
  locate: BinaryLocator
): Promise<TargetBatch> {
  let installed: boolean;
  try {
    installed = await isTargetInstalled(target, locate);
  } catch {
    return fill(target, servers, "unknown");
  }

  if (!installed) return fill(target, servers, "not-installed");

  const statuses: TargetBatch["statuses"] = [];
  for (const server of servers) {
    statuses.push([server.id, await statusOf(target, server)]);
  }
  return { target: target.name, statuses };
}

async function statusOf(target: McpTarget, server: McpServer): Promise<EnablementStatus> {
  try {
    return (await isServerEnabled(target, server)) ? "enabled" : "disabled";
  } catch {
    return "unknown";
  }
}

function fill(
  target: McpTarget,
  servers: readonly McpServer[],
  status: EnablementStatus
): TargetBatch {
  return {
    target: target.name,
    statuses: servers.map((s): [string, EnablementStatus] => [s.id, status]),
  };
}

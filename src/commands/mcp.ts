import ora from "ora";
import {
  createMcpContext,
  disableMany,
  doctor,
  enableMany,
  listStatus,
  type BatchAction,
} from "../core/actions.js";
import { resolveServers } from "../core/servers.js";
import {
  formatBatchSummary,
  formatOutcome,
  outcomeWarnings,
  renderDoctorEntry,
  renderStatusReport,
} from "../reporters/console.js";
import { log } from "../utils/logger.js";
import { ALL_SERVERS, EXIT_FAILURE, EXIT_OK } from "../utils/constants.js";
import { banner, exitWithError, runtimeConfig } from "./shared.js";

export async function mcpListCommand(): Promise<void> {
  const ctx = createMcpContext(runtimeConfig().homeDir);
  banner("AI CLI - MCP Servers");

  const spinner = ora("Checking MCP server status across tools...").start();
  const report = await listStatus(ctx);
  spinner.stop();

  for (const line of renderStatusReport(report)) console.log(line);
}

export function mcpEnableCommand(server: string): Promise<void> {
  return batchCommand("enable", server);
}

export function mcpDisableCommand(server: string): Promise<void> {
  return batchCommand("disable", server);
}

async function batchCommand(action: BatchAction, selector: string): Promise<void> {
  const ctx = createMcpContext(runtimeConfig().homeDir);

  // Unknown ids stop here, before any file is touched
  try {
    resolveServers(selector, ctx.servers, ALL_SERVERS);
  } catch (err) {
    exitWithError(err);
  }

  banner("AI CLI - MCP Servers");
  const label = selector === ALL_SERVERS ? "all servers" : selector;
  log.heading(
    `${action === "enable" ? "Enabling" : "Disabling"} ${label} across installed tools...`
  );
  console.log();

  const run = action === "enable" ? enableMany : disableMany;
  const report = await run(ctx, selector, (outcome) => {
    console.log(formatOutcome(outcome));
    for (const warning of outcomeWarnings(outcome)) log.warn(warning);
  });

  console.log();
  if (report.counts.failed > 0) {
    log.warn(formatBatchSummary(report));
  } else {
    log.success(formatBatchSummary(report));
  }
  log.dim("Note: You may need to restart your CLI tools for changes to take effect.");

  process.exit(report.counts.failed > 0 ? EXIT_FAILURE : EXIT_OK);
}

export async function mcpDoctorCommand(): Promise<void> {
  const ctx = createMcpContext(runtimeConfig().homeDir);
  banner("AI CLI - MCP Servers");

  for (const entry of await doctor(ctx)) {
    for (const line of renderDoctorEntry(entry)) console.log(line);
    console.log();
  }
}

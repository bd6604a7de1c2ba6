// Console reporter utilities: shared formatting for CLI output.
// Functions return lines; commands decide where they go.

import chalk from "chalk";
import type { EnablementStatus } from "../core/types.js";
import type {
  BatchReport,
  DoctorEntry,
  StatusReport,
  TargetOutcome,
} from "../core/actions.js";
import { colorize, tag } from "../utils/logger.js";

export const NAME_WIDTH = 16;
export const STATUS_WIDTH = 14;

const STATUS_LABELS: Record<EnablementStatus, string> = {
  enabled: "enabled",
  disabled: "disabled",
  "not-installed": "not installed",
  unknown: "unknown",
};

export function statusBadge(status: EnablementStatus): string {
  const text = STATUS_LABELS[status].padEnd(STATUS_WIDTH);
  switch (status) {
    case "enabled":
      return colorize(chalk.green, text);
    case "disabled":
      return colorize(chalk.yellow, text);
    case "not-installed":
    case "unknown":
      return colorize(chalk.dim, text);
  }
}

export function serverLabel(id: string): string {
  return colorize(chalk.cyan, id);
}

/** Catalog listing followed by the target-major status table. */
export function renderStatusReport(report: StatusReport): string[] {
  const lines: string[] = [colorize(chalk.bold, "Available Servers:")];
  for (const server of report.servers) {
    lines.push(`  ${serverLabel(server.id)}  ${colorize(chalk.dim, server.description)}`);
  }
  lines.push("", colorize(chalk.bold, "Status per tool:"), "");

  const header = report.servers.map((s) => s.id.padEnd(STATUS_WIDTH)).join("  ");
  lines.push(`  ${colorize(chalk.dim, "Tool".padEnd(NAME_WIDTH))}  ${colorize(chalk.dim, header)}`);

  const rule = report.servers.map(() => "-".repeat(STATUS_WIDTH)).join("  ");
  lines.push(`  ${colorize(chalk.dim, "-".repeat(NAME_WIDTH))}  ${colorize(chalk.dim, rule)}`);

  for (const target of report.targets) {
    const cells = report.servers.map((s) =>
      statusBadge(report.matrix.get(target.name, s.id))
    );
    lines.push(`  ${target.name.padEnd(NAME_WIDTH)}  ${cells.join("  ")}`.trimEnd());
  }
  return lines;
}

/** `  <name padded to NAME_WIDTH><status>` */
export function resultLine(name: string, status: string): string {
  return `  ${name.padEnd(NAME_WIDTH)}${status}`;
}

export function formatOutcome(outcome: TargetOutcome): string {
  switch (outcome.status) {
    case "ok":
      return resultLine(outcome.target, tag.ok());
    case "skipped":
      return resultLine(outcome.target, tag.skip(outcome.reason));
    case "failed":
      return resultLine(outcome.target, tag.fail(outcome.error));
  }
}

/** Warnings raised while writing, e.g. a replaced non-object servers key */
export function outcomeWarnings(outcome: TargetOutcome): string[] {
  if (outcome.status === "skipped") return [];
  return outcome.changes.flatMap((c) => c.warnings);
}

export function formatBatchSummary(report: BatchReport): string {
  const verb = report.action === "enable" ? "Enabled" : "Disabled";
  const { ok, skipped, failed } = report.counts;
  return `Done! ${verb} ${report.label} in ${ok} tool(s), skipped ${skipped}, failed ${failed}.`;
}

export function renderDoctorEntry(entry: DoctorEntry): string[] {
  const badge = entry.installed
    ? colorize(chalk.green, "installed")
    : colorize(chalk.yellow, "not installed");
  const lines = [
    `${colorize(chalk.bold, entry.target.padEnd(NAME_WIDTH))} [${badge}]`,
    `  ${colorize(chalk.dim, entry.configPath)}`,
  ];
  if (entry.installed) {
    lines.push(
      `  ${colorize(chalk.dim, entry.configExists ? "config exists" : "config not created yet")}`
    );
  }
  return lines;
}

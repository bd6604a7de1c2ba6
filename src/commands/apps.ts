import ora from "ora";
import chalk from "chalk";
import { toolCatalog } from "../apps/catalog.js";
import {
  collectVersions,
  isNewerVersion,
  isSameVersion,
  type ToolVersion,
} from "../apps/versions.js";
import { colorize, log } from "../utils/logger.js";
import { banner, runtimeConfig } from "./shared.js";

async function lookupVersions(): Promise<ToolVersion[]> {
  const { registryUrl } = runtimeConfig();
  const spinner = ora("Checking installed tools and latest versions...").start();
  const versions = await collectVersions(toolCatalog(), { registryUrl });
  spinner.stop();
  return versions;
}

/** Installed tools first, then the ones that are missing. */
export async function appsListCommand(): Promise<void> {
  banner("AI CLI - Tools");
  const versions = await lookupVersions();
  const widths = columnWidths(versions);

  const installed = versions.filter((t) => t.installed !== null);
  const missing = versions.filter((t) => t.installed === null);

  if (installed.length > 0) {
    log.heading("Installed:");
    for (const tool of installed) console.log(formatToolVersion(tool, widths));
    if (installed.every((t) => !hasUpdate(t))) {
      console.log();
      log.success("All tools are up to date");
    }
  }

  if (missing.length > 0) {
    if (installed.length > 0) console.log();
    log.heading("Not Installed:");
    for (const tool of missing) console.log(formatToolVersion(tool, widths));
  }
}

export async function appsCheckCommand(): Promise<void> {
  banner("AI CLI - Tools");
  const versions = await lookupVersions();
  const widths = columnWidths(versions);
  for (const tool of versions) console.log(formatToolVersion(tool, widths));
}

export function hasUpdate(tool: ToolVersion): boolean {
  if (tool.installed === null || tool.latest === null) return false;
  if (isSameVersion(tool.installed, tool.latest)) return false;
  return isNewerVersion(tool.latest, tool.installed);
}

interface Widths {
  name: number;
  identifier: number;
}

function columnWidths(versions: ToolVersion[]): Widths {
  return {
    name: Math.max(0, ...versions.map((t) => t.name.length)),
    identifier: Math.max(0, ...versions.map((t) => t.identifier.length)),
  };
}

export function formatToolVersion(tool: ToolVersion, widths: Widths): string {
  let status: string;
  if (tool.installed === null) {
    status = colorize(chalk.red, "not installed");
    if (tool.latest) status += ` (${colorize(chalk.blueBright, tool.latest)})`;
  } else if (hasUpdate(tool) && tool.latest) {
    status = `${colorize(chalk.yellow, tool.installed)} → ${colorize(chalk.blueBright, tool.latest)} available`;
  } else {
    status = colorize(chalk.green, tool.installed);
  }

  const name = `${tool.name}:`.padEnd(widths.name + 2);
  const identifier = tool.identifier.padEnd(widths.identifier + 1);
  return `${colorize(chalk.bold, name)}${colorize(chalk.gray, identifier)}${status}`;
}

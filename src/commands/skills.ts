import ora from "ora";
import chalk from "chalk";
import { buildAgents } from "../skills/agents.js";
import { truncateDescription } from "../skills/discovery.js";
import {
  gitClone,
  installSkills,
  listSkills,
  removeSkill,
  type AgentOutcome,
  type AgentSkills,
  type InstallReport,
  type RemoveReport,
  type SkillsContext,
} from "../skills/install.js";
import { findOnPath } from "../utils/binaries.js";
import { colorize, log, tag } from "../utils/logger.js";
import { EXIT_FAILURE, EXIT_OK } from "../utils/constants.js";
import { resultLine } from "../reporters/console.js";
import { banner, exitWithError, runtimeConfig } from "./shared.js";

interface AgentOption {
  agent?: string;
}

function skillsContext(): SkillsContext {
  return {
    agents: buildAgents(runtimeConfig().homeDir),
    locate: findOnPath,
    clone: gitClone,
  };
}

export async function skillsListCommand(options: AgentOption): Promise<void> {
  const ctx = skillsContext();
  banner("AI CLI - Skills");

  let listing: AgentSkills[];
  try {
    listing = await listSkills(ctx, options.agent);
  } catch (err) {
    exitWithError(err);
  }

  for (const entry of listing) {
    log.heading(entry.agent);
    if (!entry.installed) {
      log.dim("  (not installed)");
    } else if (entry.skills.length === 0) {
      log.dim("  (no skills installed)");
    } else {
      for (const skill of entry.skills) {
        const description = skill.description
          ? ` - ${colorize(chalk.dim, truncateDescription(skill.description))}`
          : "";
        log.item(`${skill.name}${description}`);
      }
    }
    console.log();
  }
}

export async function skillsInstallCommand(
  repo: string,
  options: AgentOption
): Promise<void> {
  const ctx = skillsContext();
  banner("AI CLI - Skills");

  const spinner = ora(`Cloning ${repo}...`).start();
  let report: InstallReport;
  try {
    report = await installSkills(ctx, repo, options.agent);
  } catch (err) {
    spinner.fail(`Could not install skills from ${repo}`);
    exitWithError(err);
  }
  spinner.succeed(`Found ${report.skills.length} skill(s):`);
  for (const skill of report.skills) {
    log.item(skill.name);
  }

  console.log();
  log.heading("Installing skills:");
  for (const outcome of report.outcomes) console.log(formatAgentOutcome(outcome));

  console.log();
  const failed = report.outcomes.some((o) => o.status === "failed");
  if (failed) {
    log.warn("Some agents could not be updated.");
  } else {
    log.success("Skills installed successfully!");
  }
  process.exit(failed ? EXIT_FAILURE : EXIT_OK);
}

export async function skillsRemoveCommand(
  skill: string,
  options: AgentOption
): Promise<void> {
  const ctx = skillsContext();
  banner("AI CLI - Skills");

  let report: RemoveReport;
  try {
    report = await removeSkill(ctx, skill, options.agent);
  } catch (err) {
    exitWithError(err);
  }

  log.heading(`Removing skill '${skill}':`);
  for (const outcome of report.outcomes) console.log(formatAgentOutcome(outcome));

  console.log();
  if (report.removed === 0) {
    log.warn(`Skill '${skill}' not found in any agent`);
  } else {
    log.success(`Removed skill from ${report.removed} agent(s)`);
  }
  process.exit(report.outcomes.some((o) => o.status === "failed") ? EXIT_FAILURE : EXIT_OK);
}

export function formatAgentOutcome(outcome: AgentOutcome): string {
  switch (outcome.status) {
    case "ok":
      return resultLine(outcome.agent, tag.ok());
    case "skipped":
      return resultLine(outcome.agent, tag.skip(outcome.reason));
    case "failed":
      return resultLine(outcome.agent, tag.fail(outcome.error));
  }
}

import { execFile } from "node:child_process";
import { cp, mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { promisify } from "node:util";
import type { BinaryLocator } from "../utils/binaries.js";
import { pathExists } from "../utils/fs.js";
import { SkillInstallError, errorMessage } from "../core/errors.js";
import { isAgentInstalled, selectAgents, type SkillAgent } from "./agents.js";
import {
  discoverSkills,
  isValidSkillName,
  listInstalledSkills,
  type Skill,
} from "./discovery.js";

const execFileAsync = promisify(execFile);

/** Fetches a repository into an empty directory */
export type RepositoryCloner = (url: string, dest: string) => Promise<void>;

export interface SkillsContext {
  agents: readonly SkillAgent[];
  locate: BinaryLocator;
  clone: RepositoryCloner;
}

export type AgentOutcome =
  | { agent: string; status: "ok" }
  | { agent: string; status: "skipped"; reason: string }
  | { agent: string; status: "failed"; error: string };

export interface AgentSkills {
  agent: string;
  installed: boolean;
  skills: Skill[];
}

export interface InstallReport {
  repo: string;
  skills: Skill[];
  outcomes: AgentOutcome[];
}

export interface RemoveReport {
  skill: string;
  outcomes: AgentOutcome[];
  removed: number;
}

/** Shallow `git clone` */
export const gitClone: RepositoryCloner = async (url, dest) => {
  try {
    await execFileAsync("git", ["clone", "--depth", "1", url, dest], {
      windowsHide: true,
    });
  } catch (err) {
    throw new SkillInstallError(`git clone failed for ${url}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
};

/**
 * Turn `owner/repo` into a GitHub clone URL; full https:// and git@ URLs
 * pass through.
 */
export function parseRepoUrl(repo: string): string {
  if (repo.startsWith("https://") || repo.startsWith("git@")) return repo;
  if (/^[\w.-]+\/[\w.-]+$/.test(repo)) return `https://github.com/${repo}.git`;
  throw new SkillInstallError(
    "Invalid repository format. Use 'owner/repo' or a full URL"
  );
}

export async function listSkills(
  ctx: SkillsContext,
  agentFilter?: string
): Promise<AgentSkills[]> {
  const result: AgentSkills[] = [];
  for (const agent of selectAgents(ctx.agents, agentFilter)) {
    const installed = await isAgentInstalled(agent, ctx.locate);
    result.push({
      agent: agent.name,
      installed,
      skills: installed ? await listInstalledSkills(agent.skillsPath) : [],
    });
  }
  return result;
}

/**
 * Clone `repo` into a temporary directory, discover its skills and copy them
 * into every selected agent. Without a filter only installed agents are
 * considered; a filtered agent that is not installed is reported as skipped.
 */
export async function installSkills(
  ctx: SkillsContext,
  repo: string,
  agentFilter?: string
): Promise<InstallReport> {
  const url = parseRepoUrl(repo);
  const candidates = selectAgents(ctx.agents, agentFilter);

  const workDir = await mkdtemp(join(tmpdir(), "ai-cli-skills-"));
  try {
    const checkout = join(workDir, "repo");
    await ctx.clone(url, checkout);

    const skills = await discoverSkills(checkout);
    if (skills.length === 0) {
      throw new SkillInstallError("No skills found in repository (no SKILL.md files)");
    }

    const agents: SkillAgent[] = [];
    const installedFlags = new Map<SkillAgent, boolean>();
    for (const agent of candidates) {
      const installed = await isAgentInstalled(agent, ctx.locate);
      installedFlags.set(agent, installed);
      if (installed || agentFilter) agents.push(agent);
    }
    if (agents.length === 0) {
      throw new SkillInstallError("No AI agents installed to install skills to");
    }

    const outcomes: AgentOutcome[] = [];
    for (const agent of agents) {
      if (!installedFlags.get(agent)) {
        outcomes.push({ agent: agent.name, status: "skipped", reason: "Not installed" });
        continue;
      }
      try {
        await mkdir(agent.skillsPath, { recursive: true });
        for (const skill of skills) {
          await copySkill(skill, agent.skillsPath);
        }
        outcomes.push({ agent: agent.name, status: "ok" });
      } catch (err) {
        outcomes.push({ agent: agent.name, status: "failed", error: errorMessage(err) });
      }
    }

    return { repo, skills, outcomes };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/** Replace `<skillsRoot>/<name>` with a copy of the skill, leaving out .git. */
export async function copySkill(skill: Skill, skillsRoot: string): Promise<string> {
  const dest = join(skillsRoot, skill.name);
  await rm(dest, { recursive: true, force: true });
  await cp(skill.path, dest, {
    recursive: true,
    filter: (source) => basename(source) !== ".git",
  });
  return dest;
}

export async function removeSkill(
  ctx: SkillsContext,
  skillName: string,
  agentFilter?: string
): Promise<RemoveReport> {
  if (!isValidSkillName(skillName)) {
    throw new SkillInstallError(`Invalid skill name "${skillName}"`);
  }

  const outcomes: AgentOutcome[] = [];
  for (const agent of selectAgents(ctx.agents, agentFilter)) {
    if (!(await isAgentInstalled(agent, ctx.locate))) {
      outcomes.push({ agent: agent.name, status: "skipped", reason: "Not installed" });
      continue;
    }

    const skillPath = join(agent.skillsPath, skillName);
    if (!(await pathExists(skillPath))) {
      outcomes.push({ agent: agent.name, status: "skipped", reason: "Not found" });
      continue;
    }

    try {
      await rm(skillPath, { recursive: true, force: true });
      outcomes.push({ agent: agent.name, status: "ok" });
    } catch (err) {
      outcomes.push({ agent: agent.name, status: "failed", error: errorMessage(err) });
    }
  }

  return {
    skill: skillName,
    outcomes,
    removed: outcomes.filter((o) => o.status === "ok").length,
  };
}

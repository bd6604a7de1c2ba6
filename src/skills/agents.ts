import { dirname, join } from "node:path";
import type { BinaryLocator } from "../utils/binaries.js";
import { pathExists } from "../utils/fs.js";
import { NotFoundError } from "../core/errors.js";

export interface SkillAgent {
  /** Identifier accepted by `--agent` */
  readonly id: string;
  readonly name: string;
  readonly binaryName: string;
  /** Global skills directory */
  readonly skillsPath: string;
  /** Cursor has no CLI binary; its skills directory's parent is the signal */
  readonly installSignal: "binary" | "config-dir";
}

export function buildAgents(home: string): readonly SkillAgent[] {
  const agent = (
    id: string,
    name: string,
    skillsDir: string,
    installSignal: SkillAgent["installSignal"] = "binary"
  ): SkillAgent =>
    Object.freeze({
      id,
      name,
      binaryName: id,
      skillsPath: join(home, skillsDir),
      installSignal,
    });

  return Object.freeze([
    agent("claude", "Claude Code", ".claude/skills"),
    agent("gemini", "Gemini CLI", ".gemini/skills"),
    agent("codex", "Codex CLI", ".codex/skills"),
    agent("amp", "Amp", ".config/agents/skills"),
    agent("cursor", "Cursor", ".cursor/skills", "config-dir"),
    agent("copilot", "GitHub Copilot", ".copilot/skills"),
    agent("opencode", "OpenCode", ".config/opencode/skill"),
  ]);
}

/** Case-insensitive lookup by id. */
export function findAgent(agents: readonly SkillAgent[], id: string): SkillAgent {
  const wanted = id.toLowerCase();
  const agent = agents.find((a) => a.id.toLowerCase() === wanted);
  if (!agent) {
    throw new NotFoundError(
      "agent",
      id,
      agents.map((a) => a.id)
    );
  }
  return agent;
}

/** A single agent when a filter is given, otherwise the whole catalog. */
export function selectAgents(
  agents: readonly SkillAgent[],
  filter?: string
): readonly SkillAgent[] {
  return filter ? [findAgent(agents, filter)] : agents;
}

export async function isAgentInstalled(
  agent: SkillAgent,
  locate: BinaryLocator
): Promise<boolean> {
  if (agent.installSignal === "config-dir") {
    return pathExists(dirname(agent.skillsPath));
  }
  return locate(agent.binaryName);
}

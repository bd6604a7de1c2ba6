import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import {
  SKILL_DESCRIPTION_WIDTH,
  SKILL_DISCOVERY_PATHS,
  SKILL_FILE,
  SKILL_SEARCH_MAX_DEPTH,
} from "../utils/constants.js";
import { isErrnoCode, pathExists } from "../utils/fs.js";

/**
 * Skill metadata parsed from SKILL.md frontmatter
 */
export interface Skill {
  name: string;
  description?: string;
  /** Directory containing SKILL.md */
  path: string;
}

export interface SkillMetadata {
  name: string;
  description?: string;
}

const FRONTMATTER_RE = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

// Skill names become directory names; keep them to one safe path segment
const SKILL_NAME_RE = /^(?!\.{1,2}$)[A-Za-z0-9._-]+$/;

export function isValidSkillName(name: string): boolean {
  return SKILL_NAME_RE.test(name);
}

/**
 * Parse the YAML frontmatter at the top of a SKILL.md file.
 * `name` is required; `description` is optional.
 */
export function parseSkillFrontmatter(content: string): SkillMetadata {
  const match = FRONTMATTER_RE.exec(content.trimStart());
  if (!match) {
    throw new Error(`${SKILL_FILE} must start with YAML frontmatter enclosed in --- lines`);
  }

  const data: unknown = yaml.load(match[1]);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`${SKILL_FILE} frontmatter must be a YAML mapping`);
  }

  const name = "name" in data ? data.name : undefined;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new Error(`${SKILL_FILE} must have a 'name' field in frontmatter`);
  }
  if (!isValidSkillName(name.trim())) {
    throw new Error(`Invalid skill name "${name}": use letters, digits, '.', '_' or '-'`);
  }

  const description = "description" in data ? data.description : undefined;
  return {
    name: name.trim(),
    description: typeof description === "string" ? description.trim() : undefined,
  };
}

/** Read `<dir>/SKILL.md`; null when it is missing or malformed. */
export async function readSkill(dir: string): Promise<Skill | null> {
  let content: string;
  try {
    content = await readFile(join(dir, SKILL_FILE), "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) return null;
    throw err;
  }

  try {
    return { ...parseSkillFrontmatter(content), path: dir };
  } catch {
    return null;
  }
}

/**
 * Find skills in a checked-out repository. The well-known locations are
 * tried first (each directory and its immediate children); only when they
 * yield nothing is the tree searched, skipping dot-directories. The first
 * skill with a given name wins.
 */
export async function discoverSkills(repoDir: string): Promise<Skill[]> {
  const found = new SkillSet();

  for (const sub of SKILL_DISCOVERY_PATHS) {
    const base = sub ? join(repoDir, sub) : repoDir;
    if (!(await pathExists(base))) continue;

    found.add(await readSkill(base));
    for (const child of await childDirectories(base)) {
      found.add(await readSkill(join(base, child)));
    }
  }

  if (found.size === 0) {
    await searchTree(repoDir, 0, found);
  }
  return found.toArray();
}

async function searchTree(dir: string, depth: number, found: SkillSet): Promise<void> {
  if (depth > SKILL_SEARCH_MAX_DEPTH) return;

  found.add(await readSkill(dir));
  for (const child of await childDirectories(dir)) {
    if (child.startsWith(".")) continue;
    await searchTree(join(dir, child), depth + 1, found);
  }
}

/** Skills already installed in an agent's skills directory. */
export async function listInstalledSkills(skillsPath: string): Promise<Skill[]> {
  const skills: Skill[] = [];
  for (const child of await childDirectories(skillsPath)) {
    const skill = await readSkill(join(skillsPath, child));
    if (skill) skills.push(skill);
  }
  return skills;
}

export function truncateDescription(
  description: string,
  width: number = SKILL_DESCRIPTION_WIDTH
): string {
  if (description.length <= width) return description;
  return description.slice(0, width - 3) + "...";
}

/** Sorted names of the subdirectories of `dir`; empty when it is missing or not a directory. */
async function childDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) return [];
    throw err;
  }
}

class SkillSet {
  private readonly byName = new Map<string, Skill>();

  add(skill: Skill | null): void {
    if (skill && !this.byName.has(skill.name)) {
      this.byName.set(skill.name, skill);
    }
  }

  get size(): number {
    return this.byName.size;
  }

  toArray(): Skill[] {
    return [...this.byName.values()];
  }
}

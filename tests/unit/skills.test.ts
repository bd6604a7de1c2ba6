import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  discoverSkills,
  listInstalledSkills,
  parseSkillFrontmatter,
  truncateDescription,
} from "../../src/skills/discovery.js";
import { buildAgents, findAgent } from "../../src/skills/agents.js";
import {
  installSkills,
  listSkills,
  parseRepoUrl,
  removeSkill,
  type SkillsContext,
} from "../../src/skills/install.js";
import { NotFoundError, SkillInstallError } from "../../src/core/errors.js";
import { pathExists } from "../../src/utils/fs.js";

async function writeSkill(dir: string, name: string, description = "Does things"): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(
    join(dir, "SKILL.md"),
    `---\nname: ${name}\ndescription: ${description}\n---\n\n# ${name}\n`
  );
}

describe("parseSkillFrontmatter", () => {
  it("reads name and description", () => {
    expect(parseSkillFrontmatter("---\nname: review\ndescription:  Reviews code \n---\nbody")).toEqual(
      { name: "review", description: "Reviews code" }
    );
  });

  it("leaves the description optional", () => {
    expect(parseSkillFrontmatter("---\nname: review\n---\n")).toEqual({
      name: "review",
      description: undefined,
    });
  });

  it("requires frontmatter", () => {
    expect(() => parseSkillFrontmatter("# review")).toThrow(
      "SKILL.md must start with YAML frontmatter enclosed in --- lines"
    );
  });

  it("requires a name", () => {
    expect(() => parseSkillFrontmatter("---\ndescription: x\n---\n")).toThrow(
      "SKILL.md must have a 'name' field in frontmatter"
    );
  });

  it("rejects names that are not a single path segment", () => {
    expect(() => parseSkillFrontmatter("---\nname: ../escape\n---\n")).toThrow(
      /^Invalid skill name/
    );
    expect(() => parseSkillFrontmatter("---\nname: ..\n---\n")).toThrow(/^Invalid skill name/);
  });
});

describe("truncateDescription", () => {
  it("keeps short text", () => {
    expect(truncateDescription("short")).toBe("short");
  });

  it("cuts long text with an ellipsis", () => {
    expect(truncateDescription("a".repeat(61))).toBe("a".repeat(57) + "...");
  });
});

describe("findAgent", () => {
  it("is case insensitive", () => {
    expect(findAgent(buildAgents("/h"), "Claude").name).toBe("Claude Code");
  });

  it("throws for unknown agents", () => {
    expect(() => findAgent(buildAgents("/h"), "vim")).toThrow(NotFoundError);
  });
});

describe("parseRepoUrl", () => {
  it("expands owner/repo to GitHub", () => {
    expect(parseRepoUrl("acme/skills")).toBe("https://github.com/acme/skills.git");
  });

  it("passes full URLs through", () => {
    expect(parseRepoUrl("https://git.test/acme/skills.git")).toBe(
      "https://git.test/acme/skills.git"
    );
    expect(parseRepoUrl("git@git.test:acme/skills.git")).toBe("git@git.test:acme/skills.git");
  });

  it("rejects anything else", () => {
    expect(() => parseRepoUrl("not a repo")).toThrow(SkillInstallError);
  });
});

describe("skills on disk", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "ai-cli-skills-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("discoverSkills", () => {
    it("checks the root and the skills directories in order", async () => {
      await writeSkill(root, "root-skill");
      await writeSkill(join(root, "skills/beta"), "beta");
      await writeSkill(join(root, "skills/alpha"), "alpha");
      await writeSkill(join(root, "skills/.curated/gamma"), "gamma");

      const names = (await discoverSkills(root)).map((s) => s.name);
      expect(names).toEqual(["root-skill", "alpha", "beta", "gamma"]);
    });

    it("keeps the first skill with a given name", async () => {
      await writeSkill(join(root, "skills/alpha"), "alpha", "first");
      await writeSkill(join(root, "skills/.experimental/alpha"), "alpha", "second");

      const skills = await discoverSkills(root);
      expect(skills.map((s) => s.description)).toEqual(["first"]);
    });

    it("searches the tree when the usual places are empty", async () => {
      await writeSkill(join(root, "packages/tools/lint"), "lint");
      await writeSkill(join(root, ".github/hidden"), "hidden");

      const skills = await discoverSkills(root);
      expect(skills).toEqual([
        { name: "lint", description: "Does things", path: join(root, "packages/tools/lint") },
      ]);
    });

    it("skips malformed SKILL.md files", async () => {
      await mkdir(join(root, "skills/broken"), { recursive: true });
      await writeFile(join(root, "skills/broken/SKILL.md"), "no frontmatter");
      await writeSkill(join(root, "skills/ok"), "ok");

      expect((await discoverSkills(root)).map((s) => s.name)).toEqual(["ok"]);
    });
  });

  describe("listInstalledSkills", () => {
    it("is empty when the skills directory is missing or a file", async () => {
      await writeFile(join(root, "not-a-dir"), "x");
      expect(await listInstalledSkills(join(root, "missing"))).toEqual([]);
      expect(await listInstalledSkills(join(root, "not-a-dir"))).toEqual([]);
    });
  });

  describe("install and remove", () => {
    let home: string;
    let ctx: SkillsContext;
    let cloned: string[];

    beforeEach(() => {
      home = join(root, "home");
      cloned = [];
      const located = new Set(["claude"]);
      ctx = {
        agents: buildAgents(home),
        locate: async (binary) => located.has(binary),
        clone: async (url, dest) => {
          cloned.push(url);
          await writeSkill(join(dest, "skills/alpha"), "alpha");
          await mkdir(join(dest, "skills/alpha/.git"));
          await writeFile(join(dest, "skills/alpha/notes.md"), "notes");
        },
      };
    });

    it("copies skills into installed agents", async () => {
      const report = await installSkills(ctx, "acme/skills");

      expect(cloned).toEqual(["https://github.com/acme/skills.git"]);
      expect(report.skills.map((s) => s.name)).toEqual(["alpha"]);
      expect(report.outcomes).toEqual([{ agent: "Claude Code", status: "ok" }]);

      const dest = join(home, ".claude/skills/alpha");
      expect(await pathExists(join(dest, "SKILL.md"))).toBe(true);
      expect(await pathExists(join(dest, "notes.md"))).toBe(true);
      expect(await pathExists(join(dest, ".git"))).toBe(false);
    });

    it("reports a filtered agent that is not installed", async () => {
      const report = await installSkills(ctx, "acme/skills", "gemini");
      expect(report.outcomes).toEqual([
        { agent: "Gemini CLI", status: "skipped", reason: "Not installed" },
      ]);
    });

    it("fails when no agent is installed", async () => {
      ctx = { ...ctx, locate: async () => false };
      await expect(installSkills(ctx, "acme/skills")).rejects.toThrow(
        "No AI agents installed to install skills to"
      );
    });

    it("fails when the repository has no skills", async () => {
      ctx = {
        ...ctx,
        clone: async (_url, dest) => {
          await mkdir(join(dest, "docs"), { recursive: true });
        },
      };
      await expect(installSkills(ctx, "acme/skills")).rejects.toThrow(
        "No skills found in repository (no SKILL.md files)"
      );
    });

    it("lists installed skills per agent", async () => {
      await installSkills(ctx, "acme/skills");

      const listing = await listSkills(ctx);
      expect(listing).toHaveLength(7);
      expect(listing[0]).toEqual({
        agent: "Claude Code",
        installed: true,
        skills: [
          { name: "alpha", description: "Does things", path: join(home, ".claude/skills/alpha") },
        ],
      });
      expect(listing[1]).toEqual({ agent: "Gemini CLI", installed: false, skills: [] });
    });

    it("removes a skill from installed agents", async () => {
      await installSkills(ctx, "acme/skills");

      const report = await removeSkill(ctx, "alpha", "claude");

      expect(report).toEqual({
        skill: "alpha",
        outcomes: [{ agent: "Claude Code", status: "ok" }],
        removed: 1,
      });
      expect(await pathExists(join(home, ".claude/skills/alpha"))).toBe(false);
    });

    it("skips agents without the skill", async () => {
      const report = await removeSkill(ctx, "alpha");
      expect(report.removed).toBe(0);
      expect(report.outcomes[0]).toEqual({
        agent: "Claude Code",
        status: "skipped",
        reason: "Not found",
      });
      expect(report.outcomes[1]).toEqual({
        agent: "Gemini CLI",
        status: "skipped",
        reason: "Not installed",
      });
    });

    it("rejects names that would escape the skills directory", async () => {
      await expect(removeSkill(ctx, "../home")).rejects.toThrow(SkillInstallError);
    });
  });
});

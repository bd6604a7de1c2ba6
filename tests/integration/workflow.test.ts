import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createMcpContext,
  disableMany,
  doctor,
  enableMany,
  listStatus,
  type McpContext,
  type TargetOutcome,
} from "../../src/core/actions.js";
import { NotFoundError } from "../../src/core/errors.js";
import { pathExists } from "../../src/utils/fs.js";

describe("MCP workflow", () => {
  let home: string;
  let ctx: McpContext;

  const claudeConfig = () => join(home, ".claude.json");
  const geminiConfig = () => join(home, ".gemini/settings.json");

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "ai-cli-workflow-"));
    const located = new Set(["claude", "gemini"]);
    ctx = createMcpContext(home, async (binary) => located.has(binary));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  describe("enable", () => {
    it("isolates a failing target from the rest of the batch", async () => {
      await mkdir(join(home, ".gemini"));
      await writeFile(geminiConfig(), "{ broken");

      const report = await enableMany(ctx, "all");

      expect(report.label).toBe("all servers");
      expect(report.servers).toEqual(["linear", "playwright"]);
      expect(report.counts).toEqual({ ok: 1, skipped: 4, failed: 1 });
      expect(report.outcomes.map((o) => [o.target, o.status])).toEqual([
        ["Claude Code", "ok"],
        ["Gemini CLI", "failed"],
        ["Codex CLI", "skipped"],
        ["Amp", "skipped"],
        ["Cursor", "skipped"],
        ["Copilot CLI", "skipped"],
      ]);

      const gemini = report.outcomes[1];
      expect(gemini.status === "failed" && gemini.failures.map((f) => f.server)).toEqual([
        "linear",
        "playwright",
      ]);
      expect(gemini.status === "failed" && gemini.error).toMatch(
        /^Failed to parse JSON in .*settings\.json: /
      );
      expect(await readFile(geminiConfig(), "utf-8")).toBe("{ broken");

      const claude = JSON.parse(await readFile(claudeConfig(), "utf-8"));
      expect(Object.keys(claude.mcpServers)).toEqual(["linear", "playwright"]);
    });

    it("reports skipped targets as not installed", async () => {
      const report = await enableMany(ctx, "linear");
      const amp = report.outcomes.find((o) => o.target === "Amp");
      expect(amp).toEqual({ target: "Amp", status: "skipped", reason: "Not installed" });
      expect(await pathExists(join(home, ".config/amp/settings.json"))).toBe(false);
    });

    it("streams outcomes in target order", async () => {
      const seen: TargetOutcome[] = [];
      const report = await enableMany(ctx, "playwright", (o) => seen.push(o));
      expect(seen).toEqual(report.outcomes);
    });

    it("rejects an unknown server before touching any file", async () => {
      await expect(enableMany(ctx, "not-a-server")).rejects.toThrow(NotFoundError);
      expect(await pathExists(claudeConfig())).toBe(false);
      expect(await pathExists(geminiConfig())).toBe(false);
    });
  });

  describe("disable", () => {
    it("removes only the selected server", async () => {
      await enableMany(ctx, "all");

      const report = await disableMany(ctx, "linear");

      expect(report.action).toBe("disable");
      expect(report.label).toBe("linear");
      expect(report.counts).toEqual({ ok: 2, skipped: 4, failed: 0 });
      const claude = JSON.parse(await readFile(claudeConfig(), "utf-8"));
      expect(Object.keys(claude.mcpServers)).toEqual(["playwright"]);
    });

    it("succeeds on targets without a config file", async () => {
      const report = await disableMany(ctx, "all");
      expect(report.counts.failed).toBe(0);
      expect(await pathExists(claudeConfig())).toBe(false);
    });
  });

  describe("list", () => {
    it("reflects enable and disable", async () => {
      await enableMany(ctx, "linear");
      let status = await listStatus(ctx);
      expect(status.matrix.get("Claude Code", "linear")).toBe("enabled");
      expect(status.matrix.get("Gemini CLI", "playwright")).toBe("disabled");
      expect(status.matrix.get("Amp", "linear")).toBe("not-installed");

      await disableMany(ctx, "linear");
      status = await listStatus(ctx);
      expect(status.matrix.get("Claude Code", "linear")).toBe("disabled");
    });
  });

  describe("doctor", () => {
    it("reports installation and config presence", async () => {
      await enableMany(ctx, "linear");
      const entries = await doctor(ctx);

      expect(entries[0]).toEqual({
        target: "Claude Code",
        installed: true,
        configPath: claudeConfig(),
        configExists: true,
      });
      expect(entries.find((e) => e.target === "Cursor")).toEqual({
        target: "Cursor",
        installed: false,
        configPath: join(home, ".cursor/mcp.json"),
        configExists: false,
      });
    });
  });
});

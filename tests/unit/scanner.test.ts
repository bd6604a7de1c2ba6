import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { scanTargets } from "../../src/core/scanner.js";
import { StatusMatrix } from "../../src/core/status.js";
import { buildTargets } from "../../src/core/targets.js";
import { serverCatalog } from "../../src/core/servers.js";
import type { McpTarget } from "../../src/core/types.js";

describe("StatusMatrix", () => {
  it("defaults to unknown", () => {
    expect(new StatusMatrix().get("Amp", "linear")).toBe("unknown");
  });

  it("serializes rows per target", () => {
    const matrix = new StatusMatrix();
    matrix.set("Amp", "linear", "enabled");
    matrix.set("Amp", "playwright", "disabled");

    expect(matrix.size).toBe(2);
    expect(matrix.toJSON()).toEqual({ Amp: { linear: "enabled", playwright: "disabled" } });
  });
});

describe("scanTargets", () => {
  let home: string;
  let targets: readonly McpTarget[];

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "ai-cli-scan-"));
    targets = buildTargets(home);
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it("fills one entry per target and server", async () => {
    await writeFile(
      join(home, ".claude.json"),
      JSON.stringify({ mcpServers: { linear: { command: "npx", args: [] } } })
    );
    await mkdir(join(home, ".gemini"));
    await writeFile(join(home, ".gemini/settings.json"), "{");

    const located = new Set(["claude", "gemini"]);
    const matrix = await scanTargets(targets, serverCatalog(), async (b) => located.has(b));

    expect(matrix.size).toBe(12);
    expect(matrix.toJSON()).toEqual({
      "Claude Code": { linear: "enabled", playwright: "disabled" },
      "Gemini CLI": { linear: "unknown", playwright: "unknown" },
      "Codex CLI": { linear: "not-installed", playwright: "not-installed" },
      Amp: { linear: "not-installed", playwright: "not-installed" },
      Cursor: { linear: "not-installed", playwright: "not-installed" },
      "Copilot CLI": { linear: "not-installed", playwright: "not-installed" },
    });
  });

  it("reports not-installed whatever the config file says", async () => {
    await mkdir(join(home, ".config/amp"), { recursive: true });
    await writeFile(
      join(home, ".config/amp/settings.json"),
      JSON.stringify({ "amp.mcpServers": { linear: { command: "npx", args: [] } } })
    );

    const matrix = await scanTargets(targets, serverCatalog(), async () => false);

    expect(matrix.get("Amp", "linear")).toBe("not-installed");
    expect(matrix.get("Amp", "playwright")).toBe("not-installed");
  });

  it("marks a target unknown when its install check throws", async () => {
    const matrix = await scanTargets(targets, serverCatalog(), async (binary) => {
      if (binary === "amp") throw new Error("lookup exploded");
      return binary === "claude";
    });

    expect(matrix.get("Amp", "linear")).toBe("unknown");
    expect(matrix.get("Amp", "playwright")).toBe("unknown");
    expect(matrix.get("Claude Code", "linear")).toBe("disabled");
  });
});

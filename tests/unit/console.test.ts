import { describe, it, expect } from "vitest";
import { stripVTControlCharacters as plain } from "node:util";
import {
  formatBatchSummary,
  formatOutcome,
  renderDoctorEntry,
  renderStatusReport,
} from "../../src/reporters/console.js";
import { StatusMatrix } from "../../src/core/status.js";
import { serverCatalog } from "../../src/core/servers.js";
import { buildTargets } from "../../src/core/targets.js";
import type { BatchReport } from "../../src/core/actions.js";

describe("renderStatusReport", () => {
  const matrix = new StatusMatrix();
  matrix.set("Claude Code", "linear", "enabled");
  matrix.set("Claude Code", "playwright", "disabled");
  matrix.set("Gemini CLI", "linear", "not-installed");
  matrix.set("Gemini CLI", "playwright", "not-installed");

  const lines = renderStatusReport({
    servers: serverCatalog(),
    targets: buildTargets("/h").slice(0, 2),
    matrix,
  }).map(plain);

  it("lists the catalog first", () => {
    expect(lines.slice(0, 6)).toEqual([
      "Available Servers:",
      "  linear  Linear issue tracking integration",
      "  playwright  Browser automation with Playwright",
      "",
      "Status per tool:",
      "",
    ]);
  });

  it("aligns the header and rule", () => {
    expect(lines[6].trimEnd()).toBe("  Tool" + " ".repeat(14) + "linear" + " ".repeat(10) + "playwright");
    expect(lines[7]).toBe("  " + "-".repeat(16) + "  " + "-".repeat(14) + "  " + "-".repeat(14));
  });

  it("renders one row per target", () => {
    expect(lines.slice(8)).toEqual([
      "  Claude Code" + " ".repeat(7) + "enabled" + " ".repeat(9) + "disabled",
      "  Gemini CLI" + " ".repeat(8) + "not installed" + " ".repeat(3) + "not installed",
    ]);
  });
});

describe("formatOutcome", () => {
  it("formats each status", () => {
    expect(plain(formatOutcome({ target: "Claude Code", status: "ok", changes: [] }))).toBe(
      "  Claude Code     [OK]"
    );
    expect(
      plain(formatOutcome({ target: "Amp", status: "skipped", reason: "Not installed" }))
    ).toBe("  Amp" + " ".repeat(13) + "[SKIP] Not installed");
    expect(
      plain(
        formatOutcome({
          target: "Gemini CLI",
          status: "failed",
          error: "boom",
          failures: [{ server: "linear", error: "boom" }],
          changes: [],
        })
      )
    ).toBe("  Gemini CLI      [FAIL] boom");
  });
});

describe("formatBatchSummary", () => {
  it("counts outcomes", () => {
    const report: BatchReport = {
      action: "enable",
      label: "all servers",
      servers: ["linear", "playwright"],
      outcomes: [],
      counts: { ok: 1, skipped: 4, failed: 1 },
    };
    expect(formatBatchSummary(report)).toBe(
      "Done! Enabled all servers in 1 tool(s), skipped 4, failed 1."
    );
    expect(formatBatchSummary({ ...report, action: "disable", label: "linear" })).toBe(
      "Done! Disabled linear in 1 tool(s), skipped 4, failed 1."
    );
  });
});

describe("renderDoctorEntry", () => {
  it("omits config state for missing tools", () => {
    const lines = renderDoctorEntry({
      target: "Cursor",
      installed: false,
      configPath: "/h/.cursor/mcp.json",
      configExists: false,
    }).map(plain);
    expect(lines).toEqual(["Cursor" + " ".repeat(10) + " [not installed]", "  /h/.cursor/mcp.json"]);
  });

  it("shows whether the config exists", () => {
    const lines = renderDoctorEntry({
      target: "Amp",
      installed: true,
      configPath: "/h/.config/amp/settings.json",
      configExists: false,
    }).map(plain);
    expect(lines[2]).toBe("  config not created yet");
  });
});

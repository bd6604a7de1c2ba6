/**
 * AI CLI tools whose installed and published versions are reported by
 * `apps list` / `apps check`.
 */
export interface ToolDefinition {
  readonly name: string;
  /** Executable, also shown as the tool's identifier */
  readonly binary: string;
  /** npm package carrying the published version, when there is one */
  readonly npmPackage?: string;
  /** Install script that pins the published version in a `VER=` line */
  readonly installScriptUrl?: string;
  /** Text the tool appends to its `--version` output */
  readonly versionSuffix?: string;
}

const TOOLS: readonly ToolDefinition[] = Object.freeze([
  {
    name: "Claude Code",
    binary: "claude",
    npmPackage: "@anthropic-ai/claude-code",
    versionSuffix: " (Claude Code)",
  },
  { name: "Gemini CLI", binary: "gemini", npmPackage: "@google/gemini-cli" },
  { name: "Codex CLI", binary: "codex", npmPackage: "@openai/codex" },
  { name: "Amp", binary: "amp", npmPackage: "@sourcegraph/amp" },
  { name: "Copilot CLI", binary: "copilot", npmPackage: "@github/copilot" },
  { name: "OpenCode", binary: "opencode", npmPackage: "opencode-ai" },
  { name: "Cline CLI", binary: "cline", npmPackage: "cline" },
  { name: "Kilo Code CLI", binary: "kilocode", npmPackage: "@kilocode/cli" },
  { name: "Factory CLI", binary: "droid", installScriptUrl: "https://app.factory.ai/cli" },
  { name: "Mistral Vibe", binary: "vibe" },
]);

export function toolCatalog(): readonly ToolDefinition[] {
  return TOOLS;
}

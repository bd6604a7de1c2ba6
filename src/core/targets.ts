import { dirname, join } from "node:path";
import type { McpTarget } from "./types.js";
import type { BinaryLocator } from "../utils/binaries.js";
import { pathExists } from "../utils/fs.js";

/**
 * Known MCP-capable CLI tools, with their config file locations relative to
 * `home`. Order here is the display and iteration order everywhere.
 */
export function buildTargets(home: string): readonly McpTarget[] {
  const targets: McpTarget[] = [
    {
      name: "Claude Code",
      binaryName: "claude",
      installSignal: "binary",
      configMethod: {
        kind: "structured",
        path: join(home, ".claude.json"),
        serversKey: "mcpServers",
        connectionType: "stdio",
        includeToolsField: false,
      },
    },
    {
      name: "Gemini CLI",
      binaryName: "gemini",
      installSignal: "binary",
      configMethod: {
        kind: "structured",
        path: join(home, ".gemini/settings.json"),
        serversKey: "mcpServers",
        includeToolsField: false,
      },
    },
    {
      name: "Codex CLI",
      binaryName: "codex",
      installSignal: "binary-or-config-file",
      configMethod: {
        kind: "text-table",
        path: join(home, ".codex/config.toml"),
      },
    },
    {
      name: "Amp",
      binaryName: "amp",
      installSignal: "binary",
      configMethod: {
        kind: "structured",
        path: join(home, ".config/amp/settings.json"),
        // Amp keeps a flat key with a dot in it, not a nested object
        serversKey: "amp.mcpServers",
        includeToolsField: false,
      },
    },
    {
      // No dependable CLI binary; the config directory is the signal
      name: "Cursor",
      binaryName: "cursor",
      installSignal: "config-dir",
      configMethod: {
        kind: "structured",
        path: join(home, ".cursor/mcp.json"),
        serversKey: "mcpServers",
        includeToolsField: false,
      },
    },
    {
      name: "Copilot CLI",
      binaryName: "copilot",
      installSignal: "binary-or-config-dir",
      configMethod: {
        kind: "structured",
        path: join(home, ".copilot/mcp-config.json"),
        serversKey: "mcpServers",
        connectionType: "local",
        includeToolsField: true,
      },
    },
  ];

  return Object.freeze(targets.map((t) => Object.freeze(t)));
}

export function configPath(target: McpTarget): string {
  return target.configMethod.path;
}

/**
 * Decide whether a target tool is installed according to its install signal.
 * Lookup failures count as "not found".
 */
export async function isTargetInstalled(
  target: McpTarget,
  locate: BinaryLocator
): Promise<boolean> {
  const path = configPath(target);

  switch (target.installSignal) {
    case "binary":
      return locate(target.binaryName);
    case "config-dir":
      return pathExists(dirname(path));
    case "binary-or-config-dir":
      return (await locate(target.binaryName)) || pathExists(dirname(path));
    case "binary-or-config-file":
      return (await locate(target.binaryName)) || pathExists(path);
  }
}

import type { ConfigChange, McpServer, McpTarget, ServerEntry, StructuredConfigMethod } from "./types.js";
import {
  disableInStructured,
  enableInStructured,
  isEnabledInStructured,
} from "../parsers/json-config.js";
import {
  disableInTextTable,
  enableInTextTable,
  isEnabledInTextTable,
} from "../parsers/toml-config.js";
import { SERVER_LAUNCHER } from "../utils/constants.js";

/**
 * Enable, disable and query one server in one target's configuration file.
 *
 * Each call touches exactly one server entry; batching is left to callers.
 * Errors (ConfigParseError, ConfigIoError, ConfigConflictError) propagate
 * unmodified.
 */
export async function enableServer(
  target: McpTarget,
  server: McpServer
): Promise<ConfigChange> {
  const method = target.configMethod;
  switch (method.kind) {
    case "structured":
      return enableInStructured(
        method,
        entryKey(method, server),
        buildStructuredEntry(method, server)
      );
    case "text-table":
      return enableInTextTable(method, server.id, {
        command: SERVER_LAUNCHER,
        args: [...server.args],
      });
  }
}

export async function disableServer(
  target: McpTarget,
  server: McpServer
): Promise<ConfigChange> {
  const method = target.configMethod;
  switch (method.kind) {
    case "structured":
      return disableInStructured(method, entryKey(method, server));
    case "text-table":
      return disableInTextTable(method, server.id);
  }
}

/** True when the server's key is present, whatever its value looks like. */
export async function isServerEnabled(
  target: McpTarget,
  server: McpServer
): Promise<boolean> {
  const method = target.configMethod;
  switch (method.kind) {
    case "structured":
      return isEnabledInStructured(method, entryKey(method, server));
    case "text-table":
      return isEnabledInTextTable(method, server.id);
  }
}

export function entryKey(method: StructuredConfigMethod, server: McpServer): string {
  return method.serverKeyOverride ?? server.id;
}

/**
 * Launch descriptor in the shape the target expects. Key order is fixed:
 * command, args, type, env, tools.
 */
export function buildStructuredEntry(
  method: StructuredConfigMethod,
  server: McpServer
): ServerEntry {
  const entry: ServerEntry = {
    command: SERVER_LAUNCHER,
    args: [...server.args],
  };

  if (method.connectionType) {
    entry.type = method.connectionType;
    if (method.connectionType === "stdio") entry.env = {};
  }
  if (method.includeToolsField) {
    entry.tools = ["*"];
  }

  return entry;
}

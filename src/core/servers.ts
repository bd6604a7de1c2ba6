import type { McpServer } from "./types.js";
import { NotFoundError } from "./errors.js";

const SERVERS: readonly McpServer[] = Object.freeze([
  Object.freeze({
    id: "linear",
    name: "Linear",
    args: Object.freeze(["mcp-remote", "https://mcp.linear.app/mcp"]),
    description: "Linear issue tracking integration",
  }),
  Object.freeze({
    id: "playwright",
    name: "Playwright",
    args: Object.freeze(["@playwright/mcp@latest"]),
    description: "Browser automation with Playwright",
  }),
]);

/** All known MCP servers, in display order. */
export function serverCatalog(): readonly McpServer[] {
  return SERVERS;
}

export function findServer(
  id: string,
  servers: readonly McpServer[] = SERVERS
): McpServer | undefined {
  return servers.find((s) => s.id === id);
}

/**
 * Resolve a command-line selector to the servers it names: the whole catalog
 * for "all", otherwise exactly one server.
 */
export function resolveServers(
  selector: string,
  servers: readonly McpServer[],
  allSentinel: string
): readonly McpServer[] {
  if (selector === allSentinel) return servers;

  const server = findServer(selector, servers);
  if (!server) {
    throw new NotFoundError(
      "server",
      selector,
      servers.map((s) => s.id)
    );
  }
  return [server];
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerManager } from "../cli/server/lifecycle.js";
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./config/server.js";
import { registerCheckStatusTool } from "./tools/check-status.js";
import { registerGetOutputTool } from "./tools/get-output.js";

// Build and configure MCP server instance; tools only read the state file.
export function createLlmrunMcpServer(manager: ServerManager): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  registerCheckStatusTool(server, manager);
  registerGetOutputTool(server, manager);

  return server;
}

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { ServerManager } from "../cli/server/lifecycle.js";
import { createLlmrunMcpServer } from "./server.js";

// Start MCP server on stdio transport.
export async function runMcpServer(manager: ServerManager): Promise<void> {
  const server = createLlmrunMcpServer(manager);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

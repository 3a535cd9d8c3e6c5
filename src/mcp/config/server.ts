// MCP server identity used by clients to display this integration.
export const MCP_SERVER_NAME = "llmrun";
export const MCP_SERVER_VERSION = "0.1.0";

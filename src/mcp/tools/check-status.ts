import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerManager } from "../../cli/server/lifecycle.js";
import { isPidAlive } from "../../cli/server/process-control.js";
import type { RunEntry } from "../../cli/types.js";
import { CHECK_STATUS_TOOL_DESCRIPTION, NO_SERVERS_MESSAGE } from "../config/messages.js";
import { CHECK_STATUS_MAX_STOPPED } from "../config/tools.js";
import { describeServer } from "../servers/describe.js";
import { fuzzyMatchServer } from "../servers/match.js";

// Text body for `check_status`; running servers first, then recent stops.
export function buildCheckStatusText(
  entries: RunEntry[],
  lastUsed: string | undefined,
  isAlive: (pid: number) => boolean = isPidAlive,
  now: Date = new Date()
): string {
  const running = entries.filter((entry) => entry.state === "running");
  const stopped = entries.filter((entry) => entry.state === "stopped").slice(0, CHECK_STATUS_MAX_STOPPED);

  const output: string[] = [];
  for (const entry of running) {
    output.push(describeServer(entry, isAlive, now));
  }

  if (running.length === 0) {
    output.push("No servers currently running.");
  }

  if (stopped.length > 0) {
    output.push("", "Recently stopped:");
    for (const entry of stopped) {
      output.push(`  ${describeServer(entry, isAlive, now)}`);
    }
  }

  if (lastUsed) {
    output.push("", `Last used: ${lastUsed}`);
  }

  return output.join("\n");
}

// Register `check_status` tool on the provided MCP server.
export function registerCheckStatusTool(server: McpServer, manager: ServerManager): void {
  server.tool(
    "check_status",
    CHECK_STATUS_TOOL_DESCRIPTION,
    {
      model: z.string().optional().describe("Filter to one model name (fuzzy). If omitted, shows all servers."),
    },
    async ({ model }) => {
      const state = manager.getState();

      if (state.servers.length === 0) {
        return { content: [{ type: "text", text: NO_SERVERS_MESSAGE }] };
      }

      let entries = state.servers;
      if (model) {
        entries = fuzzyMatchServer(entries, model);
        if (entries.length === 0) {
          const available = state.servers.map((entry) => entry.model).join(", ");
          return {
            content: [{ type: "text", text: `No server found for '${model}'. Known models: ${available}` }],
          };
        }
      }

      return { content: [{ type: "text", text: buildCheckStatusText(entries, state.last_used) }] };
    }
  );
}

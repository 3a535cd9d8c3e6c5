import { existsSync } from "fs";
import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerManager } from "../../cli/server/lifecycle.js";
import { GET_OUTPUT_DEFAULT_LINES } from "../config/tools.js";
import { GET_OUTPUT_TOOL_DESCRIPTION } from "../config/messages.js";
import { fuzzyMatchServer } from "../servers/match.js";
import { getLastNLines, stripAnsi } from "../servers/output.js";

// Keep only lines containing `grep`, case-insensitively.
export function filterLines(output: string, grep: string): string[] {
  const needle = grep.toLowerCase();
  return output.split("\n").filter((line) => line.toLowerCase().includes(needle));
}

// Register `get_output` tool for raw daemon log access.
export function registerGetOutputTool(server: McpServer, manager: ServerManager): void {
  server.tool(
    "get_output",
    GET_OUTPUT_TOOL_DESCRIPTION,
    {
      model: z.string().describe("Model name (fuzzy), e.g. 'mistral'"),
      lines: z.number().int().positive().default(GET_OUTPUT_DEFAULT_LINES).describe("Number of lines to retrieve"),
      grep: z
        .string()
        .optional()
        .describe("Filter output to lines containing this string (case-insensitive)"),
    },
    async ({ model, lines, grep }) => {
      const withLogs = manager.getState().servers.filter((entry) => entry.log_file !== undefined);

      if (withLogs.length === 0) {
        return {
          content: [
            {
              type: "text",
              text: "No daemon-mode servers recorded. Run 'llmrun start <model>' to launch one with a log file.",
            },
          ],
        };
      }

      const matched = fuzzyMatchServer(withLogs, model);
      if (matched.length === 0) {
        const available = withLogs.map((entry) => entry.model).join("\n  ");
        return {
          content: [{ type: "text", text: `No daemon log for '${model}'.\n\nAvailable:\n  ${available}` }],
        };
      }

      if (matched.length > 1) {
        const matches = matched.map((entry) => entry.model).join("\n  ");
        return {
          content: [{ type: "text", text: `Multiple models match '${model}'. Please be more specific:\n  ${matches}` }],
        };
      }

      const entry = matched[0];
      const logPath = entry.log_file;
      if (!logPath || !existsSync(logPath)) {
        return { content: [{ type: "text", text: `Log file not found for '${entry.model}'` }] };
      }

      let output = stripAnsi(getLastNLines(logPath, lines));

      if (grep) {
        const filtered = filterLines(output, grep);
        if (filtered.length === 0) {
          return {
            content: [{ type: "text", text: `No lines matching '${grep}' in the last ${lines} lines of ${entry.model}` }],
          };
        }
        output = filtered.join("\n");
      }

      return {
        content: [
          {
            type: "text",
            text: `=== ${entry.model} (${entry.state}, last ${lines} lines${grep ? `, filtered for '${grep}'` : ""}) ===\n\n${output}`,
          },
        ],
      };
    }
  );
}

// Centralized MCP tool descriptions and reusable user-facing text.

export const CHECK_STATUS_TOOL_DESCRIPTION = `List local llama.cpp servers tracked by llmrun: which models are
running, on which port and PID, in foreground or daemon mode, and which
stopped recently with what exit code.

CALL THIS TOOL:
- Before sending requests to a local model, to find its port
- When a local model endpoint stops responding
- After asking the user to start or stop a model, to confirm it happened`;

export const GET_OUTPUT_TOOL_DESCRIPTION = `Get raw log output from a model server launched with 'llmrun start'.
Use when check_status doesn't provide enough detail, for example to see
load errors, memory allocation lines or request logs.

Only daemon-mode servers have log files; foreground runs print to the
user's terminal.`;

export const NO_SERVERS_MESSAGE =
  "No llmrun servers recorded.\n\n" +
  "Start one in the background with:\n" +
  "  llmrun start <model>\n\n" +
  "or in the foreground with:\n" +
  "  llmrun <model>";

import { STATUS_RECENT_STOPPED_LIMIT } from "../config/lifecycle.js";
import type { RunEntry, StateDocument } from "../types.js";

const NAME_WIDTH = 40;

function portLabel(entry: RunEntry): string {
  return entry.port !== null ? `port ${entry.port}` : "port unknown";
}

function pidLabel(entry: RunEntry): string {
  return entry.pid !== null ? `pid ${entry.pid}` : "pid unknown";
}

// Newest stop first; entries without a timestamp sink to the bottom.
function byStoppedAtDesc(a: RunEntry, b: RunEntry): number {
  return (b.stopped_at ?? "").localeCompare(a.stopped_at ?? "");
}

// Render the state document as JSON or as a grouped running/stopped summary.
export function renderStatus(doc: StateDocument, stateFile: string, json: boolean): string {
  if (json) {
    return JSON.stringify(doc, null, 2);
  }

  if (doc.servers.length === 0) {
    return `No server state recorded yet.\nState file: ${stateFile}`;
  }

  const lines: string[] = [`llmrun server state  (${stateFile})`, ""];

  const running = doc.servers.filter((entry) => entry.state === "running");
  if (running.length > 0) {
    lines.push("RUNNING:");
    for (const entry of running) {
      const mode = entry.mode === "daemon" ? "  daemon" : "";
      lines.push(`  ${entry.model.padEnd(NAME_WIDTH)}  ${portLabel(entry)}  ${pidLabel(entry)}${mode}`);
      lines.push(`  ${" ".repeat(NAME_WIDTH)}  started ${entry.started_at}`);
      if (entry.log_file) {
        lines.push(`  ${" ".repeat(NAME_WIDTH)}  log ${entry.log_file}`);
      }
    }
    lines.push("");
  }

  const stopped = doc.servers
    .filter((entry) => entry.state === "stopped")
    .sort(byStoppedAtDesc)
    .slice(0, STATUS_RECENT_STOPPED_LIMIT);
  if (stopped.length > 0) {
    lines.push("RECENTLY STOPPED:");
    for (const entry of stopped) {
      lines.push(`  ${entry.model.padEnd(NAME_WIDTH)}  ${portLabel(entry)}  stopped ${entry.stopped_at ?? "unknown"}`);
    }
    lines.push("");
  }

  if (doc.last_used) {
    lines.push(`Last used: ${doc.last_used}`);
  }

  return lines.join("\n");
}

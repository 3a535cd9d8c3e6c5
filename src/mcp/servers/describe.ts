import type { RunEntry } from "../../cli/types.js";
import { formatTimeAgo } from "../../cli/utils/time.js";

// One status line per tracked server, flagging running entries whose PID is gone.
export function describeServer(entry: RunEntry, isAlive: (pid: number) => boolean, now: Date): string {
  const portInfo = entry.port !== null ? `port ${entry.port}` : "port unknown";

  if (entry.state === "running") {
    const pidInfo = entry.pid !== null ? `pid ${entry.pid}` : "pid unknown";
    const started = formatTimeAgo(new Date(entry.started_at), now);
    const line = `${entry.model} — running (${portInfo}, ${pidInfo}, ${entry.mode}, started ${started})`;

    if (entry.pid !== null && !isAlive(entry.pid)) {
      return `${line}\n  ⚠ process ${entry.pid} is no longer alive; the server may have crashed`;
    }
    return line;
  }

  const parts = [`${entry.model} — stopped`];
  if (entry.exit_code !== undefined) {
    parts.push(`with code ${entry.exit_code}`);
  }
  if (entry.stopped_at) {
    parts.push(`(stopped ${formatTimeAgo(new Date(entry.stopped_at), now)})`);
  }
  return parts.join(" ");
}

import type { CliContext } from "../context.js";
import { HistoryStore } from "../history/store.js";

// `llmrun clear-history`
export function clearHistoryCommand(ctx: CliContext): void {
  const removed = new HistoryStore(ctx.paths.historyFile).clear();
  console.log(`✓ History cleared (${removed} ${removed === 1 ? "entry" : "entries"})`);
}

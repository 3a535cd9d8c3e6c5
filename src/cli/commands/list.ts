import { loadSettings } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { HistoryStore } from "../history/store.js";
import { listModels } from "../models/catalog.js";
import { formatTimeAgo } from "../utils/time.js";

// `llmrun list`: models on disk, newest first, with running servers marked.
export function listCommand(ctx: CliContext): void {
  const settings = loadSettings(ctx.paths);
  const models = listModels(settings.models_dir);

  console.log(`Available models in ${settings.models_dir}:`);
  console.log("");

  if (models.length === 0) {
    console.log("  No models found.");
    return;
  }

  const running = new Set(ctx.manager.runningEntries().map((entry) => entry.model));
  const width = Math.max(...models.map((model) => model.name.length));

  for (const model of models) {
    const marker = running.has(model.name) ? "  (running)" : "";
    console.log(`  ${model.name.padEnd(width)}  ${formatTimeAgo(new Date(model.mtimeMs))}${marker}`);
  }

  const recent = new HistoryStore(ctx.paths.historyFile).recent(settings.recent_models_count);
  if (recent.length > 0) {
    console.log("");
    console.log("Recently run:");
    for (const entry of recent) {
      const when = formatTimeAgo(new Date(entry.last_run * 1000));
      console.log(`  ${entry.name.padEnd(width)}  ${when}  ${entry.status} (${entry.exit_code})`);
    }
  }
}

import { renderModelInfo, type InfoViewMode } from "../capture/info-view.js";
import { ModelInfoStore } from "../capture/model-info.js";
import { loadSettings } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { resolveModelOrExit } from "./model-arg.js";

function parseInfoArgs(args: string[]): { query: string | undefined; mode: InfoViewMode } {
  let query: string | undefined;
  let mode: InfoViewMode = "summary";

  for (const arg of args) {
    if (arg === "--raw") {
      mode = "raw";
    } else if (arg === "--kv") {
      mode = "kv";
    } else if (query === undefined) {
      query = arg;
    }
  }

  return { query, mode };
}

// `llmrun info <model> [--kv|--raw]`
export function infoCommand(ctx: CliContext, args: string[]): void {
  const settings = loadSettings(ctx.paths);
  const { query, mode } = parseInfoArgs(args);
  const model = resolveModelOrExit(settings, query, "llmrun info <model> [--kv|--raw]");

  const { info, status } = new ModelInfoStore(ctx.paths).load(model);
  if (!info) {
    console.log(`No cached info for model: ${model}`);
    console.log("Run the model once to capture metadata:");
    console.log(`  llmrun ${model}`);
    return;
  }

  console.log(renderModelInfo(info, status, mode).join("\n"));
}

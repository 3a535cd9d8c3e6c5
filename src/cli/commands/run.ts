import { runModel } from "../capture/run-model.js";
import { ModelInfoStore } from "../capture/model-info.js";
import { loadSettings } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { ModelNotFoundError } from "../errors.js";
import { HistoryStore } from "../history/store.js";
import { printModelSuggestions, resolveModelOrExit } from "./model-arg.js";

// `llmrun <model> [flags...]`: run attached, capture diagnostics, keep the exit code.
export async function runForegroundCommand(ctx: CliContext, args: string[]): Promise<void> {
  const settings = loadSettings(ctx.paths);
  const model = resolveModelOrExit(settings, args[0], "llmrun <model> [flags...]");

  // Host signals end the run through the engine's interrupt path.
  const controller = new AbortController();
  const interrupt = (): void => controller.abort();
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  try {
    const outcome = await runModel(settings, model, args.slice(1), {
      manager: ctx.manager,
      history: new HistoryStore(ctx.paths.historyFile),
      infoStore: new ModelInfoStore(ctx.paths),
      signal: controller.signal,
    });

    if (outcome.endReason === "sigint") {
      console.error("");
      console.error("[llmrun] Interrupted by user");
      process.exit(outcome.exitCode);
    }

    if (outcome.exitCode !== 0) {
      console.error(`[llmrun] Error: llama-server exited with code ${outcome.exitCode}`);
      process.exit(outcome.exitCode);
    }
  } catch (error) {
    if (error instanceof ModelNotFoundError) {
      console.log(`Error: ${error.message}`);
      console.log("");
      console.log("Available models:");
      printModelSuggestions(error.available);
      process.exit(1);
    }
    throw error;
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
}

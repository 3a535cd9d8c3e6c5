import { loadSettings } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { getModelPath } from "../models/catalog.js";
import { buildRunConfig } from "../models/command.js";
import { quoteShellCommand } from "../utils/shell.js";
import { resolveModelOrExit } from "./model-arg.js";

// `llmrun start <model> [flags...]`: launch detached and report where it logs.
export async function startDetachedCommand(ctx: CliContext, args: string[]): Promise<void> {
  const settings = loadSettings(ctx.paths);
  const model = resolveModelOrExit(settings, args[0], "llmrun start <model> [flags...]");
  const runConfig = buildRunConfig(settings, model, args.slice(1));

  console.error(`[llmrun] Starting ${model} (daemon)`);
  console.error(`[llmrun] Model: ${getModelPath(settings.models_dir, model)}`);
  console.error(`[llmrun] Command: ${quoteShellCommand(runConfig.argv)}`);

  const { pid, logPath } = await ctx.manager.launchDetached(model, runConfig.argv, runConfig.port ?? null);

  if (pid !== null) {
    console.log(`✓ Started ${model} (PID ${pid})`);
  } else {
    console.log(`✓ Started ${model} (PID not yet known)`);
  }
  if (runConfig.port !== undefined) {
    console.log(`  Port: ${runConfig.port}`);
  }
  console.log(`  Log:  ${logPath}`);
  console.log(`  Stop: llmrun stop ${model}`);
}

import type { CliContext } from "../context.js";
import { SignalResolutionError } from "../errors.js";
import type { StopAllResult } from "../server/lifecycle.js";
import type { RunEntry } from "../types.js";

// Fuzzy lookup over running entries only.
function findRunning(entries: RunEntry[], query: string): RunEntry | null {
  const needle = query.toLowerCase();
  return (
    entries.find((entry) => entry.model.toLowerCase() === needle) ??
    entries.find((entry) => entry.model.toLowerCase().includes(needle)) ??
    null
  );
}

// Entries with no PID were still marked stopped; anything else is a real failure.
export function formatStopAllSummary(result: StopAllResult): string {
  const unresolved = result.failures.filter((failure) => failure.error instanceof SignalResolutionError).length;
  const failed = result.failures.length - unresolved;

  const parts = [`✓ Stopped ${result.stopped} server(s)`];
  if (unresolved > 0) {
    parts.push(`${unresolved} marked stopped without a PID`);
  }
  if (failed > 0) {
    parts.push(`${failed} failed`);
  }
  return parts.join(", ");
}

// `llmrun stop <model>` and `llmrun stop --all`.
export async function stopCommand(ctx: CliContext, args: string[]): Promise<void> {
  const query = args[0];
  if (!query) {
    console.error("Error: missing model name");
    console.error("Usage: llmrun stop <model> | llmrun stop --all");
    process.exit(1);
  }

  if (query === "--all") {
    const { stopped, failures } = await ctx.manager.stopAll();
    for (const failure of failures) {
      console.error(`[llmrun] warning: ${failure.error.message}`);
    }
    console.log(formatStopAllSummary({ stopped, failures }));
    return;
  }

  const running = ctx.manager.runningEntries();
  const entry = findRunning(running, query);
  if (!entry) {
    console.log(`No running server found matching: ${query}`);
    if (running.length > 0) {
      console.log("");
      console.log("Currently running (per state file):");
      for (const candidate of running) {
        console.log(`  ${candidate.model}`);
      }
    }
    process.exit(1);
  }

  console.log(`Stopping ${entry.model}...`);
  const result = await ctx.manager.stopOne(entry);

  if (result.ok) {
    const how = result.forced ? "SIGKILL" : "SIGTERM";
    console.log(`✓ Stopped ${entry.model} (PID ${result.pid}, ${how})`);
  } else {
    console.error(`[llmrun] warning: ${result.error.message}`);
    console.log(`✓ Marked ${entry.model} as stopped`);
  }
}

import type { CliContext } from "../context.js";
import { renderStatus } from "../server/status.js";

// `llmrun status [--json]`
export function statusCommand(ctx: CliContext, args: string[]): void {
  const json = args.includes("--json");
  console.log(renderStatus(ctx.manager.getState(), ctx.paths.stateFile, json));
}

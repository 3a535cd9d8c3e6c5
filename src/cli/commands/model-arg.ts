import type { Settings } from "../config/settings.js";
import { listModels } from "../models/catalog.js";
import { resolveModelName } from "../models/resolve.js";
import { formatTimeAgo } from "../utils/time.js";

export function printModelSuggestions(names: string[], limit: number = 10): void {
  if (names.length === 0) {
    console.log("  No models found.");
    return;
  }

  for (const name of names.slice(0, limit)) {
    console.log(`  ${name}`);
  }
}

// Turn a user-supplied fragment into exactly one model name, or exit.
export function resolveModelOrExit(settings: Settings, query: string | undefined, usage: string): string {
  if (!query) {
    console.error("Error: missing model name");
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }

  const models = listModels(settings.models_dir);
  const result = resolveModelName(
    models.map((model) => model.name),
    query
  );

  switch (result.kind) {
    case "exact":
    case "substring":
      return result.name;

    case "ambiguous":
      console.error(`Multiple models match '${query}':`);
      for (const name of result.candidates) {
        console.error(`  ${name}`);
      }
      console.error("Use a longer name to pick one.");
      process.exit(1);

    case "none":
      console.log(`No model found matching: ${query}`);
      console.log("");
      console.log(`Available models in ${settings.models_dir}:`);
      printModelSuggestions(models.map((model) => `${model.name.padEnd(40)}  ${formatTimeAgo(new Date(model.mtimeMs))}`));
      process.exit(1);
  }
}

import { existsSync, readdirSync, statSync } from "fs";
import { join } from "path";
import type { ModelFile } from "../types.js";

export const MODEL_EXTENSION = ".gguf";

export function getModelPath(modelsDir: string, model: string): string {
  return join(modelsDir, `${model}${MODEL_EXTENSION}`);
}

// All `.gguf` files in the models directory, newest first.
export function listModels(modelsDir: string): ModelFile[] {
  if (!existsSync(modelsDir)) {
    return [];
  }

  const models: ModelFile[] = [];
  for (const file of readdirSync(modelsDir)) {
    if (!file.endsWith(MODEL_EXTENSION)) continue;

    const path = join(modelsDir, file);
    try {
      models.push({
        name: file.slice(0, -MODEL_EXTENSION.length),
        path,
        mtimeMs: statSync(path).mtimeMs,
      });
    } catch {
      // Vanished between readdir and stat.
    }
  }

  return models.sort((a, b) => b.mtimeMs - a.mtimeMs);
}

import { z } from "zod";
import type { HistoryEntry, HistoryStatus } from "../types.js";
import { readJsonFile, writeJsonAtomic } from "../utils/json-file.js";

const HistoryEntrySchema = z.object({
  name: z.string(),
  last_run: z.number(),
  status: z.enum(["exited", "interrupted", "failed"]),
  exit_code: z.number().int(),
});

// Terminal run records; the capture engine appends one per run.
export interface HistoryRecorder {
  append(model: string, status: HistoryStatus, exitCode: number): void;
}

export class HistoryStore implements HistoryRecorder {
  constructor(
    readonly path: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  load(): HistoryEntry[] {
    const raw = readJsonFile(this.path);
    if (!Array.isArray(raw)) {
      return [];
    }

    const entries: HistoryEntry[] = [];
    for (const candidate of raw) {
      const parsed = HistoryEntrySchema.safeParse(candidate);
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return entries;
  }

  // Newest first, one entry per model.
  append(model: string, status: HistoryStatus, exitCode: number): void {
    const entries = this.load().filter((entry) => entry.name !== model);
    entries.unshift({
      name: model,
      last_run: Math.floor(this.now().getTime() / 1000),
      status,
      exit_code: exitCode,
    });

    try {
      writeJsonAtomic(this.path, entries);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[llmrun] warning: could not write ${this.path}: ${reason}`);
    }
  }

  recent(limit: number): HistoryEntry[] {
    return this.load().slice(0, limit);
  }

  // Empty the history; returns how many entries were dropped.
  clear(): number {
    const count = this.load().length;
    writeJsonAtomic(this.path, []);
    return count;
  }
}

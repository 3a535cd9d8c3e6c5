import { z } from "zod";
import { STATE_SCHEMA_VERSION } from "../config/lifecycle.js";
import { readJsonFile, writeJsonAtomic } from "../utils/json-file.js";
import type { RunEntry, StateDocument } from "../types.js";

const RunEntrySchema: z.ZodType<RunEntry, z.ZodTypeDef, unknown> = z.object({
  model: z.string().min(1),
  port: z.number().int().nullable().default(null),
  pid: z.number().int().nullable().default(null),
  mode: z.enum(["foreground", "daemon"]).default("foreground"),
  log_file: z.string().optional(),
  state: z.enum(["running", "stopped"]),
  started_at: z.string(),
  stopped_at: z.string().optional(),
  exit_code: z.number().int().optional(),
});

const StateFileSchema = z.object({
  version: z.string().default(STATE_SCHEMA_VERSION),
  last_used: z.string().optional(),
  servers: z.array(z.unknown()).catch([]),
});

export function emptyState(): StateDocument {
  return { version: STATE_SCHEMA_VERSION, servers: [] };
}

// Parse a state document, dropping entries that no longer match the schema.
export function parseStateDocument(raw: unknown): StateDocument {
  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    return emptyState();
  }

  const servers: RunEntry[] = [];
  for (const candidate of parsed.data.servers) {
    const entry = RunEntrySchema.safeParse(candidate);
    if (entry.success) {
      servers.push(entry.data);
    }
  }

  const doc: StateDocument = { version: parsed.data.version, servers };
  if (parsed.data.last_used !== undefined) {
    doc.last_used = parsed.data.last_used;
  }
  return doc;
}

// The state file is a discovery aid; I/O failures are reported, never thrown.
export class StateStore {
  constructor(readonly path: string) {}

  load(): StateDocument {
    return parseStateDocument(readJsonFile(this.path));
  }

  save(doc: StateDocument): boolean {
    try {
      writeJsonAtomic(this.path, doc);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[llmrun] warning: could not write ${this.path}: ${reason}`);
      return false;
    }
  }
}

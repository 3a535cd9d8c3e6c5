import { statSync } from "fs";
import { z } from "zod";
import { readNamedArray } from "../../gguf/reader.js";
import { MODEL_INFO_SCHEMA_VERSION } from "../config/capture.js";
import { KV_CACHE_MIB_PATTERN } from "../config/patterns.js";
import { getModelInfoPath, type RuntimePaths } from "../config/paths.js";
import type {
  CapturedRunInfo,
  DerivedTuning,
  EndReason,
  KvMap,
  KvValue,
  ModelFingerprint,
  RunConfig,
} from "../types.js";
import { readJsonFile, writeJsonAtomic } from "../utils/json-file.js";
import { parseKvLines, scalarNumber, scalarString } from "./kv-parser.js";

export const TAGS_KEY = "general.tags";

export type ModelInfoStatus = "no_cache" | "gguf_missing" | "stale" | "valid";

export function getModelFingerprint(modelPath: string): ModelFingerprint | null {
  try {
    const stat = statSync(modelPath);
    return { size: stat.size, mtime: Math.floor(stat.mtimeMs / 1000) };
  } catch {
    return null;
  }
}

function contextLength(kv: KvMap): number | null {
  const arch = scalarString(kv["general.architecture"]);
  if (arch) {
    const value = scalarNumber(kv[`${arch}.context_length`]);
    if (value !== null) return value;
  }

  for (const [key, value] of Object.entries(kv)) {
    if (key.endsWith(".context_length")) {
      const num = scalarNumber(value);
      if (num !== null) return num;
    }
  }

  return null;
}

// Tuning values worth keeping next to the raw metadata.
export function deriveTuning(kv: KvMap, argv: string[], lines: string[]): DerivedTuning {
  const derived: DerivedTuning = {};

  const ctxTrain = contextLength(kv);
  if (ctxTrain !== null) {
    derived.ctx_train = ctxTrain;
  }

  for (let i = 0; i < argv.length - 1; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === "-c" || arg === "--ctx-size") {
      const parsed = Number(next);
      if (Number.isFinite(parsed)) derived.ctx_runtime = parsed;
    } else if (arg === "--cache-type-k" || arg === "-ctk") {
      derived.cache_type_k = next;
    } else if (arg === "--cache-type-v" || arg === "-ctv") {
      derived.cache_type_v = next;
    }
  }

  if (derived.ctx_train !== undefined && derived.ctx_runtime !== undefined && derived.ctx_train > 0) {
    derived.ctx_ratio = derived.ctx_runtime / derived.ctx_train;
  }

  for (const line of lines) {
    const match = line.match(KV_CACHE_MIB_PATTERN);
    if (match) {
      derived.kv_cache_mib = Number(match[1]);
      break;
    }
  }

  return derived;
}

function needsTagRecovery(value: KvValue | undefined): boolean {
  // Any omitted marker (sanitized, elided or unparsed) means the log lacked the full list.
  return value === undefined || value.kind === "omitted";
}

export type TagReader = (path: string, key: string) => string[] | null;

// Fill in `general.tags` from the GGUF header when the log only had part of it.
export function recoverTags(kv: KvMap, modelPath: string, readTags: TagReader = readNamedArray): void {
  if (!needsTagRecovery(kv[TAGS_KEY])) {
    return;
  }

  const tags = readTags(modelPath, TAGS_KEY);
  if (tags && tags.length > 0) {
    kv[TAGS_KEY] = { kind: "array", elementType: "str", items: tags };
  }
}

export interface CaptureSnapshot {
  runConfig: RunConfig;
  modelPath: string;
  lines: string[];
  endReason: EndReason | null;
  exitCode: number | null;
  capturedAt: Date;
}

/**
 * Assemble the metadata record for a run.
 *
 * Returns null when the model file cannot be stat'ed, since the record is
 * meaningless without its fingerprint.
 */
export function buildCapturedRunInfo(snapshot: CaptureSnapshot, readTags?: TagReader): CapturedRunInfo | null {
  const fingerprint = getModelFingerprint(snapshot.modelPath);
  if (!fingerprint) {
    return null;
  }

  const kv = parseKvLines(snapshot.lines);
  recoverTags(kv, snapshot.modelPath, readTags);

  const finished = snapshot.endReason !== null;
  return {
    schema_version: MODEL_INFO_SCHEMA_VERSION,
    model_name: snapshot.runConfig.model_name,
    gguf_path: snapshot.modelPath,
    gguf_size_bytes: fingerprint.size,
    gguf_mtime: fingerprint.mtime,
    captured_at: snapshot.capturedAt.toISOString(),
    llama_cpp_path: snapshot.runConfig.llama_cpp_path,
    captured_lines: [...snapshot.lines],
    kv,
    derived: deriveTuning(kv, snapshot.runConfig.argv, snapshot.lines),
    run_config: snapshot.runConfig,
    is_partial: !finished || snapshot.endReason !== "exit" || snapshot.exitCode !== 0,
    end_reason: snapshot.endReason,
    exit_code: snapshot.exitCode,
  };
}

const KvValueSchema: z.ZodType<KvValue> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("scalar"), value: z.union([z.string(), z.number(), z.boolean()]) }),
  z.object({
    kind: z.literal("array"),
    elementType: z.string(),
    items: z.array(z.union([z.string(), z.number()])),
  }),
  z.object({
    kind: z.literal("omitted"),
    elementType: z.string(),
    count: z.number(),
    reason: z.enum(["omitted", "truncated", "unparsed"]),
    raw: z.string().optional(),
  }),
]);

const CapturedRunInfoSchema: z.ZodType<CapturedRunInfo> = z.object({
  schema_version: z.number(),
  model_name: z.string(),
  gguf_path: z.string(),
  gguf_size_bytes: z.number(),
  gguf_mtime: z.number(),
  captured_at: z.string(),
  llama_cpp_path: z.string(),
  captured_lines: z.array(z.string()),
  kv: z.record(KvValueSchema),
  derived: z.object({
    ctx_train: z.number().optional(),
    ctx_runtime: z.number().optional(),
    ctx_ratio: z.number().optional(),
    cache_type_k: z.string().optional(),
    cache_type_v: z.string().optional(),
    kv_cache_mib: z.number().optional(),
  }),
  run_config: z.object({
    llama_cpp_path: z.string(),
    models_dir: z.string(),
    model_name: z.string(),
    argv: z.array(z.string()),
    extra_args: z.array(z.string()),
    host: z.string().optional(),
    port: z.number().optional(),
  }),
  is_partial: z.boolean(),
  end_reason: z.enum(["exit", "sigint", "error"]).nullable(),
  exit_code: z.number().nullable(),
});

// Where per-model run metadata lives; the capture engine writes, `info` reads.
export interface ModelInfoWriter {
  save(info: CapturedRunInfo): boolean;
}

export class ModelInfoStore implements ModelInfoWriter {
  constructor(private readonly paths: RuntimePaths) {}

  save(info: CapturedRunInfo): boolean {
    try {
      writeJsonAtomic(getModelInfoPath(this.paths, info.model_name), info);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[llmrun] warning: could not save model info for ${info.model_name}: ${reason}`);
      return false;
    }
  }

  load(model: string): { info: CapturedRunInfo | null; status: ModelInfoStatus } {
    const parsed = CapturedRunInfoSchema.safeParse(readJsonFile(getModelInfoPath(this.paths, model)));
    if (!parsed.success) {
      return { info: null, status: "no_cache" };
    }

    const info = parsed.data;
    const current = getModelFingerprint(info.gguf_path);
    if (!current) {
      return { info, status: "gguf_missing" };
    }

    if (current.size !== info.gguf_size_bytes || current.mtime !== info.gguf_mtime) {
      return { info, status: "stale" };
    }

    return { info, status: "valid" };
  }
}

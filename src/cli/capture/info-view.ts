import type { CapturedRunInfo, KvValue } from "../types.js";
import { KV_PARSE_WARNING_KEY } from "./kv-parser.js";
import type { ModelInfoStatus } from "./model-info.js";

export type InfoViewMode = "summary" | "kv" | "raw";

const KEY_METADATA = [
  "general.architecture",
  "general.name",
  "general.file_type",
  "general.quantization_version",
  "llama.context_length",
  "llama.embedding_length",
  "llama.block_count",
  "llama.rope.freq_base",
  "tokenizer.ggml.model",
];

export function formatKvValue(value: KvValue): string {
  switch (value.kind) {
    case "scalar":
      return String(value.value);
    case "array":
      return `[${value.items.map((item) => (typeof item === "string" ? JSON.stringify(item) : String(item))).join(", ")}]`;
    case "omitted":
      return `[array:${value.elementType}, count:${value.count}, ${value.reason}]`;
  }
}

function endReasonLabel(info: CapturedRunInfo): string {
  switch (info.end_reason) {
    case "sigint":
      return "interrupted by user";
    case "error":
      return "error during run";
    case "exit":
      return "non-zero exit";
    case null:
      return "run still in progress or crashed";
  }
}

function formatDate(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace("T", " ").slice(0, 19);
}

// Lines shown by `llmrun info` for a stored capture.
export function renderModelInfo(info: CapturedRunInfo, status: ModelInfoStatus, mode: InfoViewMode): string[] {
  const lines: string[] = [];

  if (status === "gguf_missing") {
    lines.push("⚠ Warning: GGUF file no longer exists", "");
  } else if (status === "stale") {
    lines.push("⚠ Warning: Cache is stale (GGUF has been modified)");
    lines.push("Run the model again to refresh cache:", `  llmrun ${info.model_name}`, "");
  }

  if (info.is_partial) {
    lines.push(`⚠ Note: Partial capture (${endReasonLabel(info)}, exit code: ${info.exit_code ?? "unknown"})`, "");
  }

  const warning = info.kv[KV_PARSE_WARNING_KEY];
  if (warning) {
    lines.push(`⚠ KV Parse Warning: ${formatKvValue(warning)}`, "");
  }

  if (mode === "raw") {
    lines.push(...info.captured_lines);
    return lines;
  }

  if (mode === "kv") {
    lines.push("Structured Model Metadata (KV):", "");
    const keys = Object.keys(info.kv).sort();
    if (keys.length === 0) {
      lines.push("  (no structured KV data)");
    }
    for (const key of keys) {
      lines.push(`  ${key}: ${formatKvValue(info.kv[key])}`);
    }
    return lines;
  }

  lines.push(`Model Info: ${info.model_name}`, "");
  lines.push(`GGUF Path: ${info.gguf_path}`);
  lines.push(`GGUF Size: ${info.gguf_size_bytes} bytes`);
  lines.push(`GGUF Modified: ${formatDate(info.gguf_mtime)}`);
  lines.push(`Info Captured: ${info.captured_at}`);
  lines.push(`llama.cpp: ${info.llama_cpp_path}`);
  if (info.exit_code !== null) lines.push(`Exit Code: ${info.exit_code}`);
  if (info.end_reason !== null) lines.push(`End Reason: ${info.end_reason}`);
  lines.push("");

  lines.push("Run Configuration:");
  if (info.run_config.host) lines.push(`  Host: ${info.run_config.host}`);
  if (info.run_config.port !== undefined) lines.push(`  Port: ${info.run_config.port}`);
  lines.push(`  Command: ${info.run_config.argv.join(" ")}`, "");

  const present = KEY_METADATA.filter((key) => info.kv[key] !== undefined);
  if (present.length > 0) {
    lines.push("Key Metadata:");
    for (const key of present) {
      lines.push(`  ${key}: ${formatKvValue(info.kv[key])}`);
    }
    lines.push("");
  }

  const derived = info.derived;
  const derivedLines: string[] = [];
  if (derived.ctx_train !== undefined) derivedLines.push(`  Training context: ${derived.ctx_train}`);
  if (derived.ctx_runtime !== undefined) derivedLines.push(`  Runtime context: ${derived.ctx_runtime}`);
  if (derived.ctx_ratio !== undefined) derivedLines.push(`  Context ratio: ${derived.ctx_ratio.toFixed(2)}`);
  if (derived.cache_type_k !== undefined) derivedLines.push(`  Cache type K: ${derived.cache_type_k}`);
  if (derived.cache_type_v !== undefined) derivedLines.push(`  Cache type V: ${derived.cache_type_v}`);
  if (derived.kv_cache_mib !== undefined) derivedLines.push(`  KV cache memory: ${derived.kv_cache_mib} MiB`);
  if (derivedLines.length > 0) {
    lines.push("Derived (for tuning):", ...derivedLines, "");
  }

  lines.push(`Captured Metadata (${info.captured_lines.length} lines):`, "---");
  lines.push(...info.captured_lines);
  lines.push("");
  lines.push(`Use 'llmrun info ${info.model_name} --kv' to see all structured metadata`);
  lines.push(`Use 'llmrun info ${info.model_name} --raw' to see raw captured output`);
  return lines;
}

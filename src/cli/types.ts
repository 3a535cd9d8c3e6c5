// Shapes persisted by the CLI and read back by `status`, `info` and the MCP tools.

export type RunMode = "foreground" | "daemon";
export type RunState = "running" | "stopped";

// One tracked server; the state file keeps at most one entry per model.
export interface RunEntry {
  model: string;
  port: number | null;
  pid: number | null;
  mode: RunMode;
  log_file?: string;
  state: RunState;
  started_at: string;
  stopped_at?: string;
  exit_code?: number;
}

export interface StateDocument {
  version: string;
  last_used?: string;
  servers: RunEntry[];
}

export type KvScalar = string | number | boolean;

// Structured value parsed from a `llama_model_loader: - kv` line.
export type KvValue =
  | { kind: "scalar"; value: KvScalar }
  | { kind: "array"; elementType: string; items: Array<string | number> }
  | {
      kind: "omitted";
      elementType: string;
      count: number;
      reason: "omitted" | "truncated" | "unparsed";
      raw?: string;
    };

export type KvMap = Record<string, KvValue>;

export interface DerivedTuning {
  ctx_train?: number;
  ctx_runtime?: number;
  ctx_ratio?: number;
  cache_type_k?: string;
  cache_type_v?: string;
  kv_cache_mib?: number;
}

// How a run was launched, kept with its captured metadata.
export interface RunConfig {
  llama_cpp_path: string;
  models_dir: string;
  model_name: string;
  argv: string[];
  extra_args: string[];
  host?: string;
  port?: number;
}

export type EndReason = "exit" | "sigint" | "error";

export interface ModelFingerprint {
  size: number;
  mtime: number;
}

export interface CapturedRunInfo {
  schema_version: number;
  model_name: string;
  gguf_path: string;
  gguf_size_bytes: number;
  gguf_mtime: number;
  captured_at: string;
  llama_cpp_path: string;
  captured_lines: string[];
  kv: KvMap;
  derived: DerivedTuning;
  run_config: RunConfig;
  is_partial: boolean;
  // Null while the run is still streaming (interim write).
  end_reason: EndReason | null;
  exit_code: number | null;
}

export type HistoryStatus = "exited" | "interrupted" | "failed";

export interface HistoryEntry {
  name: string;
  last_run: number;
  status: HistoryStatus;
  exit_code: number;
}

// A `.gguf` file found in the models directory.
export interface ModelFile {
  name: string;
  path: string;
  mtimeMs: number;
}

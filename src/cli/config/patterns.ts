// Diagnostic patterns used by run capture.

// Line prefixes llama.cpp uses for loader, context, cache and system info.
export const CAPTURE_PREFIXES = [
  "llama_model_loader:",
  "llama_model_load:",
  "llama_new_context_with_model:",
  "llama_kv_cache",
  "ggml_metal_",
  "gguf_",
  "system_info:",
  "main: ",
];

// Memory and timing lines carry no stable prefix.
export const CAPTURE_SUBSTRINGS = ["load time", " mem ", "memory"];

// `... general.tags arr[str,12] = ["a", "b", ...]`
export const ARRAY_LINE_PATTERN = /^(.*?)([\w.]+)\s+arr\[([^,\]]+),(\d+)\]\s*=\s*(.*)$/;

// `llama_model_loader: - kv  12:  general.name  str  = Mistral`
export const KV_LINE_PATTERNS = [
  /^llama_model_loader:\s*-?\s*kv\s+\d+:\s*([\w.-]+)\s+([\w[\],]+)\s*=\s*(.+)$/,
  /^llama_model_loader:\s*-?\s*kv\s*:\s*([\w.-]+)\s+([\w[\],]+)\s*=\s*(.+)$/,
];

export const CONTEXT_LENGTH_KEY_PATTERN = /([\w.-]+\.context_length)\b/;

export const KV_CACHE_MIB_PATTERN = /llama_kv_cache.*\s(\d+(?:\.\d+)?)\s*MiB/;

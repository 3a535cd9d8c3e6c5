import { describe, it, expect } from "vitest";
import type { CapturedRunInfo } from "../../types.js";
import { formatKvValue, renderModelInfo } from "../info-view.js";

function sampleInfo(overrides: Partial<CapturedRunInfo> = {}): CapturedRunInfo {
  return {
    schema_version: 1,
    model_name: "tiny",
    gguf_path: "/models/tiny.gguf",
    gguf_size_bytes: 1024,
    gguf_mtime: 1767225600,
    captured_at: "2026-01-01T00:00:00.000Z",
    llama_cpp_path: "/opt/llama/llama-server",
    captured_lines: ["system_info: n_threads = 8"],
    kv: {
      "general.name": { kind: "scalar", value: "Tiny" },
      "general.architecture": { kind: "scalar", value: "llama" },
    },
    derived: { ctx_train: 4096, ctx_runtime: 2048, ctx_ratio: 0.5 },
    run_config: {
      llama_cpp_path: "/opt/llama/llama-server",
      models_dir: "/models",
      model_name: "tiny",
      argv: ["/opt/llama/llama-server", "-m", "/models/tiny.gguf", "--port", "8080"],
      extra_args: [],
      port: 8080,
    },
    is_partial: false,
    end_reason: "exit",
    exit_code: 0,
    ...overrides,
  };
}

describe("info view", () => {
  describe("formatKvValue", () => {
    it("should format each kind of value", () => {
      expect(formatKvValue({ kind: "scalar", value: 4096 })).toBe("4096");
      expect(formatKvValue({ kind: "array", elementType: "str", items: ["a", "b"] })).toBe('["a", "b"]');
      expect(formatKvValue({ kind: "array", elementType: "i32", items: [1, 2] })).toBe("[1, 2]");
      expect(formatKvValue({ kind: "omitted", elementType: "str", count: 32000, reason: "truncated" })).toBe(
        "[array:str, count:32000, truncated]"
      );
    });
  });

  describe("renderModelInfo", () => {
    it("should print only the captured lines in raw mode", () => {
      expect(renderModelInfo(sampleInfo(), "valid", "raw")).toEqual(["system_info: n_threads = 8"]);
    });

    it("should lead with the stale warning", () => {
      expect(renderModelInfo(sampleInfo(), "stale", "raw")).toEqual([
        "⚠ Warning: Cache is stale (GGUF has been modified)",
        "Run the model again to refresh cache:",
        "  llmrun tiny",
        "",
        "system_info: n_threads = 8",
      ]);
    });

    it("should note an interim capture", () => {
      const lines = renderModelInfo(sampleInfo({ is_partial: true, end_reason: null, exit_code: null }), "valid", "raw");
      expect(lines[0]).toBe("⚠ Note: Partial capture (run still in progress or crashed, exit code: unknown)");
    });

    it("should list kv keys in sorted order", () => {
      expect(renderModelInfo(sampleInfo(), "valid", "kv")).toEqual([
        "Structured Model Metadata (KV):",
        "",
        "  general.architecture: llama",
        "  general.name: Tiny",
      ]);
    });

    it("should show key metadata and derived values in the summary", () => {
      const lines = renderModelInfo(sampleInfo(), "valid", "summary");

      expect(lines[0]).toBe("Model Info: tiny");
      expect(lines).toContain("GGUF Modified: 2026-01-01 00:00:00");
      expect(lines).toContain("  Port: 8080");
      expect(lines).toContain("  general.architecture: llama");
      expect(lines).toContain("  Context ratio: 0.50");
      expect(lines).toContain("Captured Metadata (1 lines):");
    });
  });
});

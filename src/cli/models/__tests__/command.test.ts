import { describe, it, expect, afterEach, vi } from "vitest";
import type { Settings } from "../../config/settings.js";
import { buildRunConfig, buildServerArgv, findMatchingOverride } from "../command.js";

const settings: Settings = {
  llama_cpp_path: "/opt/llama/llama-server",
  models_dir: "/models",
  default_params: ["-c 4096", "--host 127.0.0.1", "--port 8080"],
  model_overrides: { "^qwen": ["-c 32768", "--port 9000"] },
  recent_models_count: 7,
  cmake_options: [],
};

describe("server command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("findMatchingOverride", () => {
    it("should return the params of the first matching pattern", () => {
      expect(findMatchingOverride("qwen2-7b", { "^qwen": ["-c 1"], qwen: ["-c 2"] })).toEqual(["-c 1"]);
      expect(findMatchingOverride("mistral", { "^qwen": ["-c 1"] })).toBeNull();
    });

    it("should skip invalid patterns with a warning", () => {
      const warn = vi.spyOn(console, "error").mockImplementation(() => {});
      expect(findMatchingOverride("mistral", { "(": ["-c 1"], mis: ["-c 2"] })).toEqual(["-c 2"]);
      expect(warn).toHaveBeenCalledWith("[llmrun] warning: ignoring invalid model_overrides pattern: (");
    });
  });

  describe("buildServerArgv", () => {
    it("should order binary, model, defaults, override, then caller args", () => {
      expect(buildServerArgv(settings, "qwen2-7b", ["--port", "9100"])).toEqual([
        "/opt/llama/llama-server",
        "-m",
        "/models/qwen2-7b.gguf",
        "-c",
        "4096",
        "--host",
        "127.0.0.1",
        "--port",
        "8080",
        "-c",
        "32768",
        "--port",
        "9000",
        "--port",
        "9100",
      ]);
    });
  });

  describe("buildRunConfig", () => {
    it("should take host and port from the last occurrence", () => {
      const runConfig = buildRunConfig(settings, "qwen2-7b", ["--port", "9100"]);
      expect(runConfig.host).toBe("127.0.0.1");
      expect(runConfig.port).toBe(9100);
      expect(runConfig.extra_args).toEqual(["--port", "9100"]);
      expect(runConfig.model_name).toBe("qwen2-7b");
    });

    it("should leave the port unset when no flag gives one", () => {
      const bare: Settings = { ...settings, default_params: [], model_overrides: {} };
      expect(buildRunConfig(bare, "tiny", []).port).toBeUndefined();
    });
  });
});

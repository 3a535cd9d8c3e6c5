import { existsSync, readFileSync, writeFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { ensureDir, expandHome, type RuntimePaths } from "./paths.js";

export const SettingsSchema = z.object({
  llama_cpp_path: z.string().min(1),
  models_dir: z.string().min(1),
  // Each entry may hold several space-separated flags, e.g. "-c 4096".
  default_params: z.array(z.string()).default([]),
  // Keys are regular expressions tested against the model name.
  model_overrides: z.record(z.array(z.string())).default({}),
  recent_models_count: z.number().int().positive().default(7),
  // Checkout that `llmrun rebuild` configures and builds with cmake.
  llama_cpp_source_dir: z.string().min(1).optional(),
  cmake_options: z.array(z.string()).default([]),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  llama_cpp_path: "/usr/local/bin/llama-server",
  models_dir: "~/models",
  default_params: ["-c 4096", "--host 127.0.0.1", "--port 8080"],
  model_overrides: {},
  recent_models_count: 7,
  cmake_options: [],
};

// Load config.json, writing the defaults on first use.
export function loadSettings(paths: RuntimePaths): Settings {
  if (!existsSync(paths.configFile)) {
    ensureDir(paths.configDir);
    writeFileSync(paths.configFile, JSON.stringify(DEFAULT_SETTINGS, null, 2));
    console.error(`[llmrun] Created default config at ${paths.configFile}`);
    return withExpandedPaths(DEFAULT_SETTINGS);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(paths.configFile, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${paths.configFile}: ${errorMessage(error)}`);
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${paths.configFile}: ${issues}`);
  }

  return withExpandedPaths(parsed.data);
}

function withExpandedPaths(settings: Settings): Settings {
  const expanded: Settings = {
    ...settings,
    llama_cpp_path: expandHome(settings.llama_cpp_path),
    models_dir: expandHome(settings.models_dir),
  };
  if (settings.llama_cpp_source_dir !== undefined) {
    expanded.llama_cpp_source_dir = expandHome(settings.llama_cpp_source_dir);
  }
  return expanded;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

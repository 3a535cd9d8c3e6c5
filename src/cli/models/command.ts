import type { Settings } from "../config/settings.js";
import type { RunConfig } from "../types.js";
import { getModelPath } from "./catalog.js";

// Config entries may bundle several flags: "-c 4096" becomes ["-c", "4096"].
export function splitParams(params: string[]): string[] {
  return params.flatMap((param) => param.split(/\s+/).filter((part) => part.length > 0));
}

// First override whose pattern matches the model name.
export function findMatchingOverride(model: string, overrides: Record<string, string[]>): string[] | null {
  for (const [pattern, params] of Object.entries(overrides)) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch {
      console.error(`[llmrun] warning: ignoring invalid model_overrides pattern: ${pattern}`);
      continue;
    }

    if (regex.test(model)) {
      return params;
    }
  }

  return null;
}

// Later flags win on the server side, so caller args go last.
export function buildServerArgv(settings: Settings, model: string, extraArgs: string[]): string[] {
  const argv = [settings.llama_cpp_path, "-m", getModelPath(settings.models_dir, model)];

  argv.push(...splitParams(settings.default_params));

  const override = findMatchingOverride(model, settings.model_overrides);
  if (override) {
    argv.push(...splitParams(override));
  }

  argv.push(...extraArgs);
  return argv;
}

export function buildRunConfig(settings: Settings, model: string, extraArgs: string[]): RunConfig {
  const argv = buildServerArgv(settings, model, extraArgs);
  const runConfig: RunConfig = {
    llama_cpp_path: settings.llama_cpp_path,
    models_dir: settings.models_dir,
    model_name: model,
    argv,
    extra_args: [...extraArgs],
  };

  for (let i = 0; i < argv.length - 1; i++) {
    if (argv[i] === "--host") {
      runConfig.host = argv[i + 1];
    } else if (argv[i] === "--port") {
      const port = parseInt(argv[i + 1], 10);
      if (Number.isInteger(port)) runConfig.port = port;
    }
  }

  return runConfig;
}

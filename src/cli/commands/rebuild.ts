import { spawnSync } from "child_process";
import { statSync } from "fs";
import { signalExitCode } from "../capture/server-process.js";
import { loadSettings, type Settings } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { ConfigError, LlmrunError } from "../errors.js";
import { splitParams } from "../models/command.js";
import { quoteShellCommand } from "../utils/shell.js";

// Runs one build step in `cwd` and returns its exit code.
export type StepRunner = (argv: string[], cwd: string) => number;

export function buildRebuildSteps(cmakeOptions: string[]): string[][] {
  return [
    ["cmake", "-B", "build", ...splitParams(cmakeOptions)],
    ["cmake", "--build", "build", "--config", "Release"],
  ];
}

function runInherited(argv: string[], cwd: string): number {
  const result = spawnSync(argv[0], argv.slice(1), { cwd, stdio: "inherit" });
  if (result.error) {
    throw new LlmrunError(`Could not run ${argv[0]}: ${result.error.message}`);
  }
  return result.status ?? signalExitCode(result.signal);
}

/**
 * Configure and build the llama.cpp checkout named by `llama_cpp_source_dir`.
 *
 * Returns 0 on success, or the exit code of the first step that failed.
 */
export function rebuildLlamaCpp(settings: Settings, run: StepRunner = runInherited): number {
  const sourceDir = settings.llama_cpp_source_dir;
  if (sourceDir === undefined) {
    throw new ConfigError("llama_cpp_source_dir not set in config");
  }

  let isDir: boolean;
  try {
    isDir = statSync(sourceDir).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new ConfigError(`llama.cpp source directory not found: ${sourceDir}`);
  }

  console.log("Rebuilding llama.cpp...");
  console.log(`Source: ${sourceDir}`);

  const [configure, build] = buildRebuildSteps(settings.cmake_options);
  const steps = [
    { argv: configure, label: "cmake" },
    { argv: build, label: "build" },
  ];

  for (const step of steps) {
    console.log("");
    console.log(`Running: ${quoteShellCommand(step.argv)}`);
    const code = run(step.argv, sourceDir);
    if (code !== 0) {
      console.error(`Error: ${step.label} failed (exit code ${code})`);
      return code;
    }
  }

  console.log("");
  console.log("✓ Build complete");
  return 0;
}

// `llmrun rebuild`
export function rebuildCommand(ctx: CliContext): void {
  const code = rebuildLlamaCpp(loadSettings(ctx.paths));
  if (code !== 0) {
    process.exit(code);
  }
}

import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";

// Every file llmrun reads or writes, resolved once from the environment.
export interface RuntimePaths {
  configDir: string;
  configFile: string;
  historyFile: string;
  modelInfoDir: string;
  cacheDir: string;
  stateFile: string;
  pidDir: string;
  logDir: string;
}

type PathEnv = Partial<Record<"HOME" | "XDG_CONFIG_HOME" | "XDG_CACHE_HOME", string>>;

export function resolveRuntimePaths(env: PathEnv = process.env): RuntimePaths {
  const home = env.HOME || homedir();
  const configDir = join(env.XDG_CONFIG_HOME || join(home, ".config"), "llmrun");
  const cacheDir = join(env.XDG_CACHE_HOME || join(home, ".cache"), "llmrun");

  return {
    configDir,
    configFile: join(configDir, "config.json"),
    historyFile: join(configDir, "history.json"),
    modelInfoDir: join(configDir, "model_info"),
    cacheDir,
    stateFile: join(cacheDir, "state.json"),
    pidDir: join(cacheDir, "pids"),
    logDir: join(cacheDir, "logs"),
  };
}

// Model names become file names; keep them to a portable character set.
export function safeFilename(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "_");
}

export function getPidFilePath(paths: RuntimePaths, model: string): string {
  return join(paths.pidDir, `${safeFilename(model)}.pid`);
}

export function getLogFilePath(paths: RuntimePaths, model: string): string {
  return join(paths.logDir, `${safeFilename(model)}.log`);
}

export function getModelInfoPath(paths: RuntimePaths, model: string): string {
  return join(paths.modelInfoDir, `${safeFilename(model)}.json`);
}

// Create a directory (and parents) if it does not exist yet.
export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

// Expand a leading `~` the way a shell would.
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }

  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }

  return path;
}

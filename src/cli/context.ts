import { resolveRuntimePaths, type RuntimePaths } from "./config/paths.js";
import { ServerManager } from "./server/lifecycle.js";

// Shared per-invocation services handed to every command.
export interface CliContext {
  paths: RuntimePaths;
  manager: ServerManager;
}

export function createCliContext(paths: RuntimePaths = resolveRuntimePaths()): CliContext {
  return { paths, manager: new ServerManager({ paths }) };
}

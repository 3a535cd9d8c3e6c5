import { existsSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import { LAUNCH_SETTLE_MS, STOP_GRACE_MS } from "../config/lifecycle.js";
import { ensureDir, getLogFilePath, getPidFilePath, type RuntimePaths } from "../config/paths.js";
import { LaunchConflictError, SignalResolutionError, SpawnFailureError } from "../errors.js";
import type { RunEntry, RunMode, StateDocument } from "../types.js";
import { nodeProcessControl, type ProcessControl } from "./process-control.js";
import { StateStore } from "./state-store.js";

export interface ServerManagerOptions {
  paths: RuntimePaths;
  control?: ProcessControl;
  now?: () => Date;
}

export interface LaunchResult {
  pid: number | null;
  logPath: string;
}

export type PidSource = "pid-file" | "state" | "port";

export type StopResult =
  | { ok: true; model: string; pid: number; source: PidSource; forced: boolean }
  | { ok: false; model: string; error: SignalResolutionError };

export interface StopAllResult {
  stopped: number;
  failures: Array<{ model: string; error: Error }>;
}

/**
 * Owns every transition of the state file: running, PID patches, stopped.
 *
 * Other components read state through {@link ServerManager.getState}; only
 * this class writes it.
 */
export class ServerManager {
  readonly paths: RuntimePaths;
  private readonly store: StateStore;
  private readonly control: ProcessControl;
  private readonly now: () => Date;

  constructor(options: ServerManagerOptions) {
    this.paths = options.paths;
    this.store = new StateStore(options.paths.stateFile);
    this.control = options.control ?? nodeProcessControl;
    this.now = options.now ?? (() => new Date());
  }

  getState(): StateDocument {
    return this.store.load();
  }

  markRunning(model: string, port: number | null, mode: RunMode): RunEntry {
    const doc = this.store.load();
    doc.servers = doc.servers.filter((entry) => entry.model !== model);

    const entry: RunEntry = {
      model,
      port,
      pid: null,
      mode,
      state: "running",
      started_at: this.timestamp(),
    };
    if (mode === "daemon") {
      entry.log_file = getLogFilePath(this.paths, model);
    }

    doc.servers.unshift(entry);
    doc.last_used = model;
    this.store.save(doc);
    return entry;
  }

  updatePid(model: string, pid: number): void {
    const doc = this.store.load();
    const entry = doc.servers.find((candidate) => candidate.model === model && candidate.state === "running");
    if (!entry) {
      return;
    }

    entry.pid = pid;
    this.store.save(doc);
  }

  // One best-effort lookup of whatever is listening on the server's port.
  tryUpdatePid(model: string, port: number | null): number | null {
    if (port === null) {
      return null;
    }

    const pid = this.control.findPidByPort(port);
    if (pid !== null) {
      this.updatePid(model, pid);
    }
    return pid;
  }

  markStopped(model: string, exitCode: number): void {
    const doc = this.store.load();
    const entry = doc.servers.find((candidate) => candidate.model === model && candidate.state === "running");
    if (!entry) {
      return;
    }

    entry.state = "stopped";
    entry.stopped_at = this.timestamp();
    entry.exit_code = exitCode;
    this.store.save(doc);
  }

  isRunning(model: string): RunEntry | null {
    const doc = this.store.load();
    return doc.servers.find((entry) => entry.model === model && entry.state === "running") ?? null;
  }

  runningEntries(): RunEntry[] {
    return this.store.load().servers.filter((entry) => entry.state === "running");
  }

  async launchDetached(model: string, argv: string[], port: number | null): Promise<LaunchResult> {
    const existing = this.isRunning(model);
    if (existing) {
      throw new LaunchConflictError(model, existing.pid, existing.port);
    }

    const logPath = getLogFilePath(this.paths, model);
    const pidPath = getPidFilePath(this.paths, model);
    ensureDir(this.paths.logDir);
    ensureDir(this.paths.pidDir);
    writeFileSync(logPath, "");
    removeFile(pidPath);

    // Record before spawning so a crash in between still leaves a discoverable entry.
    this.markRunning(model, port, "daemon");

    try {
      await this.control.spawnDetached(argv, logPath, pidPath);
    } catch (error) {
      this.markStopped(model, 1);
      throw new SpawnFailureError(model, error instanceof Error ? error.message : String(error));
    }

    await this.control.sleep(LAUNCH_SETTLE_MS);

    const pid = readPidFile(pidPath);
    if (pid !== null) {
      this.updatePid(model, pid);
    }

    return { pid, logPath };
  }

  async stopOne(entry: RunEntry): Promise<StopResult> {
    const pidPath = getPidFilePath(this.paths, entry.model);
    const resolved = this.resolvePid(entry, pidPath);

    if (!resolved) {
      this.markStopped(entry.model, 0);
      return { ok: false, model: entry.model, error: new SignalResolutionError(entry.model) };
    }

    const { pid, source } = resolved;
    let forced = false;

    this.control.signal(pid, "SIGTERM");
    await this.control.sleep(STOP_GRACE_MS);

    if (this.control.isAlive(pid)) {
      console.error(`[llmrun] ${entry.model} did not exit after SIGTERM; sending SIGKILL`);
      this.control.signal(pid, "SIGKILL");
      forced = true;
    }

    removeFile(pidPath);
    this.markStopped(entry.model, 0);
    return { ok: true, model: entry.model, pid, source, forced };
  }

  async stopAll(): Promise<StopAllResult> {
    const result: StopAllResult = { stopped: 0, failures: [] };

    for (const entry of this.runningEntries()) {
      try {
        const outcome = await this.stopOne(entry);
        if (outcome.ok) {
          result.stopped++;
        } else {
          result.failures.push({ model: outcome.model, error: outcome.error });
        }
      } catch (error) {
        result.failures.push({
          model: entry.model,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    return result;
  }

  // PID file first, then the recorded PID, then whoever holds the port.
  private resolvePid(entry: RunEntry, pidPath: string): { pid: number; source: PidSource } | null {
    const fromFile = readPidFile(pidPath);
    if (fromFile !== null) {
      return { pid: fromFile, source: "pid-file" };
    }

    if (entry.pid !== null) {
      return { pid: entry.pid, source: "state" };
    }

    if (entry.port !== null) {
      const fromPort = this.control.findPidByPort(entry.port);
      if (fromPort !== null) {
        return { pid: fromPort, source: "port" };
      }
    }

    return null;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

export function readPidFile(pidPath: string): number | null {
  if (!existsSync(pidPath)) {
    return null;
  }

  try {
    const pid = parseInt(readFileSync(pidPath, "utf-8").trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

function removeFile(path: string): void {
  try {
    unlinkSync(path);
  } catch {
    // Already gone.
  }
}

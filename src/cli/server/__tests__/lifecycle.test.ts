import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { getLogFilePath, getPidFilePath, resolveRuntimePaths, type RuntimePaths } from "../../config/paths.js";
import { LaunchConflictError, SignalResolutionError, SpawnFailureError } from "../../errors.js";
import { ServerManager } from "../lifecycle.js";
import type { ProcessControl } from "../process-control.js";

interface FakeControl extends ProcessControl {
  signals: Array<{ pid: number; signal: NodeJS.Signals }>;
  spawned: string[][];
  alive: Set<number>;
  portPids: Map<number, number>;
  portLookups: number;
}

function createFakeControl(onSpawn?: (argv: string[], logPath: string, pidPath: string) => void): FakeControl {
  const control: FakeControl = {
    signals: [],
    spawned: [],
    alive: new Set(),
    portPids: new Map(),
    portLookups: 0,

    isAlive(pid) {
      return control.alive.has(pid);
    },

    findPidByPort(port) {
      control.portLookups++;
      return control.portPids.get(port) ?? null;
    },

    signal(pid, signal) {
      control.signals.push({ pid, signal });
      return true;
    },

    async spawnDetached(argv, logPath, pidPath) {
      control.spawned.push(argv);
      onSpawn?.(argv, logPath, pidPath);
    },

    async sleep() {},
  };
  return control;
}

describe("ServerManager", () => {
  let tempDir: string;
  let paths: RuntimePaths;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "llmrun-lifecycle-"));
    paths = resolveRuntimePaths({ HOME: tempDir });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createManager(control: ProcessControl = createFakeControl()): ServerManager {
    let tick = 0;
    // Each timestamp one second after the last.
    const now = (): Date => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
    return new ServerManager({ paths, control, now });
  }

  describe("markRunning", () => {
    it("should keep a single entry per model", () => {
      const manager = createManager();
      manager.markRunning("mistral-7b", 9000, "daemon");
      manager.markRunning("mistral-7b", 9001, "daemon");

      const servers = manager.getState().servers;
      expect(servers).toHaveLength(1);
      expect(servers[0].port).toBe(9001);
      expect(servers[0].state).toBe("running");
    });

    it("should put the newest entry first and record last_used", () => {
      const manager = createManager();
      manager.markRunning("alpha", 8080, "foreground");
      manager.markRunning("beta", 8081, "foreground");

      const state = manager.getState();
      expect(state.servers.map((entry) => entry.model)).toEqual(["beta", "alpha"]);
      expect(state.last_used).toBe("beta");
    });

    it("should record the log file for daemon entries only", () => {
      const manager = createManager();
      manager.markRunning("alpha", 8080, "daemon");
      manager.markRunning("beta", 8081, "foreground");

      expect(manager.isRunning("alpha")?.log_file).toBe(getLogFilePath(paths, "alpha"));
      expect(manager.isRunning("beta")?.log_file).toBeUndefined();
    });

    it("should write the state file under the cache directory", () => {
      const manager = createManager();
      manager.markRunning("alpha", null, "foreground");

      const raw = JSON.parse(readFileSync(paths.stateFile, "utf-8"));
      expect(raw.version).toBe("1.0");
      expect(raw.servers[0]).toEqual({
        model: "alpha",
        port: null,
        pid: null,
        mode: "foreground",
        state: "running",
        started_at: "2026-01-01T00:00:00.000Z",
      });
    });
  });

  describe("updatePid and markStopped", () => {
    it("should patch the PID of the running entry", () => {
      const manager = createManager();
      manager.markRunning("alpha", 8080, "foreground");
      manager.updatePid("alpha", 4321);

      expect(manager.isRunning("alpha")?.pid).toBe(4321);
    });

    it("should ignore models with no running entry", () => {
      const manager = createManager();
      manager.updatePid("ghost", 1);
      manager.markStopped("ghost", 0);

      expect(manager.getState().servers).toEqual([]);
    });

    it("should mark the entry stopped with its exit code", () => {
      const manager = createManager();
      manager.markRunning("alpha", 8080, "foreground");
      manager.markStopped("alpha", 3);

      const entry = manager.getState().servers[0];
      expect(entry.state).toBe("stopped");
      expect(entry.exit_code).toBe(3);
      expect(entry.stopped_at).toBe("2026-01-01T00:00:01.000Z");
      expect(manager.isRunning("alpha")).toBeNull();
    });

    it("should look up the PID by port once per call", () => {
      const control = createFakeControl();
      control.portPids.set(8080, 999);
      const manager = createManager(control);
      manager.markRunning("alpha", 8080, "foreground");

      expect(manager.tryUpdatePid("alpha", 8080)).toBe(999);
      expect(manager.tryUpdatePid("alpha", null)).toBeNull();
      expect(control.portLookups).toBe(1);
      expect(manager.isRunning("alpha")?.pid).toBe(999);
    });
  });

  describe("launchDetached", () => {
    it("should spawn the server and record the PID from the pid file", async () => {
      const control = createFakeControl((_argv, _logPath, pidPath) => writeFileSync(pidPath, "777\n"));
      const manager = createManager(control);

      const result = await manager.launchDetached("alpha", ["/opt/llama-server", "-m", "/m/alpha.gguf"], 8080);

      expect(result).toEqual({ pid: 777, logPath: getLogFilePath(paths, "alpha") });
      expect(control.spawned).toEqual([["/opt/llama-server", "-m", "/m/alpha.gguf"]]);
      expect(existsSync(result.logPath)).toBe(true);

      const entry = manager.isRunning("alpha");
      expect(entry?.pid).toBe(777);
      expect(entry?.mode).toBe("daemon");
      expect(entry?.port).toBe(8080);
    });

    it("should show the log file in the JSON status of a daemon entry", async () => {
      const manager = createManager();
      await manager.launchDetached("alpha", ["/opt/llama-server"], 9000);

      const state = manager.getState();
      expect(state.servers[0].log_file).toBe(getLogFilePath(paths, "alpha"));
      expect(state.servers[0].pid).toBeNull();
    });

    it("should refuse a second launch without spawning or touching state", async () => {
      const control = createFakeControl();
      const manager = createManager(control);
      manager.markRunning("alpha", 8080, "daemon");
      manager.updatePid("alpha", 55);
      const before = manager.getState();

      await expect(manager.launchDetached("alpha", ["/opt/llama-server"], 8080)).rejects.toBeInstanceOf(
        LaunchConflictError
      );
      await expect(manager.launchDetached("alpha", ["/opt/llama-server"], 8080)).rejects.toThrow(
        "alpha is already running (port 8080, pid 55). Stop it first with: llmrun stop alpha"
      );

      expect(control.spawned).toEqual([]);
      expect(manager.getState()).toEqual(before);
    });

    it("should mark the entry stopped when the spawn fails", async () => {
      const control = createFakeControl(() => {
        throw new Error("sh: not found");
      });
      const manager = createManager(control);

      await expect(manager.launchDetached("alpha", ["/opt/llama-server"], 8080)).rejects.toBeInstanceOf(
        SpawnFailureError
      );

      const entry = manager.getState().servers[0];
      expect(entry.state).toBe("stopped");
      expect(entry.exit_code).toBe(1);
    });
  });

  describe("stopOne", () => {
    it("should mark the entry stopped even when no PID can be found", async () => {
      const control = createFakeControl();
      const manager = createManager(control);
      const entry = manager.markRunning("alpha", null, "foreground");

      const result = await manager.stopOne(entry);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SignalResolutionError);
      }
      expect(control.signals).toEqual([]);
      expect(manager.isRunning("alpha")).toBeNull();
      expect(manager.getState().servers[0].exit_code).toBe(0);
    });

    it("should prefer the pid file over the recorded PID and the port", async () => {
      const control = createFakeControl();
      control.portPids.set(8080, 333);
      const manager = createManager(control);
      manager.markRunning("alpha", 8080, "daemon");
      manager.updatePid("alpha", 222);
      mkdirSync(paths.pidDir, { recursive: true });
      writeFileSync(getPidFilePath(paths, "alpha"), "111");

      const entry = manager.isRunning("alpha");
      expect(entry).not.toBeNull();
      if (!entry) return;

      const result = await manager.stopOne(entry);

      expect(result).toEqual({ ok: true, model: "alpha", pid: 111, source: "pid-file", forced: false });
      expect(control.signals).toEqual([{ pid: 111, signal: "SIGTERM" }]);
      expect(existsSync(getPidFilePath(paths, "alpha"))).toBe(false);
    });

    it("should fall back to the recorded PID, then to the port", async () => {
      const control = createFakeControl();
      control.portPids.set(8081, 333);
      const manager = createManager(control);

      const withPid = manager.markRunning("alpha", 8080, "foreground");
      const fromState = await manager.stopOne({ ...withPid, pid: 222 });
      expect(fromState.ok && fromState.source).toBe("state");

      const withPort = manager.markRunning("beta", 8081, "foreground");
      const fromPort = await manager.stopOne(withPort);
      expect(fromPort.ok && fromPort.pid).toBe(333);
      expect(fromPort.ok && fromPort.source).toBe("port");
    });

    it("should escalate to SIGKILL when the process survives the grace period", async () => {
      const control = createFakeControl();
      control.alive.add(222);
      const manager = createManager(control);
      const entry = manager.markRunning("alpha", 8080, "foreground");

      const result = await manager.stopOne({ ...entry, pid: 222 });

      expect(result.ok && result.forced).toBe(true);
      expect(control.signals).toEqual([
        { pid: 222, signal: "SIGTERM" },
        { pid: 222, signal: "SIGKILL" },
      ]);
      expect(manager.isRunning("alpha")).toBeNull();
    });
  });

  describe("stopAll", () => {
    it("should stop every running entry and report the ones without a PID", async () => {
      const control = createFakeControl();
      const manager = createManager(control);
      manager.markRunning("alpha", 8080, "foreground");
      manager.updatePid("alpha", 101);
      manager.markRunning("beta", null, "foreground");
      manager.markRunning("gamma", 8082, "foreground");
      manager.markStopped("gamma", 0);

      const result = await manager.stopAll();

      expect(result.stopped).toBe(1);
      expect(result.failures.map((failure) => failure.model)).toEqual(["beta"]);
      expect(manager.runningEntries()).toEqual([]);
      expect(control.signals).toEqual([{ pid: 101, signal: "SIGTERM" }]);
    });
  });
});

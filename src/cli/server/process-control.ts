import { spawn, spawnSync } from "child_process";
import { quoteShellArg, quoteShellCommand } from "../utils/shell.js";

// OS operations the lifecycle manager needs; swapped for a fake in tests.
export interface ProcessControl {
  isAlive(pid: number): boolean;
  findPidByPort(port: number): number | null;
  signal(pid: number, signal: NodeJS.Signals): boolean;
  spawnDetached(argv: string[], logPath: string, pidPath: string): Promise<void>;
  sleep(ms: number): Promise<void>;
}

// Check process liveness with signal 0.
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

// First PID listening on a TCP port, via lsof (macOS and most Linux installs).
export function findListeningPid(port: number): number | null {
  try {
    const result = spawnSync("lsof", ["-t", "-i", `TCP:${port}`, "-sTCP:LISTEN"], {
      encoding: "utf-8",
    });

    if (result.status !== 0 || !result.stdout) {
      return null;
    }

    const pid = parseInt(result.stdout.split("\n")[0], 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

// Shell line that backgrounds the server and records its PID.
export function buildDetachedCommand(argv: string[], logPath: string, pidPath: string): string {
  return (
    `nohup ${quoteShellCommand(argv)} >> ${quoteShellArg(logPath)} 2>&1 < /dev/null & ` +
    `echo $! > ${quoteShellArg(pidPath)}`
  );
}

export const nodeProcessControl: ProcessControl = {
  isAlive: isPidAlive,

  findPidByPort: findListeningPid,

  signal(pid, signal) {
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      return false;
    }
  },

  spawnDetached(argv, logPath, pidPath) {
    const command = buildDetachedCommand(argv, logPath, pidPath);

    return new Promise<void>((resolve, reject) => {
      // New session so the server outlives this terminal.
      const proc = spawn("sh", ["-c", command], { detached: true, stdio: "ignore" });

      // The launcher shell exits as soon as the server is backgrounded; wait for it.
      proc.on("error", reject);
      proc.on("close", (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`launcher shell exited with code ${code ?? "unknown"}`));
        }
      });
    });
  },

  sleep(ms) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  },
};

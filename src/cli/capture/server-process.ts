import { spawn } from "child_process";
import { constants } from "os";
import { createInterface } from "readline";
import { quoteShellCommand } from "../utils/shell.js";

/**
 * A running server seen as one ordered stream of output lines.
 *
 * The capture engine only ever awaits the next line, so echo order and
 * capture order are the same.
 */
export interface ServerProcess {
  readonly pid: number | undefined;
  lines(): AsyncIterable<string>;
  // Resolves with the exit code once the process is gone.
  wait(): Promise<number>;
  kill(signal: NodeJS.Signals): void;
  close(): void;
}

export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) {
    return 1;
  }
  const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return signo !== undefined ? 128 + signo : 1;
}

// Spawn the server with stderr folded into stdout, as `cmd 2>&1` would.
export function spawnServer(argv: string[]): ServerProcess {
  // `exec` replaces the shell so the child PID is the server's PID.
  const proc = spawn("sh", ["-c", `exec ${quoteShellCommand(argv)} 2>&1`], {
    stdio: ["inherit", "pipe", "inherit"],
  });

  let spawnError: Error | null = null;
  const closed = new Promise<number>((resolve) => {
    proc.on("error", (error) => {
      spawnError = error;
      resolve(1);
    });
    proc.on("close", (code, signal) => resolve(code ?? signalExitCode(signal)));
  });

  const reader = createInterface({ input: proc.stdout, crlfDelay: Infinity });

  return {
    pid: proc.pid,

    lines: () => reader,

    async wait() {
      const code = await closed;
      if (spawnError) {
        throw spawnError;
      }
      return code;
    },

    kill(signal) {
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill(signal);
      }
    },

    close() {
      reader.close();
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill("SIGTERM");
      }
      proc.stdout.destroy();
    },
  };
}

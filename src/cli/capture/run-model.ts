import { existsSync } from "fs";
import {
  INTERIM_WRITE_AFTER_LINES,
  MAX_CAPTURE_BYTES,
  MAX_CAPTURE_LINES,
  PID_LOOKUP_AFTER_LINES,
} from "../config/capture.js";
import type { Settings } from "../config/settings.js";
import { ModelNotFoundError } from "../errors.js";
import type { HistoryRecorder } from "../history/store.js";
import { getModelPath, listModels } from "../models/catalog.js";
import { buildRunConfig } from "../models/command.js";
import type { ServerManager } from "../server/lifecycle.js";
import type { EndReason, HistoryStatus } from "../types.js";
import { quoteShellCommand } from "../utils/shell.js";
import { sanitizeLargeArrays, shouldCaptureLine } from "./line-filter.js";
import { buildCapturedRunInfo, type CaptureSnapshot, type ModelInfoWriter, type TagReader } from "./model-info.js";
import { spawnServer, type ServerProcess } from "./server-process.js";

export const INTERRUPTED_EXIT_CODE = 130;

export interface RunModelDeps {
  manager: Pick<ServerManager, "markRunning" | "markStopped" | "tryUpdatePid">;
  history: HistoryRecorder;
  infoStore: ModelInfoWriter;
  spawn?: (argv: string[]) => ServerProcess;
  echo?: (line: string) => void;
  readTags?: TagReader;
  now?: () => Date;
  // Aborted when the user interrupts the run (Ctrl-C).
  signal?: AbortSignal;
}

export interface RunOutcome {
  exitCode: number;
  endReason: EndReason;
  capturedLines: number;
}

class RunInterruptedError extends Error {}

function historyStatus(endReason: EndReason, exitCode: number): HistoryStatus {
  if (endReason === "sigint") return "interrupted";
  return exitCode === 0 ? "exited" : "failed";
}

/**
 * Run one model in the foreground, echoing every output line and keeping a
 * bounded capture of its startup diagnostics.
 *
 * Finalization (close, metadata write, state update, history record) runs
 * exactly once on every exit path. Errors other than an interruption are
 * re-thrown after it.
 */
export async function runModel(
  settings: Settings,
  model: string,
  extraArgs: string[],
  deps: RunModelDeps
): Promise<RunOutcome> {
  const echo = deps.echo ?? ((line: string) => process.stdout.write(`${line}\n`));
  const now = deps.now ?? (() => new Date());
  const spawnProcess = deps.spawn ?? spawnServer;

  // preparing
  const modelPath = getModelPath(settings.models_dir, model);
  if (!existsSync(modelPath)) {
    throw new ModelNotFoundError(
      modelPath,
      listModels(settings.models_dir).map((candidate) => candidate.name)
    );
  }

  const runConfig = buildRunConfig(settings, model, extraArgs);
  const port = runConfig.port ?? null;
  console.error(`[llmrun] Starting ${model}`);
  console.error(`[llmrun] Command: ${quoteShellCommand(runConfig.argv)}`);

  deps.manager.markRunning(model, port, "foreground");

  const captured: string[] = [];
  let capturedBytes = 0;
  let capturing = true;
  let pidLookupDone = false;
  let interimWritten = false;
  let server: ServerProcess | null = null;
  let finalized = false;

  const snapshot = (endReason: EndReason | null, exitCode: number | null): CaptureSnapshot => ({
    runConfig,
    modelPath,
    lines: captured,
    endReason,
    exitCode,
    capturedAt: now(),
  });

  const saveInfo = (endReason: EndReason | null, exitCode: number | null): void => {
    const info = buildCapturedRunInfo(snapshot(endReason, exitCode), deps.readTags);
    if (info) {
      deps.infoStore.save(info);
    }
  };

  const finalize = (endReason: EndReason, exitCode: number): void => {
    if (finalized) return;
    finalized = true;

    if (server) {
      try {
        server.close();
      } catch (error) {
        console.error(`[llmrun] warning: could not close server process: ${String(error)}`);
      }
    }

    if (captured.length > 0) {
      saveInfo(endReason, exitCode);
    }

    deps.manager.markStopped(model, exitCode);
    deps.history.append(model, historyStatus(endReason, exitCode), exitCode);
  };

  // Forward the interrupt to the server so its output stream ends.
  const onAbort = (): void => server?.kill("SIGINT");
  deps.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    // streaming
    server = spawnProcess(runConfig.argv);
    if (deps.signal?.aborted) {
      throw new RunInterruptedError();
    }

    for await (const line of server.lines()) {
      if (deps.signal?.aborted) {
        throw new RunInterruptedError();
      }

      echo(line);

      if (!capturing || !shouldCaptureLine(line)) {
        continue;
      }

      const sanitized = sanitizeLargeArrays(line);
      captured.push(sanitized);
      capturedBytes += Buffer.byteLength(sanitized, "utf-8");

      if (!pidLookupDone && captured.length >= PID_LOOKUP_AFTER_LINES) {
        pidLookupDone = true;
        deps.manager.tryUpdatePid(model, port);
      }

      if (!interimWritten && captured.length >= INTERIM_WRITE_AFTER_LINES) {
        interimWritten = true;
        saveInfo(null, null);
      }

      if (captured.length >= MAX_CAPTURE_LINES || capturedBytes >= MAX_CAPTURE_BYTES) {
        capturing = false;
      }
    }

    if (deps.signal?.aborted) {
      throw new RunInterruptedError();
    }

    const exitCode = await server.wait();
    if (deps.signal?.aborted) {
      throw new RunInterruptedError();
    }

    // finalizing
    finalize("exit", exitCode);
    return { exitCode, endReason: "exit", capturedLines: captured.length };
  } catch (error) {
    if (error instanceof RunInterruptedError) {
      finalize("sigint", INTERRUPTED_EXIT_CODE);
      return { exitCode: INTERRUPTED_EXIT_CODE, endReason: "sigint", capturedLines: captured.length };
    }

    finalize("error", 1);
    throw error;
  } finally {
    deps.signal?.removeEventListener("abort", onAbort);
  }
}

import { spawnSync } from "child_process";

// Read the tail of a log file via `tail` for speed on large files.
export function getLastNLines(logPath: string, lineCount: number): string {
  const result = spawnSync("tail", ["-n", String(lineCount), logPath], { encoding: "utf-8" });
  return result.status === 0 ? result.stdout : "";
}

const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

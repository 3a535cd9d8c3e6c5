import { readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../config/paths.js";

// Read and parse a JSON file; null when missing or not valid JSON.
export function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return null;
  }
}

// Write through a temp file and rename so readers never see half a document.
export function writeJsonAtomic(path: string, data: unknown): void {
  ensureDir(dirname(path));
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    writeFileSync(tempPath, JSON.stringify(data, null, 2));
    renameSync(tempPath, path);
  } catch (error) {
    try {
      unlinkSync(tempPath);
    } catch {
      // Temp file was never created.
    }
    throw error;
  }
}

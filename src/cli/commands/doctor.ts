import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { homedir } from "os";
import { z } from "zod";
import { expandHome, type RuntimePaths } from "../config/paths.js";
import { SettingsSchema } from "../config/settings.js";
import type { CliContext } from "../context.js";
import { HistoryStore } from "../history/store.js";
import { listModels } from "../models/catalog.js";
import { parseStateDocument } from "../server/state-store.js";
import { readJsonFile } from "../utils/json-file.js";

export interface DoctorIssue {
  field: string;
  issue: string;
  fix: string;
}

export interface DoctorReport {
  lines: string[];
  issues: DoctorIssue[];
}

const SEPARATOR = "━".repeat(54);

// Fields the doctor checks against the filesystem; wrong types read as missing.
const RequiredFieldsSchema = z
  .object({
    llama_cpp_path: z.string().min(1).optional().catch(undefined),
    models_dir: z.string().min(1).optional().catch(undefined),
  })
  .catch({});

const REQUIRED_FIELDS = new Set(["llama_cpp_path", "models_dir"]);

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function missing(field: string): { line: string; issue: DoctorIssue } {
  return {
    line: `  ✗ ${field} (missing)`,
    issue: { field, issue: "missing", fix: `Add to config: "${field}": <value>` },
  };
}

function checkRequired(raw: unknown, home: string, lines: string[], issues: DoctorIssue[]): void {
  const fields = RequiredFieldsSchema.parse(raw);
  lines.push("Required Configuration:");

  if (fields.llama_cpp_path === undefined) {
    const result = missing("llama_cpp_path");
    lines.push(result.line);
    issues.push(result.issue);
  } else {
    const binary = expandHome(fields.llama_cpp_path, home);
    if (isFile(binary)) {
      lines.push(`  ✓ llama_cpp_path → ${binary}`);
    } else {
      lines.push(`  ✗ llama_cpp_path → ${binary} (not found)`);
      issues.push({
        field: "llama_cpp_path",
        issue: "file not found",
        fix: "Update llama_cpp_path to point to the llama-server binary",
      });
    }
  }

  if (fields.models_dir === undefined) {
    const result = missing("models_dir");
    lines.push(result.line);
    issues.push(result.issue);
  } else {
    const modelsDir = expandHome(fields.models_dir, home);
    if (isDirectory(modelsDir)) {
      lines.push(`  ✓ models_dir → ${modelsDir} (${listModels(modelsDir).length} models)`);
    } else {
      lines.push(`  ✗ models_dir → ${modelsDir} (not found)`);
      issues.push({
        field: "models_dir",
        issue: "directory not found",
        fix: "Create the directory or update models_dir to a valid path",
      });
    }
  }

  // Everything else the schema rejects.
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.join(".") || "(root)";
      if (REQUIRED_FIELDS.has(String(issue.path[0]))) continue;
      lines.push(`  ✗ ${field}: ${issue.message}`);
      issues.push({ field, issue: issue.message, fix: `Correct ${field} in the config file` });
    }
  }

  lines.push("");
}

function checkOptional(raw: unknown, home: string, lines: string[]): void {
  lines.push("Optional Configuration:");

  const parsed = z.object({ llama_cpp_source_dir: z.string().min(1) }).safeParse(raw);
  if (parsed.success) {
    const sourceDir = expandHome(parsed.data.llama_cpp_source_dir, home);
    if (isDirectory(sourceDir)) {
      lines.push(`  ✓ llama_cpp_source_dir → ${sourceDir}`);
    } else {
      lines.push(`  ✗ llama_cpp_source_dir configured but not found → ${sourceDir}`);
    }
  } else {
    lines.push("  - llama_cpp_source_dir not configured (required for 'llmrun rebuild')");
  }

  lines.push("");
}

function checkRuntimeFiles(paths: RuntimePaths, lines: string[]): void {
  lines.push(`State file: ${paths.stateFile}`);
  if (existsSync(paths.stateFile)) {
    const doc = parseStateDocument(readJsonFile(paths.stateFile));
    const running = doc.servers.filter((entry) => entry.state === "running").length;
    lines.push(`  ✓ exists (${doc.servers.length} tracked, ${running} running)`);
  } else {
    lines.push("  - not yet created (will be created on first launch)");
  }

  lines.push(`Model info directory: ${paths.modelInfoDir}`);
  if (isDirectory(paths.modelInfoDir)) {
    const cached = readdirSync(paths.modelInfoDir).filter((file) => file.endsWith(".json")).length;
    lines.push(`  ✓ exists (${cached} cached models)`);
  } else {
    lines.push("  - not yet created (will be created on first model run)");
  }

  lines.push(`History file: ${paths.historyFile}`);
  if (existsSync(paths.historyFile)) {
    lines.push(`  ✓ exists (${new HistoryStore(paths.historyFile).load().length} entries)`);
  } else {
    lines.push("  - not yet created (will be created on first model run)");
  }

  lines.push("");
}

function summarize(paths: RuntimePaths, issues: DoctorIssue[], lines: string[]): void {
  if (issues.length === 0) {
    lines.push("✓ All required configuration is valid");
    return;
  }

  lines.push(SEPARATOR, "CONFIGURATION ISSUES FOUND:", "");
  issues.forEach((issue, index) => {
    lines.push(`${index + 1}. ${issue.field} (${issue.issue})`, `   Fix: ${issue.fix}`, "");
  });
  lines.push(`Edit your config file: ${paths.configFile}`, SEPARATOR);
}

/**
 * Check the config file, the paths it names and the runtime files llmrun
 * keeps. Reads only; never creates the config.
 */
export function buildDoctorReport(paths: RuntimePaths, home: string = homedir()): DoctorReport {
  const lines: string[] = ["llmrun diagnostics", "", `Node.js: ${process.version}`, ""];
  const issues: DoctorIssue[] = [];

  lines.push(`Config file: ${paths.configFile}`);
  if (!existsSync(paths.configFile)) {
    lines.push("  ✗ not found", "", "Run 'llmrun list' once to create a default config.");
    issues.push({ field: "config.json", issue: "missing", fix: `Create ${paths.configFile}` });
    return { lines, issues };
  }
  lines.push("  ✓ exists");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(paths.configFile, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    lines.push(`  ✗ invalid JSON: ${reason}`);
    issues.push({ field: "config.json", issue: "invalid JSON", fix: `Fix the syntax of ${paths.configFile}` });
    return { lines, issues };
  }
  lines.push("  ✓ valid JSON", "");

  checkRequired(raw, home, lines, issues);
  checkOptional(raw, home, lines);
  checkRuntimeFiles(paths, lines);
  summarize(paths, issues, lines);

  return { lines, issues };
}

// `llmrun doctor`: exits 1 when any required setting is wrong.
export function doctorCommand(ctx: CliContext): void {
  const report = buildDoctorReport(ctx.paths);
  console.log(report.lines.join("\n"));
  if (report.issues.length > 0) {
    process.exitCode = 1;
  }
}

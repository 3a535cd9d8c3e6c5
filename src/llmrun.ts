#!/usr/bin/env node
import { runCli } from "./cli/main.js";
import { LlmrunError } from "./cli/errors.js";

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof LlmrunError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  }
  process.exit(1);
});

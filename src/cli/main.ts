import { loadSettings } from "./config/settings.js";
import { CLI_USAGE_TEXT } from "./config/usage.js";
import { createCliContext } from "./context.js";
import { clearHistoryCommand } from "./commands/clear-history.js";
import { doctorCommand } from "./commands/doctor.js";
import { infoCommand } from "./commands/info.js";
import { listCommand } from "./commands/list.js";
import { rebuildCommand } from "./commands/rebuild.js";
import { runForegroundCommand } from "./commands/run.js";
import { startDetachedCommand } from "./commands/start.js";
import { statusCommand } from "./commands/status.js";
import { stopCommand } from "./commands/stop.js";
import { runMcpServer } from "../mcp/main.js";

function printUsage(): void {
  console.log(CLI_USAGE_TEXT);
}

// Main CLI dispatcher.
export async function runCli(argv: string[]): Promise<void> {
  const args = argv;
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h" || args[0] === "help") {
    printUsage();
    process.exit(0);
  }

  const ctx = createCliContext();
  const firstArg = args[0];

  switch (firstArg) {
    case "start": {
      await startDetachedCommand(ctx, args.slice(1));
      break;
    }

    case "stop": {
      await stopCommand(ctx, args.slice(1));
      break;
    }

    case "status": {
      statusCommand(ctx, args.slice(1));
      break;
    }

    case "info": {
      infoCommand(ctx, args.slice(1));
      break;
    }

    case "list": {
      listCommand(ctx);
      break;
    }

    case "config": {
      const settings = loadSettings(ctx.paths);
      console.log(`Config file: ${ctx.paths.configFile}`);
      console.log(`  llama_cpp_path: ${settings.llama_cpp_path}`);
      console.log(`  models_dir:     ${settings.models_dir}`);
      console.log(`State file:  ${ctx.paths.stateFile}`);
      break;
    }

    case "doctor": {
      doctorCommand(ctx);
      break;
    }

    case "clear-history": {
      clearHistoryCommand(ctx);
      break;
    }

    case "rebuild": {
      rebuildCommand(ctx);
      break;
    }

    case "mcp": {
      await runMcpServer(ctx.manager);
      break;
    }

    default: {
      // Anything else names a model to run in the foreground.
      await runForegroundCommand(ctx, args);
      break;
    }
  }
}

// Base class for failures the CLI reports as a message and exit code 1.
export class LlmrunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// A detached start was refused because the model is already tracked as running.
export class LaunchConflictError extends LlmrunError {
  constructor(
    readonly model: string,
    readonly pid: number | null,
    readonly port: number | null
  ) {
    const where = [port !== null ? `port ${port}` : null, pid !== null ? `pid ${pid}` : null]
      .filter((part): part is string => part !== null)
      .join(", ");
    super(
      `${model} is already running${where ? ` (${where})` : ""}. Stop it first with: llmrun stop ${model}`
    );
  }
}

export class SpawnFailureError extends LlmrunError {
  constructor(readonly model: string, detail: string) {
    super(`Failed to launch ${model}: ${detail}`);
  }
}

// No PID could be found to signal; the entry is still marked stopped.
export class SignalResolutionError extends LlmrunError {
  constructor(readonly model: string) {
    super(`No PID found for ${model}; cannot send signal. If the server is still running, stop it manually.`);
  }
}

export class ModelNotFoundError extends LlmrunError {
  constructor(readonly modelPath: string, readonly available: string[]) {
    super(`Model file not found: ${modelPath}`);
  }
}

export class ConfigError extends LlmrunError {}

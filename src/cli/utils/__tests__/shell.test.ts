import { describe, it, expect } from "vitest";
import { buildDetachedCommand } from "../../server/process-control.js";
import { quoteShellArg, quoteShellCommand } from "../shell.js";

describe("shell quoting", () => {
  it("should leave plain arguments bare", () => {
    expect(quoteShellArg("--port")).toBe("--port");
    expect(quoteShellArg("/opt/llama/llama-server")).toBe("/opt/llama/llama-server");
  });

  it("should single-quote arguments with shell metacharacters", () => {
    expect(quoteShellArg("my model.gguf")).toBe("'my model.gguf'");
    expect(quoteShellArg("it's")).toBe("'it'\\''s'");
    expect(quoteShellArg("")).toBe("''");
  });

  it("should quote bracketed file names so the shell does not glob them", () => {
    expect(quoteShellArg("/models/foo[Q4].gguf")).toBe("'/models/foo[Q4].gguf'");
    expect(quoteShellArg("a]b")).toBe("'a]b'");
  });

  it("should join a quoted command line", () => {
    expect(quoteShellCommand(["llama-server", "-m", "/m/a b.gguf"])).toBe("llama-server -m '/m/a b.gguf'");
  });

  it("should build the detached launch line", () => {
    expect(buildDetachedCommand(["llama-server", "--port", "8080"], "/logs/a.log", "/pids/a.pid")).toBe(
      "nohup llama-server --port 8080 >> /logs/a.log 2>&1 < /dev/null & echo $! > /pids/a.pid"
    );
  });
});

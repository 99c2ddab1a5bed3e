import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { RemoteTransport } from "@corral/sdk";
import {
  HandlerError,
  RenderError,
  UnknownCommandError,
  alert,
  errorStatus,
  exitStatus,
  text,
} from "@corral/sdk";
import { runInCallContext } from "../../execution/call-context.js";
import { createUsageRegistry, type UsageRegistry } from "../../infrastructure/usage-registry.js";
import { createWriterRegistry } from "../../infrastructure/writer-registry.js";
import { createOutputPipeline, type OutputPipeline } from "../pipeline.js";
import type { ProcessIO } from "../process-io.js";
import { BUILTIN_WRITERS } from "../writers/index.js";

describe("OutputPipeline", () => {
  let stdout: string;
  let stderr: string;
  let io: ProcessIO;
  let transport: RemoteTransport;
  let writeStderr: Mock<(node: string, text: string) => Promise<void>>;
  let usage: UsageRegistry;
  let pipeline: OutputPipeline;

  beforeEach(() => {
    stdout = "";
    stderr = "";
    io = {
      writeStdout: (chunk) => {
        stdout += chunk;
      },
      writeStderr: (chunk) => {
        stderr += chunk;
      },
    };
    writeStderr = vi.fn(async (_node: string, chunk: string) => {
      stderr += chunk;
    });
    transport = { localNode: "n1", call: vi.fn(), writeStderr };
    usage = createUsageRegistry();
    const writers = createWriterRegistry();
    for (const [format, writer] of BUILTIN_WRITERS) writers.register(format, writer);
    pipeline = createOutputPipeline({ writers, usage, transport, io });
  });

  it("renders a bare status with the human writer and exits 0", async () => {
    await expect(pipeline.print([text("running")], ["admin", "status"])).resolves.toBe(0);
    expect(stdout).toBe("running\n");
    expect(stderr).toBe("");
  });

  it("renders a bare status in the requested format", async () => {
    await expect(pipeline.print([text("running")], ["admin", "status"], "json")).resolves.toBe(0);
    expect(stdout).toBe('[{"type":"text","text":"running"}]\n');
  });

  it("uses the exit code and format of a tagged status", async () => {
    await expect(pipeline.print(exitStatus(17, [text("stopping")], "json"), ["admin", "stop"])).resolves.toBe(17);
    expect(stdout).toBe('[{"type":"text","text":"stopping"}]\n');
  });

  it("renders errors as human text with exit code 1 whatever format was asked for", async () => {
    const code = await pipeline.print(errorStatus(new HandlerError(["a"], "boom")), ["a"], "json");
    expect(code).toBe(1);
    expect(stdout).toBe("");
    expect(stderr).toBe("boom\n");
  });

  it("appends usage to unknown-command errors", async () => {
    usage.register(["admin"], "Usage: admin <command>");
    await pipeline.print(errorStatus(new UnknownCommandError(["admin", "nope"])), ["admin", "nope"]);
    expect(stderr).toBe("Unknown command: admin nope\nUsage: admin <command>\n");
  });

  it("prefixes plain errors", async () => {
    await pipeline.print(errorStatus(new Error("disk full")), ["a"]);
    expect(stderr).toBe("Error: disk full\n");
  });

  it("lists failed nodes of a partial failure", async () => {
    await pipeline.print(errorStatus(new HandlerError(["a"], "partial", { failedNodes: ["n2", "n3"] })), ["a"]);
    expect(stderr).toBe("partial\nFailed nodes:\n  n2\n  n3\n");
  });

  it("rejects when the format has no writer", async () => {
    await expect(pipeline.print([text("x")], ["a"], "yaml")).rejects.toBeInstanceOf(RenderError);
    await expect(pipeline.print(exitStatus(0, [text("x")], "yaml"), ["a"])).rejects.toBeInstanceOf(RenderError);
    expect(stdout).toBe("");
  });

  it("prints resolved usage", async () => {
    usage.register(["admin"], "Usage: admin <command>");
    await expect(pipeline.print("usage", ["admin", "status"])).resolves.toBe(0);
    expect(stdout).toBe("Usage: admin <command>\n");
  });

  it("falls back to a generic message when no usage exists", async () => {
    await expect(pipeline.print("usage", ["x", "y"])).resolves.toBe(1);
    expect(stderr).toBe("No usage available for: x y\n");
  });

  it("sends stderr to the local node outside any call context", async () => {
    await pipeline.print([alert([text("warn")])], ["a"]);
    expect(writeStderr).toHaveBeenCalledWith("n1", "warn\n");
  });

  it("sends stdout to the call context and stderr to the origin node", async () => {
    let captured = "";
    await runInCallContext({ originNode: "n7", stdout: (chunk) => (captured += chunk) }, () =>
      pipeline.print([text("out"), alert([text("err")])], ["a"]),
    );
    expect(captured).toBe("out\n");
    expect(stdout).toBe("");
    expect(writeStderr).toHaveBeenCalledWith("n7", "err\n");
  });

  it("writes stderr locally when the origin cannot be reached", async () => {
    writeStderr.mockRejectedValueOnce(new Error("unreachable"));
    await runInCallContext({ originNode: "n7", stdout: vi.fn() }, () =>
      pipeline.print([alert([text("err")])], ["a"]),
    );
    expect(stderr).toBe("err\n");
  });
});

import { describe, it, expect, vi } from "vitest";
import type { CommandHandler, ParsedArgs, RemoteTransport } from "@corral/sdk";
import { HandlerError, ValidationError, exitStatus, isErrorStatus, text } from "@corral/sdk";
import { createCommandRegistry } from "../infrastructure/command-registry.js";
import { execute, normalizeResult } from "./dispatcher.js";

const transport: RemoteTransport = {
  localNode: "n1",
  call: vi.fn(),
  writeStderr: vi.fn(),
};

const args: ParsedArgs = {
  keys: { node: "n2" },
  flags: { force: true },
  overflow: [],
  globals: { all: false, help: false },
};

function run(handler: CommandHandler) {
  const registry = createCommandRegistry();
  registry.register(["cluster", "*"], "_", "_", handler);
  return execute(registry.match(["cluster", "leave"]), args, { transport, nodes: async () => ["n1", "n2"] });
}

describe("execute", () => {
  it("passes path, keys, flags and context to the handler", async () => {
    const handler = vi.fn<CommandHandler>(async (_path, _keys, _flags, ctx) => [text(`on ${await ctx.nodes()}`)]);
    const result = await run(handler);

    expect(result).toEqual([text("on n1,n2")]);
    const [path, keys, flags, ctx] = handler.mock.calls[0];
    expect(path).toEqual(["cluster", "leave"]);
    expect(keys).toEqual({ node: "n2" });
    expect(flags).toEqual({ force: true });
    expect(ctx.localNode).toBe("n1");
    expect(ctx.globals).toEqual({ all: false, help: false });
  });

  it("keeps tagged statuses", async () => {
    await expect(run(() => exitStatus(17, [text("stopping")]))).resolves.toEqual(
      exitStatus(17, [text("stopping")], "human"),
    );
  });

  it("wraps thrown errors in HandlerError", async () => {
    const cause = new Error("disk full");
    const result = await run(() => {
      throw cause;
    });

    expect(isErrorStatus(result)).toBe(true);
    if (!isErrorStatus(result)) return;
    expect(result.error).toBeInstanceOf(HandlerError);
    expect(result.error.message).toBe("disk full");
    expect(result.error.cause).toBe(cause);
  });

  it("keeps framework errors as they are", async () => {
    const error = new ValidationError("Missing node");
    const result = await run(async () => {
      throw error;
    });
    expect(result).toEqual({ kind: "error", error });
  });
});

describe("normalizeResult", () => {
  it("turns an unrecognized value into a handler error", () => {
    const result = normalizeResult(["a", "b"], { hello: "world" });
    expect(isErrorStatus(result)).toBe(true);
    if (!isErrorStatus(result)) return;
    expect(result.error.message).toBe('Command "a b" returned an invalid status');
  });

  it("rejects a tagged status with a fractional exit code", () => {
    const result = normalizeResult(["a"], { kind: "exit", status: [], exitCode: 1.5, format: "human" });
    expect(isErrorStatus(result)).toBe(true);
  });

  it("accepts an empty payload", () => {
    expect(normalizeResult(["a"], [])).toEqual([]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RemoteTransport } from "@corral/sdk";
import { ErrorCode, alert, text } from "@corral/sdk";
import { createCorral, type Corral } from "../../corral/corral.js";
import type { ProcessIO } from "../../output/process-io.js";
import { IpcClient } from "../ipc-client.js";
import { IpcServer } from "../ipc-server.js";
import { createIpcTransport } from "../ipc-transport.js";
import { createNodeServer, type NodeServer } from "../node-server.js";
import { runRemote } from "../remote-run.js";
import { RpcErrorCode, RpcFault } from "../types.js";

function capture() {
  const out = { stdout: "", stderr: "" };
  const io: ProcessIO = {
    writeStdout: (chunk) => {
      out.stdout += chunk;
    },
    writeStderr: (chunk) => {
      out.stderr += chunk;
    },
  };
  return { out, io };
}

describe("IpcServer / IpcClient", () => {
  let dir: string;
  let server: IpcServer;
  let client: IpcClient;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "corral-ipc-"));
    server = new IpcServer({
      socketPath: join(dir, "node.sock"),
      handler: async (method, params) => {
        if (method === "echo") return params;
        throw new RpcFault(RpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
      },
    });
    await server.start();
    client = new IpcClient({ socketPath: join(dir, "node.sock"), timeoutMs: 2000 });
    await client.connect();
  });

  afterEach(async () => {
    client.close();
    await server.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips a request", async () => {
    await expect(client.call("echo", { value: 42 })).resolves.toEqual({ value: 42 });
  });

  it("keeps multi-byte text intact across socket chunks", async () => {
    // Odd-length ASCII prefix shifts every 3-byte character off chunk boundaries.
    const payload = `x${"節點€".repeat(30000)}`;
    await expect(client.call("echo", { text: payload })).resolves.toEqual({ text: payload });
  });

  it("matches concurrent responses by id", async () => {
    const results = await Promise.all([client.call("echo", 1), client.call("echo", 2), client.call("echo", 3)]);
    expect(results).toEqual([1, 2, 3]);
  });

  it("carries the error code across the wire", async () => {
    const failure = client.call("missing");
    await expect(failure).rejects.toBeInstanceOf(RpcFault);
    await expect(failure).rejects.toMatchObject({ code: RpcErrorCode.METHOD_NOT_FOUND });
  });

  it("removes the socket file on stop", async () => {
    client.close();
    await server.stop();
    expect(server.listening).toBe(false);
    const again = new IpcClient({ socketPath: join(dir, "node.sock") });
    await expect(again.connect()).rejects.toThrow();
  });
});

describe("remote execution over unix sockets", () => {
  let dir: string;
  let servers: NodeServer[];
  let transports: RemoteTransport[];

  function startNode(name: string, io: ProcessIO): Corral {
    const transport = createIpcTransport({
      localNode: name,
      io,
      resolveSocket: (node) => join(dir, `${node}.sock`),
      timeoutMs: 2000,
    });
    transports.push(transport);
    const corral = createCorral({ transport, io, configCommands: false });
    servers.push(createNodeServer({ target: corral, io, socketPath: join(dir, `${name}.sock`) }));
    return corral;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "corral-rpc-"));
    servers = [];
    transports = [];
  });

  afterEach(async () => {
    for (const transport of transports) transport.close?.();
    for (const server of servers) await server.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  it("forwards stderr to the originating node", async () => {
    const a = capture();
    const b = capture();
    const nodeA = startNode("a", a.io);
    const nodeB = startNode("b", b.io);
    nodeB.registerCommand(["admin", "check"], [], [], () => [text("ok"), alert([text("disk low")])]);
    for (const server of servers) await server.start();

    await expect(runRemote(nodeA.transport, "b", ["admin", "check"], a.io)).resolves.toBe(0);
    expect(a.out).toEqual({ stdout: "ok\n", stderr: "disk low\n" });
    expect(b.out).toEqual({ stdout: "", stderr: "" });
  });

  it("reports a node without a server as a transport error", async () => {
    const a = capture();
    const nodeA = startNode("a", a.io);

    await expect(nodeA.transport.call("ghost", "ping")).rejects.toMatchObject({
      code: ErrorCode.TRANSPORT_ERROR,
    });
  });

  it("times out a call that never answers", async () => {
    const server = new IpcServer({
      socketPath: join(dir, "slow.sock"),
      handler: () => new Promise<unknown>(() => undefined),
    });
    await server.start();
    const transport = createIpcTransport({
      localNode: "a",
      io: capture().io,
      resolveSocket: (node) => join(dir, `${node}.sock`),
      timeoutMs: 50,
    });
    transports.push(transport);

    try {
      await expect(transport.call("slow", "ping")).rejects.toMatchObject({
        code: ErrorCode.TRANSPORT_TIMEOUT,
        message: 'Transport to node "slow" failed: RPC timeout after 50ms',
      });
    } finally {
      await server.stop();
    }
  });
});

/**
 * IPC server: unix domain socket endpoint for a node's RPC methods.
 *
 * Protocol: line-delimited JSON (newline-separated messages).
 */

import { createServer, type Server as NetServer, type Socket } from "node:net";
import { chmodSync, existsSync, mkdirSync, unlinkSync } from "node:fs";
import { dirname } from "node:path";
import { StringDecoder } from "node:string_decoder";
import { createLogger } from "@corral/shared";
import type { RpcHandler, RpcResponse } from "./types.js";
import { RpcErrorCode, RpcFault, RpcRequestSchema } from "./types.js";

const logger = createLogger("IpcServer");

export interface IpcServerOptions {
  /** Path to unix domain socket */
  socketPath: string;
  handler: RpcHandler;
}

export class IpcServer {
  private server: NetServer | null = null;
  private readonly clients = new Set<Socket>();
  private readonly socketPath: string;
  private readonly handler: RpcHandler;

  constructor(options: IpcServerOptions) {
    this.socketPath = options.socketPath;
    this.handler = options.handler;
  }

  get listening(): boolean {
    return this.server !== null;
  }

  async start(): Promise<void> {
    // Stale socket from a previous run
    if (existsSync(this.socketPath)) {
      unlinkSync(this.socketPath);
    }
    mkdirSync(dirname(this.socketPath), { recursive: true });

    const server = createServer((socket) => {
      this.handleConnection(socket);
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.socketPath, () => {
        server.off("error", reject);
        try {
          chmodSync(this.socketPath, 0o600);
        } catch (err) {
          logger.warn("Failed to set socket permissions", { error: String(err) });
        }
        resolve();
      });
    });

    this.server = server;
    logger.info(`Listening on ${this.socketPath}`);
  }

  async stop(): Promise<void> {
    for (const client of this.clients) {
      client.destroy();
    }
    this.clients.clear();

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    if (existsSync(this.socketPath)) {
      try {
        unlinkSync(this.socketPath);
      } catch (err) {
        logger.warn("Failed to remove socket", { error: String(err) });
      }
    }
  }

  private handleConnection(socket: Socket): void {
    this.clients.add(socket);
    let buffer = "";
    // Multi-byte characters may straddle chunk boundaries.
    const decoder = new StringDecoder("utf8");

    socket.on("data", (data) => {
      buffer += decoder.write(data);

      let newlineIndex: number;
      while ((newlineIndex = buffer.indexOf("\n")) !== -1) {
        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        if (line.trim().length > 0) this.handleMessage(socket, line);
      }
    });

    socket.on("close", () => {
      this.clients.delete(socket);
    });

    socket.on("error", (err) => {
      logger.error("Socket error", { error: err.message });
      this.clients.delete(socket);
    });
  }

  private handleMessage(socket: Socket, line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.send(socket, { id: 0, error: { code: RpcErrorCode.PARSE_ERROR, message: "Invalid JSON" } });
      return;
    }

    const request = RpcRequestSchema.safeParse(parsed);
    if (!request.success) {
      this.send(socket, {
        id: 0,
        error: { code: RpcErrorCode.INVALID_REQUEST, message: "Invalid request structure" },
      });
      return;
    }

    const { id, method, params } = request.data;
    this.handler(method, params)
      .then((result) => {
        this.send(socket, { id, result });
      })
      .catch((err: unknown) => {
        const code = err instanceof RpcFault ? err.code : RpcErrorCode.INTERNAL_ERROR;
        const message = err instanceof Error ? err.message : String(err);
        logger.debug(`RPC ${method} failed`, { code, error: message });
        this.send(socket, { id, error: { code, message } });
      });
  }

  private send(socket: Socket, response: RpcResponse): void {
    if (!socket.destroyed) {
      socket.write(JSON.stringify(response) + "\n");
    }
  }
}

/**
 * IPC client: one connection to a peer node's socket.
 *
 * Protocol: line-delimited JSON (newline-separated messages).
 */

import { connect, type Socket } from "node:net";
import { StringDecoder } from "node:string_decoder";
import { createLogger } from "@corral/shared";
import type { RpcRequest } from "./types.js";
import { RpcFault, RpcResponseSchema } from "./types.js";

const logger = createLogger("IpcClient");

export interface IpcClientOptions {
  /** Path to unix domain socket */
  socketPath: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class RpcTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`RPC timeout after ${timeoutMs}ms`);
    this.name = "RpcTimeoutError";
  }
}

export class IpcClient {
  private socket: Socket | null = null;
  private readonly socketPath: string;
  private readonly timeoutMs: number;
  private buffer = "";
  private readonly pending = new Map<string | number, PendingRequest>();
  private nextRequestId = 1;

  constructor(options: IpcClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = connect(this.socketPath);
      const decoder = new StringDecoder("utf8");

      socket.once("connect", () => {
        this.socket = socket;
        resolve();
      });

      socket.on("error", (err) => {
        if (this.socket === socket) {
          this.failPending(err);
        } else {
          reject(err);
        }
      });

      socket.on("data", (data) => {
        this.handleData(decoder.write(data));
      });

      socket.on("close", () => {
        this.failPending(new Error("Connection closed"));
        if (this.socket === socket) this.socket = null;
      });
    });
  }

  call(method: string, params?: unknown): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error("Client not connected"));
    }

    const id = this.nextRequestId++;
    const request: RpcRequest = { id, method, params };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RpcTimeoutError(this.timeoutMs));
      }, this.timeoutMs);

      this.pending.set(id, { resolve, reject, timer });
      socket.write(JSON.stringify(request) + "\n");
    });
  }

  close(): void {
    this.failPending(new Error("Connection closed"));
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;

    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
      const line = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);
      this.handleMessage(line);
    }
  }

  private handleMessage(line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      logger.error("Failed to parse message", { error: String(err) });
      return;
    }

    const response = RpcResponseSchema.safeParse(parsed);
    if (!response.success) {
      logger.error("Received malformed response");
      return;
    }

    const { id, result, error } = response.data;
    const pending = this.pending.get(id);
    if (!pending) {
      logger.warn(`Received response for unknown request ID: ${id}`);
      return;
    }

    clearTimeout(pending.timer);
    this.pending.delete(id);

    if (error) {
      pending.reject(new RpcFault(error.code, error.message));
    } else {
      pending.resolve(result);
    }
  }

  private failPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pending.clear();
  }
}

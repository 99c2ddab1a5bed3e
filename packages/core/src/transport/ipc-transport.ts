/**
 * RemoteTransport over unix sockets, one lazily opened client per peer.
 */

import type { RemoteTransport } from "@corral/sdk";
import { ErrorCode, TransportError } from "@corral/sdk";
import { createLogger } from "@corral/shared";
import type { ProcessIO } from "../output/process-io.js";
import { IpcClient, RpcTimeoutError } from "./ipc-client.js";
import { RpcMethod } from "./types.js";

const logger = createLogger("IpcTransport");

export interface IpcTransportOptions {
  localNode: string;
  /** Local streams; stderr for the local node is written here directly. */
  io: ProcessIO;
  /** Socket path of a peer node. */
  resolveSocket(node: string): string;
  timeoutMs?: number;
}

export function toTransportError(node: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  if (err instanceof RpcTimeoutError) {
    return new TransportError(node, err.message, { cause: err, code: ErrorCode.TRANSPORT_TIMEOUT });
  }
  if (err instanceof Error) return new TransportError(node, err.message, { cause: err });
  return new TransportError(node, String(err));
}

export function createIpcTransport(options: IpcTransportOptions): RemoteTransport {
  const clients = new Map<string, Promise<IpcClient>>();

  function clientFor(node: string): Promise<IpcClient> {
    const existing = clients.get(node);
    if (existing) return existing;

    const client = new IpcClient({ socketPath: options.resolveSocket(node), timeoutMs: options.timeoutMs });
    const connecting = client.connect().then(
      () => client,
      (err: unknown) => {
        clients.delete(node);
        throw err;
      },
    );
    clients.set(node, connecting);
    return connecting;
  }

  async function call(node: string, method: string, params?: unknown): Promise<unknown> {
    try {
      let client = await clientFor(node);
      if (!client.connected) {
        clients.delete(node);
        client = await clientFor(node);
      }
      return await client.call(method, params);
    } catch (err) {
      throw toTransportError(node, err);
    }
  }

  return {
    localNode: options.localNode,

    call,

    async writeStderr(node: string, text: string): Promise<void> {
      if (node === options.localNode) {
        options.io.writeStderr(text);
        return;
      }
      await call(node, RpcMethod.STDERR_WRITE, { text });
    },

    close(): void {
      for (const [node, connecting] of clients) {
        void connecting.then(
          (client) => client.close(),
          (err: unknown) => logger.debug(`Connection to ${node} never opened`, { error: String(err) }),
        );
      }
      clients.clear();
    },
  };
}

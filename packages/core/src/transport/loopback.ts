/**
 * In-process transports. Every node of a LoopbackNetwork lives in the same
 * process; calls go straight to the target node's RpcHandler.
 */

import type { RemoteTransport } from "@corral/sdk";
import { TransportError } from "@corral/sdk";
import type { ProcessIO } from "../output/process-io.js";
import { toTransportError } from "./ipc-transport.js";
import type { RpcHandler } from "./types.js";
import { RpcMethod } from "./types.js";

export interface LoopbackTransport extends RemoteTransport {
  /** Install the handler that answers calls addressed to this node. */
  serve(handler: RpcHandler): void;
}

export interface LoopbackNetwork {
  join(node: string, io: ProcessIO): LoopbackTransport;
  leave(node: string): void;
  members(): string[];
}

interface Member {
  io: ProcessIO;
  handler?: RpcHandler;
}

export function createLoopbackNetwork(): LoopbackNetwork {
  const members = new Map<string, Member>();

  async function deliver(node: string, method: string, params: unknown): Promise<unknown> {
    const member = members.get(node);
    if (!member) {
      throw new TransportError(node, "node is not reachable");
    }
    if (!member.handler) {
      throw new TransportError(node, "node is not serving requests");
    }
    try {
      return await member.handler(method, params);
    } catch (err) {
      throw toTransportError(node, err);
    }
  }

  return {
    join(node: string, io: ProcessIO): LoopbackTransport {
      const member: Member = { io };
      members.set(node, member);

      return {
        localNode: node,

        call: (target, method, params) => deliver(target, method, params),

        async writeStderr(target: string, text: string): Promise<void> {
          if (target === node) {
            io.writeStderr(text);
            return;
          }
          await deliver(target, RpcMethod.STDERR_WRITE, { text });
        },

        serve(handler: RpcHandler): void {
          member.handler = handler;
        },

        close(): void {
          members.delete(node);
        },
      };
    },

    leave(node: string): void {
      members.delete(node);
    },

    members: () => Array.from(members.keys()),
  };
}

/** A single-node transport: local stderr only, no peers. */
export function createLoopbackTransport(localNode: string, io: ProcessIO): LoopbackTransport {
  return createLoopbackNetwork().join(localNode, io);
}

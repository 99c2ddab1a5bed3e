/**
 * Assembles an admin node from its runtime config: transport, Corral
 * instance, config whitelist and the built-in admin plugins.
 */

import { join } from "node:path";
import type { Corral, NodeServer, ProcessIO } from "@corral/core";
import {
  createCorral,
  createIpcTransport,
  createMemoryConfigStore,
  createNodeProcessIO,
  createNodeServer,
} from "@corral/core";
import type { RemoteTransport } from "@corral/sdk";
import type { RuntimeConfig } from "@corral/shared";
import { createLogger } from "@corral/shared";
import { createNodesPlugin, createStatusPlugin, createStopPlugin } from "./plugins/index.js";

const logger = createLogger("Bootstrap");

export interface AdminNode {
  readonly corral: Corral;
  readonly socketPath: string;
  /** Start answering RPCs; resolves once the socket is listening. */
  serve(): Promise<NodeServer>;
  /** Resolves when a served node has been asked to stop. */
  stopped(): Promise<void>;
  dispose(): Promise<void>;
}

export interface AdminNodeOptions {
  io?: ProcessIO;
  /** Replaces the unix-socket transport. */
  transport?: RemoteTransport;
}

export function socketPathFor(config: RuntimeConfig, node: string): string {
  return config.peers[node] ?? join(config.socketDir, `${node}.sock`);
}

export async function createAdminNode(config: RuntimeConfig, options: AdminNodeOptions = {}): Promise<AdminNode> {
  const io = options.io ?? createNodeProcessIO();
  const transport =
    options.transport ??
    createIpcTransport({
      localNode: config.nodeName,
      io,
      resolveSocket: (node) => socketPathFor(config, node),
      timeoutMs: config.rpcTimeoutMs,
    });

  const corral = createCorral({
    transport,
    io,
    script: config.script,
    defaultFormat: config.defaultFormat,
    configStore: createMemoryConfigStore(config.settings),
  });

  for (const [app, keys] of Object.entries(config.whitelist)) {
    const result = corral.registerConfigWhitelist(keys, app);
    if (!result.ok) {
      logger.warn(`Ignoring whitelist for ${app}: unknown keys ${result.keys.join(", ")}`);
    }
  }

  let server: NodeServer | undefined;
  let signalStop: () => void = () => {};
  const stopRequested = new Promise<void>((resolve) => {
    signalStop = resolve;
  });

  await corral.use([
    createNodesPlugin(config.script, {
      localNode: corral.localNode,
      socketDir: config.socketDir,
      peers: config.peers,
    }),
    createStatusPlugin(config.script),
    createStopPlugin(config.script, {
      isServing: () => server !== undefined,
      requestStop: () => signalStop(),
    }),
  ]);

  const socketPath = socketPathFor(config, corral.localNode);

  return {
    corral,
    socketPath,

    async serve(): Promise<NodeServer> {
      if (server) return server;
      const created = createNodeServer({ target: corral, io: corral.io, socketPath });
      await created.start();
      server = created;
      logger.info(`Node ${corral.localNode} serving on ${socketPath}`);
      return created;
    },

    stopped: () => stopRequested,

    async dispose(): Promise<void> {
      if (server) {
        await server.stop();
        server = undefined;
      }
      await corral.dispose();
    },
  };
}

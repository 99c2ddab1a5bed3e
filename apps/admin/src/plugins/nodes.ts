/**
 * Node discovery from the runtime config: the local node, configured peers,
 * and every node with a socket in the shared socket directory. Sockets of
 * CLI processes waiting on a remote command are not cluster members.
 */

import { readdirSync } from "node:fs";
import process from "node:process";
import type { CliPlugin, NodeFinder } from "@corral/sdk";
import { list } from "@corral/sdk";
import { NodeNameSchema, createLogger } from "@corral/shared";

const logger = createLogger("NodeFinder");

const SOCKET_SUFFIX = ".sock";

/** Prefix of the short-lived node a CLI serves while a `--node` command runs. */
export const CLI_NODE_PREFIX = "cli-";

export function cliNodeName(node: string): string {
  return `${CLI_NODE_PREFIX}${process.pid}@${node}`;
}

export interface NodeDiscoveryOptions {
  localNode: string;
  socketDir: string;
  peers: Readonly<Record<string, string>>;
}

export function createSocketDirFinder(options: NodeDiscoveryOptions): NodeFinder {
  return () => {
    const found = new Set<string>([options.localNode, ...Object.keys(options.peers)]);
    let entries: string[] = [];
    try {
      entries = readdirSync(options.socketDir);
    } catch (err) {
      logger.debug(`Socket directory not readable: ${options.socketDir}`, { error: String(err) });
    }
    for (const entry of entries) {
      if (!entry.endsWith(SOCKET_SUFFIX)) continue;
      const name = entry.slice(0, -SOCKET_SUFFIX.length);
      if (name.startsWith(CLI_NODE_PREFIX)) continue;
      if (NodeNameSchema.safeParse(name).success) found.add(name);
    }
    return [...found].sort();
  };
}

export function createNodesPlugin(script: string, options: NodeDiscoveryOptions): CliPlugin {
  return {
    name: "nodes",

    register(api) {
      api.registerNodeFinder(createSocketDirFinder(options));
      api.registerCommand([script, "nodes"], [], [], async (_path, _keys, _flags, ctx) => [
        list(await ctx.nodes(), "Nodes"),
      ]);
      api.registerUsage([script, "nodes"], `Usage: ${script} nodes`);
    },
  };
}

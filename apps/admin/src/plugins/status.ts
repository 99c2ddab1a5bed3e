/**
 * `<script> status`: node liveness, one row per node.
 *
 * With --all every node from the node finder is pinged; any node that does
 * not answer makes the exit code 2.
 */

import type { CliPlugin } from "@corral/sdk";
import { alert, exitStatus, table, text } from "@corral/sdk";
import { RpcMethod, multicall } from "@corral/core";

export const STATUS_DOWN_EXIT_CODE = 2;

export function createStatusPlugin(script: string): CliPlugin {
  return {
    name: "status",

    register(api) {
      api.registerCommand([script, "status"], [], [], async (_path, _keys, _flags, ctx) => {
        const nodes = ctx.globals.all ? await ctx.nodes() : [ctx.localNode];
        const outcome = await multicall(nodes, async (node) => {
          if (node !== ctx.localNode) await ctx.transport.call(node, RpcMethod.PING);
        });

        const rows = nodes.map((node) => ({
          node,
          state: outcome.down.some((failure) => failure.node === node) ? "down" : "up",
        }));

        if (outcome.down.length === 0) return [table(rows)];
        return exitStatus(
          STATUS_DOWN_EXIT_CODE,
          [table(rows), alert(outcome.down.map(({ node, error }) => text(`${node}: ${error.message}`)))],
          ctx.globals.format ?? "human",
        );
      });

      api.registerUsage([script, "status"], `Usage: ${script} status [--all]`);
    },
  };
}

/**
 * Built-in config commands, registered under the script name:
 *
 *   <script> show <key>...            current values, one row per node
 *   <script> set <key>=<value>...     whitelisted keys only
 *   <script> describe <key>...        value, settable, whitelisting apps
 *
 * `show` and `set` fan out to every node with --all.
 */

import type {
  CommandContext,
  HandlerResult,
  RegistrationApi,
  StatusElement,
  TableCell,
} from "@corral/sdk";
import { ErrorCode, HandlerError, TransportError, ValidationError, exitStatus, table, text } from "@corral/sdk";
import { createLogger, validateInput } from "@corral/shared";
import type { ZodType, ZodTypeDef } from "zod";
import { multicall, type MulticallResult } from "../execution/fanout.js";
import type { ConfigRegistry } from "../infrastructure/config-registry.js";
import { formatError } from "../output/error-formatter.js";
import {
  ConfigSetResultSchema,
  ConfigShowResultSchema,
  RpcMethod,
} from "../transport/types.js";

const logger = createLogger("ConfigCommands");

type CommandRegistration = Pick<RegistrationApi, "registerCommand" | "registerUsage">;

function requireKeys(names: readonly string[], command: string): void {
  if (names.length === 0) {
    throw new ValidationError(`${command} needs at least one config key`, { code: ErrorCode.MISSING_KEY });
  }
}

async function callNode<T, I>(
  ctx: CommandContext,
  node: string,
  method: string,
  params: unknown,
  schema: ZodType<T, ZodTypeDef, I>,
): Promise<T> {
  const reply = await ctx.transport.call(node, method, params);
  const result = validateInput(schema, reply);
  if (!result.success) {
    throw new TransportError(node, `malformed ${method} reply: ${result.error}`);
  }
  return result.data;
}

/** Local node answers directly; --all reaches every node through the transport. */
async function onNodes<T>(
  ctx: CommandContext,
  local: () => Promise<T>,
  remote: (node: string) => Promise<T>,
): Promise<MulticallResult<T>> {
  const nodes = ctx.globals.all ? await ctx.nodes() : [ctx.localNode];
  return multicall(nodes, (node) => (node === ctx.localNode ? local() : remote(node)));
}

/**
 * Without --all the local failure is rethrown as is. With --all the
 * reachable nodes' output is kept, followed by a PARTIAL_FAILURE alert
 * naming the failed nodes, and the exit code is 1.
 */
function withDownNodes<T>(
  path: readonly string[],
  ctx: CommandContext,
  outcome: MulticallResult<T>,
  status: StatusElement[],
): HandlerResult {
  if (outcome.down.length === 0) return status;
  if (!ctx.globals.all) throw outcome.down[0].error;
  const error = new HandlerError(path, `${path.join(" ")} failed on ${outcome.down.length} node(s)`, {
    code: ErrorCode.PARTIAL_FAILURE,
    failedNodes: outcome.down.map((d) => `${d.node}: ${d.error.message}`),
  });
  logger.warn(error.message, { code: error.code, nodes: outcome.down.map((d) => d.node) });
  return exitStatus(1, [...status, ...formatError(error)], ctx.globals.format ?? "human");
}

export function registerConfigCommands(api: CommandRegistration, config: ConfigRegistry, script: string): void {
  api.registerCommand([script, "show"], "_", [], async (path, _keys, _flags, ctx) => {
    const names = ctx.args.overflow;
    requireKeys(names, "show");

    const outcome = await onNodes(
      ctx,
      async () => config.show(names),
      (node) => callNode(ctx, node, RpcMethod.CONFIG_SHOW, { keys: names }, ConfigShowResultSchema),
    );

    const rows = outcome.results.map(({ node, value }) => {
      const row: Record<string, TableCell> = { node };
      for (const key of names) row[key] = value[key] ?? "";
      return row;
    });
    return withDownNodes(path, ctx, outcome, rows.length > 0 ? [table(rows)] : []);
  });

  api.registerCommand([script, "set"], "_", "_", async (path, keys, flags, ctx) => {
    if (ctx.args.overflow.length > 0) {
      throw new ValidationError(`Expected key=value, got: ${ctx.args.overflow[0]}`, {
        code: ErrorCode.INVALID_VALUE,
        value: ctx.args.overflow[0],
      });
    }
    const values = Object.fromEntries(Object.entries(keys).map(([key, value]) => [key, String(value)]));
    requireKeys(Object.keys(values), "set");

    const outcome = await onNodes(
      ctx,
      () => config.set(values, flags),
      async (node) => {
        const reply = await callNode(ctx, node, RpcMethod.CONFIG_SET, { values, flags }, ConfigSetResultSchema);
        return reply.messages;
      },
    );

    const elements: StatusElement[] = [];
    for (const { node, value: messages } of outcome.results) {
      for (const message of messages) {
        elements.push(text(ctx.globals.all ? `${node}: ${message}` : message));
      }
    }

    return withDownNodes(path, ctx, outcome, elements);
  });

  api.registerCommand([script, "describe"], "_", [], (_path, _keys, _flags, ctx) => {
    const names = ctx.args.overflow;
    requireKeys(names, "describe");
    const rows = config.describe(names).map((d) => ({
      key: d.key,
      value: d.value,
      settable: d.settable,
      apps: d.apps.join(","),
    }));
    return [table(rows)];
  });

  api.registerUsage(
    [script],
    [
      `Usage: ${script} <command> [options]`,
      "",
      "Config commands:",
      `  ${script} show <key>...          Show config values`,
      `  ${script} set <key>=<value>...   Set whitelisted config values`,
      `  ${script} describe <key>...      Describe config keys`,
      "",
      "Global options:",
      "  --all             Run on every node",
      "  --format <name>   Output format (human, json, csv)",
      "  -h, --help        Show usage",
    ].join("\n"),
  );
  api.registerUsage([script, "show"], `Usage: ${script} show <key>... [--all]`);
  api.registerUsage([script, "set"], `Usage: ${script} set <key>=<value>... [--all]`);
  api.registerUsage([script, "describe"], `Usage: ${script} describe <key>...`);
}

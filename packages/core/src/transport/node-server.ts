/**
 * Node server: the RPC methods a node answers for its peers.
 *
 *   ping          liveness, returns the node name
 *   stderr.write  write text to this node's local stderr
 *   corral.run    run argv here on behalf of `origin`; stdout is captured
 *                 into the reply, stderr is forwarded to `origin`
 *   config.show   formatted values of the given keys
 *   config.set    set whitelisted keys and run their callbacks
 */

import type { RemoteRunResult } from "@corral/sdk";
import { createLogger, generateId, validateInput } from "@corral/shared";
import type { ZodType, ZodTypeDef } from "zod";
import { runInCallContext } from "../execution/call-context.js";
import type { ConfigRegistry } from "../infrastructure/config-registry.js";
import type { ProcessIO } from "../output/process-io.js";
import { IpcServer } from "./ipc-server.js";
import type { RpcHandler } from "./types.js";
import {
  ConfigSetParamsSchema,
  ConfigShowParamsSchema,
  RpcErrorCode,
  RpcFault,
  RpcMethod,
  RunParamsSchema,
  StderrParamsSchema,
} from "./types.js";

const logger = createLogger("NodeServer");

/** The part of a Corral instance the RPC methods reach. */
export interface RpcTarget {
  readonly localNode: string;
  readonly config: ConfigRegistry;
  run(argv: readonly string[]): Promise<number>;
}

export interface RpcHandlerOptions {
  target: RpcTarget;
  io: ProcessIO;
}

function params<T, I>(schema: ZodType<T, ZodTypeDef, I>, method: string, input: unknown): T {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new RpcFault(RpcErrorCode.INVALID_PARAMS, `Invalid params for ${method}: ${result.error}`);
  }
  return result.data;
}

export function createRpcHandler(options: RpcHandlerOptions): RpcHandler {
  const { target, io } = options;

  return async (method: string, input: unknown): Promise<unknown> => {
    switch (method) {
      case RpcMethod.PING:
        return target.localNode;

      case RpcMethod.STDERR_WRITE: {
        const { text } = params(StderrParamsSchema, method, input);
        io.writeStderr(text);
        return true;
      }

      case RpcMethod.RUN: {
        const { argv, origin, traceId = generateId() } = params(RunParamsSchema, method, input);
        let stdout = "";
        const runLogger = logger.child("run");
        runLogger.setContext({ node: origin, traceId, command: argv.join(" ") });
        runLogger.info("Running remote command");
        const stop = runLogger.time("corral.run");
        const exitCode = await runInCallContext(
          {
            originNode: origin,
            traceId,
            stdout: (chunk) => {
              stdout += chunk;
            },
          },
          () => target.run(argv),
        );
        runLogger.info("Remote command finished", { exitCode, durationMs: stop() });
        const result: RemoteRunResult = { exitCode, stdout };
        return result;
      }

      case RpcMethod.CONFIG_SHOW: {
        const { keys } = params(ConfigShowParamsSchema, method, input);
        return target.config.show(keys);
      }

      case RpcMethod.CONFIG_SET: {
        const { values, flags } = params(ConfigSetParamsSchema, method, input);
        const messages = await target.config.set(values, flags);
        return { messages };
      }

      default:
        throw new RpcFault(RpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  };
}

export interface NodeServerOptions extends RpcHandlerOptions {
  socketPath: string;
}

export interface NodeServer {
  readonly socketPath: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createNodeServer(options: NodeServerOptions): NodeServer {
  const server = new IpcServer({ socketPath: options.socketPath, handler: createRpcHandler(options) });
  return {
    socketPath: options.socketPath,
    start: () => server.start(),
    stop: () => server.stop(),
  };
}

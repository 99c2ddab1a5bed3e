/**
 * Wire types for node-to-node RPC.
 *
 * Protocol: line-delimited JSON over a unix domain socket. One request
 * object per line, one response per request, matched by `id`.
 */

import { z } from "zod";

export const RpcRequestSchema = z.object({
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export const RpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type RpcError = z.infer<typeof RpcErrorSchema>;

export const RpcResponseSchema = z.object({
  id: z.union([z.string(), z.number()]),
  result: z.unknown().optional(),
  error: RpcErrorSchema.optional(),
});

export type RpcResponse = z.infer<typeof RpcResponseSchema>;

/** JSON-RPC 2.0 error codes. */
export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/** An error that crosses the wire with its RPC code intact. */
export class RpcFault extends Error {
  constructor(
    public readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = "RpcFault";
  }
}

/** Serves one node's RPC methods. */
export type RpcHandler = (method: string, params: unknown) => Promise<unknown>;

export const RpcMethod = {
  RUN: "corral.run",
  STDERR_WRITE: "stderr.write",
  PING: "ping",
  CONFIG_SHOW: "config.show",
  CONFIG_SET: "config.set",
} as const;

export const RunParamsSchema = z.object({
  argv: z.array(z.string()),
  origin: z.string().min(1),
  traceId: z.string().optional(),
});

export type RunParams = z.infer<typeof RunParamsSchema>;

export const RemoteRunResultSchema = z.object({
  exitCode: z.number().int(),
  stdout: z.string(),
});

export const StderrParamsSchema = z.object({
  text: z.string(),
});

export const ConfigShowParamsSchema = z.object({
  keys: z.array(z.string()),
});

export const ConfigShowResultSchema = z.record(z.string());

export const ConfigSetParamsSchema = z.object({
  values: z.record(z.string()),
  flags: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

export const ConfigSetResultSchema = z.object({
  messages: z.array(z.string()),
});

/**
 * Zod schema for the runtime configuration of a corral-based binary.
 *
 * Loaded from an optional JSON file and overlaid with environment
 * variables by the binary before anything is registered.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/** Node names travel in RPC payloads and socket file names. */
export const NodeNameSchema = z
  .string()
  .min(1, "Node name must not be empty")
  .regex(/^[A-Za-z0-9_.@-]+$/, "Node name may only contain letters, digits and _ . @ -");

export const RuntimeConfigSchema = z.object({
  nodeName: NodeNameSchema.default("local"),
  script: z.string().min(1, "Script name must not be empty").default("corral-admin"),
  defaultFormat: z.string().min(1).default("human"),
  socketDir: z.string().min(1).default(join(tmpdir(), "corral")),
  rpcTimeoutMs: z.number().int().positive().default(10000),
  /** Node name → socket path, for nodes outside socketDir. */
  peers: z.record(NodeNameSchema, z.string().min(1)).default({}),
  /** Initial values for the in-memory config store. */
  settings: z.record(z.string()).default({}),
  /** Keys that `set` may change, per owning application. */
  whitelist: z.record(z.array(z.string())).default({}),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;

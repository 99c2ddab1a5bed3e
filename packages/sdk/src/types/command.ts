/**
 * Command registration types.
 */

import type { HandlerResult } from "./status.js";
import type { RemoteTransport } from "./transport.js";

/** Pattern token that matches any single argv token. */
export const WILDCARD = "*";

/** One segment of a registered command pattern. */
export type Segment =
  | { kind: "literal"; value: string }
  | { kind: "wildcard" };

export type CommandPattern = readonly Segment[];

/**
 * Pattern as written at registration time: plain strings are literals,
 * `"*"` is a wildcard (e.g. `["cluster", "join", "*"]`).
 */
export type PatternInput = readonly string[];

export type Datatype = "string" | "integer" | "float" | "boolean" | "flag";

/** Integers beyond the safe range arrive as bigint. */
export type ArgValue = string | number | bigint | boolean;

export interface KeySpecEntry {
  name: string;
  /** Defaults to "string". Keys cannot be presence flags. */
  datatype?: Exclude<Datatype, "flag">;
  /** Defaults to true. */
  required?: boolean;
  description?: string;
}

export interface FlagSpecEntry {
  name: string;
  /** Single-letter alias, used as `-c`. */
  shortname?: string;
  /** Defaults to "string". */
  datatype?: Datatype;
  /** Defaults to false. */
  required?: boolean;
  description?: string;
}

/** `"_"` accepts anything and leaves validation to the handler. */
export type AnySpec = "_";

export type KeySpec = readonly KeySpecEntry[] | AnySpec;
export type FlagSpec = readonly FlagSpecEntry[] | AnySpec;

/** Flags recognized by every command, extracted before handler validation. */
export interface GlobalFlags {
  all: boolean;
  help: boolean;
  format?: string;
}

export interface ParsedArgs {
  readonly keys: Readonly<Record<string, ArgValue>>;
  readonly flags: Readonly<Record<string, ArgValue>>;
  /** Positional tokens beyond the key spec; only ever non-empty for `"_"` key specs. */
  readonly overflow: readonly string[];
  readonly globals: Readonly<GlobalFlags>;
}

/** Extra context handed to every handler alongside path, keys and flags. */
export interface CommandContext {
  readonly args: ParsedArgs;
  readonly globals: Readonly<GlobalFlags>;
  readonly localNode: string;
  readonly transport: RemoteTransport;
  /** Cluster members from the registered node finder (or just the local node). */
  nodes(): Promise<string[]>;
}

export type CommandHandler = (
  path: string[],
  keys: Readonly<Record<string, ArgValue>>,
  flags: Readonly<Record<string, ArgValue>>,
  ctx: CommandContext,
) => HandlerResult | Promise<HandlerResult>;

export interface CommandEntry {
  pattern: CommandPattern;
  keySpec: KeySpec;
  flagSpec: FlagSpec;
  handler: CommandHandler;
}

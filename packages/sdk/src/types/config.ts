/**
 * Config registry contracts.
 */

import type { ArgValue } from "./command.js";

/**
 * Invoked after `set` has stored a new value for `key`. A returned string is
 * shown to the operator.
 */
export type ConfigCallback = (
  key: string,
  value: string,
  flags: Readonly<Record<string, ArgValue>>,
) => string | undefined | void | Promise<string | undefined | void>;

/** Turns a stored value into its display form for `show`. */
export type ConfigFormatter = (value: string) => string;

/** Key-value store that owns the actual configuration values. */
export interface ConfigStore {
  /** Every key the store recognizes. */
  keys(): string[];
  has(key: string): boolean;
  get(key: string): string | undefined;
  set(key: string, value: string): void | Promise<void>;
}

export type WhitelistResult =
  | { ok: true }
  | { ok: false; error: "invalid_config_keys"; keys: string[] };

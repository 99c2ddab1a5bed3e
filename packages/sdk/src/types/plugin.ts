/**
 * Plugin contract: modules that register commands at load time.
 */

import type { CommandHandler, FlagSpec, KeySpec, PatternInput } from "./command.js";
import type { ConfigCallback, ConfigFormatter, WhitelistResult } from "./config.js";
import type { NodeFinder } from "./transport.js";
import type { Writer } from "./writer.js";

/** Usage text, or a thunk evaluated when usage is printed. */
export type Usage = string | (() => string);

/** The mutation surface of the registry service. */
export interface RegistrationApi {
  registerCommand(pattern: PatternInput, keySpec: KeySpec, flagSpec: FlagSpec, handler: CommandHandler): void;
  unregisterCommand(pattern: PatternInput): boolean;
  registerUsage(path: readonly string[], usage: Usage): void;
  unregisterUsage(path: readonly string[]): boolean;
  registerWriter(format: string, writer: Writer): void;
  unregisterWriter(format: string): boolean;
  registerConfig(key: string, callback: ConfigCallback): void;
  unregisterConfig(key: string): boolean;
  registerFormatter(key: string, formatter: ConfigFormatter): void;
  unregisterFormatter(key: string): boolean;
  registerConfigWhitelist(keys: readonly string[], app: string): WhitelistResult;
  unregisterConfigWhitelist(keys: readonly string[], app: string): WhitelistResult;
  registerNodeFinder(finder: NodeFinder): void;
  unregisterNodeFinder(): void;
}

export interface CliPlugin {
  name: string;
  /** Plugins that must register before this one. */
  after?: string[];
  register(api: RegistrationApi): void | Promise<void>;
  dispose?(): void | Promise<void>;
}

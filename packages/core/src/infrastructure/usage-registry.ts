/**
 * UsageRegistry: command-path prefix → help text.
 *
 * Independent of command registration: a path may have usage without a
 * command and vice versa. Lookup returns the longest registered prefix.
 */

import type { Usage } from "@corral/sdk";
import { createLogger } from "@corral/shared";

const logger = createLogger("UsageRegistry");

export interface UsageRegistry {
  register(path: readonly string[], usage: Usage): void;
  unregister(path: readonly string[]): boolean;
  /** Usage of the longest registered prefix of `path`, thunks evaluated. */
  resolve(path: readonly string[]): string | undefined;
  clear(): void;
}

function pathKey(path: readonly string[]): string {
  return JSON.stringify(path);
}

export function createUsageRegistry(): UsageRegistry {
  const entries = new Map<string, Usage>();

  return {
    register(path: readonly string[], usage: Usage): void {
      logger.debug(`Registering usage: ${path.join(" ")}`);
      entries.set(pathKey(path), usage);
    },

    unregister(path: readonly string[]): boolean {
      return entries.delete(pathKey(path));
    },

    resolve(path: readonly string[]): string | undefined {
      for (let length = path.length; length > 0; length--) {
        const usage = entries.get(pathKey(path.slice(0, length)));
        if (usage !== undefined) {
          return typeof usage === "function" ? usage() : usage;
        }
      }
      return undefined;
    },

    clear(): void {
      entries.clear();
    },
  };
}

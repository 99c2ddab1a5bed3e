/**
 * NodeRegistry: the single active node finder.
 *
 * Registering a finder replaces the previous one. Without a finder the
 * cluster is just the local node.
 */

import type { NodeFinder } from "@corral/sdk";
import { createLogger } from "@corral/shared";

const logger = createLogger("NodeRegistry");

export interface NodeRegistry {
  register(finder: NodeFinder): void;
  unregister(): void;
  nodes(): Promise<string[]>;
}

export function createNodeRegistry(localNode: string): NodeRegistry {
  let finder: NodeFinder | undefined;

  return {
    register(next: NodeFinder): void {
      if (finder) logger.debug("Replacing node finder");
      finder = next;
    },

    unregister(): void {
      finder = undefined;
    },

    async nodes(): Promise<string[]> {
      if (!finder) return [localNode];
      return [...new Set(await finder())];
    },
  };
}

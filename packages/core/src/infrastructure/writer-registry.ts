/**
 * WriterRegistry: format name → writer.
 */

import type { Writer } from "@corral/sdk";
import { RenderError } from "@corral/sdk";
import { createLogger } from "@corral/shared";

const logger = createLogger("WriterRegistry");

export interface WriterRegistry {
  register(format: string, writer: Writer): void;
  unregister(format: string): boolean;
  get(format: string): Writer | undefined;
  /** Throws RenderError when no writer is registered for `format`. */
  require(format: string): Writer;
  list(): string[];
  clear(): void;
}

export function createWriterRegistry(): WriterRegistry {
  const writers = new Map<string, Writer>();

  return {
    register(format: string, writer: Writer): void {
      logger.debug(`${writers.has(format) ? "Replacing" : "Registering"} writer: ${format}`);
      writers.set(format, writer);
    },

    unregister(format: string): boolean {
      return writers.delete(format);
    },

    get(format: string): Writer | undefined {
      return writers.get(format);
    },

    require(format: string): Writer {
      const writer = writers.get(format);
      if (!writer) {
        logger.warn(`No writer registered for format: ${format}`);
        throw new RenderError(format);
      }
      return writer;
    },

    list(): string[] {
      return Array.from(writers.keys());
    },

    clear(): void {
      writers.clear();
    },
  };
}

/**
 * CommandRegistry: pattern → (key spec, flag spec, handler).
 *
 * Re-registering an identical pattern replaces the previous entry. Matching
 * picks the most specific pattern that matches a prefix of argv; see
 * parser/pattern.ts for the ordering.
 */

import type { CommandEntry, CommandHandler, FlagSpec, KeySpec, PatternInput } from "@corral/sdk";
import { UnknownCommandError } from "@corral/sdk";
import { createLogger } from "@corral/shared";
import {
  compareSpecificity,
  compilePattern,
  formatPattern,
  matchesPrefix,
  patternKey,
  specificity,
} from "../parser/pattern.js";
import { checkFlagSpec, checkKeySpec } from "../parser/spec-schema.js";
import { isFlagToken } from "../parser/tokens.js";

const logger = createLogger("CommandRegistry");

export interface CommandMatch {
  entry: CommandEntry;
  /** The argv tokens consumed by the pattern, wildcards resolved. */
  path: string[];
  /** Unconsumed argv, handed to the parser. */
  rest: string[];
}

export interface CommandRegistry {
  register(pattern: PatternInput, keySpec: KeySpec, flagSpec: FlagSpec, handler: CommandHandler): void;
  unregister(pattern: PatternInput): boolean;
  /** Most specific match, or undefined. */
  find(argv: readonly string[]): CommandMatch | undefined;
  /** Like find(), but throws UnknownCommandError naming the attempted path. */
  match(argv: readonly string[]): CommandMatch;
  list(): CommandEntry[];
  clear(): void;
}

interface StoredEntry {
  entry: CommandEntry;
  seq: number;
}

/** The command-looking prefix of argv: every token before the first flag. */
export function leadingPath(argv: readonly string[]): string[] {
  const firstFlag = argv.findIndex(isFlagToken);
  return firstFlag === -1 ? [...argv] : argv.slice(0, firstFlag);
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, StoredEntry>();
  let seq = 0;

  function find(argv: readonly string[]): CommandMatch | undefined {
    let best: StoredEntry | undefined;
    for (const stored of commands.values()) {
      if (!matchesPrefix(stored.entry.pattern, argv)) continue;
      if (!best) {
        best = stored;
        continue;
      }
      const order = compareSpecificity(specificity(stored.entry.pattern), specificity(best.entry.pattern));
      if (order > 0 || (order === 0 && stored.seq > best.seq)) {
        best = stored;
      }
    }
    if (!best) return undefined;
    const length = best.entry.pattern.length;
    return {
      entry: best.entry,
      path: argv.slice(0, length),
      rest: argv.slice(length),
    };
  }

  return {
    register(pattern: PatternInput, keySpec: KeySpec, flagSpec: FlagSpec, handler: CommandHandler): void {
      const compiled = compilePattern(pattern);
      checkKeySpec(keySpec);
      checkFlagSpec(flagSpec);
      const key = patternKey(compiled);
      if (commands.has(key)) {
        logger.debug(`Replacing command: ${formatPattern(compiled)}`);
      } else {
        logger.debug(`Registering command: ${formatPattern(compiled)}`);
      }
      commands.set(key, {
        entry: { pattern: compiled, keySpec, flagSpec, handler },
        seq: seq++,
      });
    },

    unregister(pattern: PatternInput): boolean {
      const removed = commands.delete(patternKey(compilePattern(pattern)));
      if (removed) logger.debug(`Unregistered command: ${pattern.join(" ")}`);
      return removed;
    },

    find,

    match(argv: readonly string[]): CommandMatch {
      const found = find(argv);
      if (!found) {
        throw new UnknownCommandError(leadingPath(argv));
      }
      return found;
    },

    list(): CommandEntry[] {
      return Array.from(commands.values(), (stored) => stored.entry);
    },

    clear(): void {
      commands.clear();
    },
  };
}

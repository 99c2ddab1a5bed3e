/**
 * Command patterns: compilation, identity and specificity.
 *
 * Specificity is compared lexicographically on:
 *   1. literal segments before the first wildcard
 *   2. pattern length
 *   3. total literal segments
 * The registry breaks any remaining tie by registration recency.
 */

import type { CommandPattern, PatternInput, Segment } from "@corral/sdk";
import { RegistrationError, WILDCARD } from "@corral/sdk";
import { isFlagToken } from "./tokens.js";

export interface Specificity {
  literalPrefix: number;
  length: number;
  literals: number;
}

export function compilePattern(input: PatternInput): CommandPattern {
  if (input.length === 0) {
    throw new RegistrationError("command", "pattern must have at least one segment");
  }
  return input.map((token): Segment => {
    if (token === WILDCARD) return { kind: "wildcard" };
    if (token.length === 0 || /\s/.test(token)) {
      throw new RegistrationError("command", `invalid pattern segment "${token}"`);
    }
    if (token.startsWith("-")) {
      throw new RegistrationError("command", `pattern segment "${token}" looks like a flag`);
    }
    return { kind: "literal", value: token };
  });
}

/** Stable identity of a pattern; equal keys mean re-registration. */
export function patternKey(pattern: CommandPattern): string {
  return JSON.stringify(pattern.map((s) => (s.kind === "wildcard" ? null : s.value)));
}

export function formatPattern(pattern: CommandPattern): string {
  return pattern.map((s) => (s.kind === "wildcard" ? WILDCARD : s.value)).join(" ");
}

/**
 * True when `pattern` matches the first `pattern.length` tokens of argv.
 * Wildcards never swallow a flag.
 */
export function matchesPrefix(pattern: CommandPattern, argv: readonly string[]): boolean {
  if (pattern.length > argv.length) return false;
  return pattern.every((segment, i) =>
    segment.kind === "wildcard" ? !isFlagToken(argv[i]) : segment.value === argv[i],
  );
}

export function specificity(pattern: CommandPattern): Specificity {
  const firstWildcard = pattern.findIndex((s) => s.kind === "wildcard");
  return {
    literalPrefix: firstWildcard === -1 ? pattern.length : firstWildcard,
    length: pattern.length,
    literals: pattern.filter((s) => s.kind === "literal").length,
  };
}

/** Positive when `a` is more specific than `b`, zero on a tie. */
export function compareSpecificity(a: Specificity, b: Specificity): number {
  return a.literalPrefix - b.literalPrefix || a.length - b.length || a.literals - b.literals;
}

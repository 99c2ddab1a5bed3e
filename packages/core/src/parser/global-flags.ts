/**
 * Flags recognized by every command, regardless of its flag spec.
 */

import type { FlagSpecEntry, GlobalFlags } from "@corral/sdk";

export const GLOBAL_FLAGS: readonly FlagSpecEntry[] = [
  { name: "all", datatype: "flag", description: "Run against every node returned by the node finder" },
  { name: "format", datatype: "string", description: "Output format (writer name)" },
  { name: "help", shortname: "h", datatype: "flag", description: "Print usage instead of executing" },
];

export function findGlobalFlag(name: string): FlagSpecEntry | undefined {
  return GLOBAL_FLAGS.find((f) => f.name === name);
}

export function findGlobalShortname(letter: string): FlagSpecEntry | undefined {
  return GLOBAL_FLAGS.find((f) => f.shortname === letter);
}

export function defaultGlobalFlags(): GlobalFlags {
  return { all: false, help: false };
}

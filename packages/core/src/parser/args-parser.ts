/**
 * Argument parser and validator.
 *
 * Runs in three steps over the argv left after command matching:
 *   parse()              split tokens into positionals and raw flags
 *   extractGlobalFlags() pull out --all / --format / --help
 *   validate()           bind keys, check flags against the flag spec and coerce types
 *
 * Any failure throws ValidationError before the handler runs.
 */

import type {
  ArgValue,
  FlagSpecEntry,
  GlobalFlags,
  KeySpecEntry,
  ParsedArgs,
} from "@corral/sdk";
import { ErrorCode, ValidationError } from "@corral/sdk";
import type { CommandMatch } from "../infrastructure/command-registry.js";
import { coerce, describeDatatype } from "./datatypes.js";
import { defaultGlobalFlags, findGlobalFlag, findGlobalShortname } from "./global-flags.js";
import { isFlagToken } from "./tokens.js";

export interface RawFlag {
  name: string;
  /** Undefined when the flag was given without a value. */
  value?: string;
  /** The token as typed, for error messages. */
  token: string;
}

export interface ParsedCommand {
  match: CommandMatch;
  positional: string[];
  flags: RawFlag[];
}

export interface ParsedCommandWithGlobals extends ParsedCommand {
  globals: GlobalFlags;
}

function declaredFlags(match: CommandMatch): readonly FlagSpecEntry[] {
  return match.entry.flagSpec === "_" ? [] : match.entry.flagSpec;
}

function resolveShortname(match: CommandMatch, letter: string, token: string): string {
  const global = findGlobalShortname(letter);
  if (global) return global.name;
  const declared = declaredFlags(match).find((f) => f.shortname === letter);
  if (declared) return declared.name;
  if (match.entry.flagSpec === "_") return letter;
  throw new ValidationError(`Unknown flag: ${token}`, { code: ErrorCode.UNKNOWN_FLAG, field: letter });
}

/** "yes" | "no" | "maybe": whether `--name value` consumes the next token. */
function valueArity(match: CommandMatch, name: string): "yes" | "no" | "maybe" {
  const entry = findGlobalFlag(name) ?? declaredFlags(match).find((f) => f.name === name);
  if (!entry) return "maybe";
  return (entry.datatype ?? "string") === "flag" ? "no" : "yes";
}

/** Split the remaining argv into positional tokens and raw flags. */
export function parse(match: CommandMatch): ParsedCommand {
  const positional: string[] = [];
  const flags: RawFlag[] = [];
  const tokens = match.rest;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token === "--") {
      positional.push(...tokens.slice(i + 1));
      break;
    }

    if (!isFlagToken(token)) {
      positional.push(token);
      continue;
    }

    let name: string;
    let value: string | undefined;
    if (token.startsWith("--")) {
      const body = token.slice(2);
      const eq = body.indexOf("=");
      name = eq === -1 ? body : body.slice(0, eq);
      value = eq === -1 ? undefined : body.slice(eq + 1);
    } else {
      name = resolveShortname(match, token.slice(1), token);
    }

    if (value === undefined) {
      const arity = valueArity(match, name);
      const next = tokens[i + 1];
      const nextIsValue = next !== undefined && next !== "--" && !isFlagToken(next);
      if (arity === "yes") {
        if (!nextIsValue) {
          throw new ValidationError(`Missing value for flag ${token}`, {
            code: ErrorCode.MISSING_FLAG_VALUE,
            field: name,
          });
        }
        value = next;
        i++;
      } else if (arity === "maybe" && nextIsValue) {
        value = next;
        i++;
      }
    }

    flags.push(value === undefined ? { name, token } : { name, value, token });
  }

  return { match, positional, flags };
}

/**
 * Remove global flags from the raw flag list. Runs before handler
 * validation so commands never see them as unknown.
 */
export function extractGlobalFlags(parsed: ParsedCommand): ParsedCommandWithGlobals {
  const globals = defaultGlobalFlags();
  const seen = new Set<string>();
  const remaining: RawFlag[] = [];

  for (const flag of parsed.flags) {
    const global = findGlobalFlag(flag.name);
    if (!global) {
      remaining.push(flag);
      continue;
    }
    if (seen.has(flag.name)) {
      throw new ValidationError(`Flag --${flag.name} given more than once`, {
        code: ErrorCode.DUPLICATE_FLAG,
        field: flag.name,
      });
    }
    seen.add(flag.name);

    if (flag.name === "format") {
      if (!flag.value) {
        throw new ValidationError("Missing value for flag --format", {
          code: ErrorCode.MISSING_FLAG_VALUE,
          field: "format",
        });
      }
      globals.format = flag.value;
    } else {
      const value = coerceFlag(global, flag);
      if (flag.name === "all") globals.all = value === true;
      if (flag.name === "help") globals.help = value === true;
    }
  }

  return { ...parsed, flags: remaining, globals };
}

function coerceFlag(entry: FlagSpecEntry, flag: RawFlag): ArgValue {
  const datatype = entry.datatype ?? "string";
  if (flag.value === undefined) {
    if (datatype === "flag") return true;
    throw new ValidationError(`Missing value for flag --${flag.name}`, {
      code: ErrorCode.MISSING_FLAG_VALUE,
      field: flag.name,
    });
  }
  const result = coerce(datatype, flag.value);
  if (!result.ok) {
    throw new ValidationError(
      `Invalid value for flag --${flag.name}: "${flag.value}" (expected ${describeDatatype(datatype)})`,
      { code: ErrorCode.INVALID_VALUE, field: flag.name, value: flag.value },
    );
  }
  return result.value;
}

function coerceKey(entry: KeySpecEntry, raw: string): ArgValue {
  const datatype = entry.datatype ?? "string";
  const result = coerce(datatype, raw);
  if (!result.ok) {
    throw new ValidationError(
      `Invalid value for key ${entry.name}: "${raw}" (expected ${describeDatatype(datatype)})`,
      { code: ErrorCode.INVALID_VALUE, field: entry.name, value: raw },
    );
  }
  return result.value;
}

/** Split `name=value`; undefined when there is no `=` or the name is empty. */
function splitAssignment(token: string): { name: string; value: string } | undefined {
  const eq = token.indexOf("=");
  if (eq <= 0) return undefined;
  return { name: token.slice(0, eq), value: token.slice(eq + 1) };
}

function validateKeys(parsed: ParsedCommandWithGlobals): { keys: Record<string, ArgValue>; overflow: string[] } {
  // A Map, so that names such as __proto__ bind like any other.
  const keys = new Map<string, ArgValue>();
  const overflow: string[] = [];
  const spec = parsed.match.entry.keySpec;

  const bind = (name: string, value: ArgValue): void => {
    if (keys.has(name)) {
      throw new ValidationError(`Key ${name} given more than once`, { code: ErrorCode.DUPLICATE_KEY, field: name });
    }
    keys.set(name, value);
  };

  if (spec === "_") {
    for (const token of parsed.positional) {
      const assignment = splitAssignment(token);
      if (assignment) {
        bind(assignment.name, assignment.value);
      } else {
        overflow.push(token);
      }
    }
    return { keys: Object.fromEntries(keys), overflow };
  }

  for (const token of parsed.positional) {
    const assignment = splitAssignment(token);
    const named = assignment && spec.find((k) => k.name === assignment.name);
    if (assignment && named) {
      bind(named.name, coerceKey(named, assignment.value));
      continue;
    }
    const next = spec.find((k) => !keys.has(k.name));
    if (!next) {
      throw new ValidationError(`Unexpected argument: ${token}`, {
        code: ErrorCode.EXCESS_ARGUMENTS,
        value: token,
      });
    }
    bind(next.name, coerceKey(next, token));
  }

  const missing = spec.filter((k) => (k.required ?? true) && !keys.has(k.name));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required key: ${missing.map((k) => k.name).join(", ")}`, {
      code: ErrorCode.MISSING_KEY,
      field: missing[0].name,
    });
  }

  return { keys: Object.fromEntries(keys), overflow };
}

function validateFlags(parsed: ParsedCommandWithGlobals): Record<string, ArgValue> {
  const flags = new Map<string, ArgValue>();
  const spec = parsed.match.entry.flagSpec;

  for (const flag of parsed.flags) {
    if (flags.has(flag.name)) {
      throw new ValidationError(`Flag --${flag.name} given more than once`, {
        code: ErrorCode.DUPLICATE_FLAG,
        field: flag.name,
      });
    }
    if (spec === "_") {
      flags.set(flag.name, flag.value ?? true);
      continue;
    }
    const entry = spec.find((f) => f.name === flag.name);
    if (!entry) {
      throw new ValidationError(`Unknown flag: --${flag.name}`, { code: ErrorCode.UNKNOWN_FLAG, field: flag.name });
    }
    flags.set(flag.name, coerceFlag(entry, flag));
  }

  if (spec !== "_") {
    const missing = spec.find((f) => f.required === true && !flags.has(f.name));
    if (missing) {
      throw new ValidationError(`Missing required flag: --${missing.name}`, {
        code: ErrorCode.MISSING_FLAG,
        field: missing.name,
      });
    }
  }

  return Object.fromEntries(flags);
}

/** Bind and type-check keys and flags. The result is frozen. */
export function validate(parsed: ParsedCommandWithGlobals): ParsedArgs {
  const { keys, overflow } = validateKeys(parsed);
  const flags = validateFlags(parsed);
  return Object.freeze({
    keys: Object.freeze(keys),
    flags: Object.freeze(flags),
    overflow: Object.freeze(overflow),
    globals: Object.freeze({ ...parsed.globals }),
  });
}

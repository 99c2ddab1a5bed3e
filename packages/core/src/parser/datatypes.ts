/**
 * Datatype coercion for key and flag values.
 */

import { z } from "zod";
import type { ArgValue, Datatype } from "@corral/sdk";

const TRUE_WORDS = ["true", "on", "yes"];
const FALSE_WORDS = ["false", "off", "no"];

const DATATYPE_SCHEMAS: Record<Datatype, z.ZodType<ArgValue, z.ZodTypeDef, string>> = {
  string: z.string(),
  integer: z
    .string()
    .regex(/^[+-]?\d+$/)
    .transform((s): number | bigint => {
      const n = Number(s);
      return Number.isSafeInteger(n) ? n : BigInt(s);
    }),
  float: z
    .string()
    .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
    .transform(Number)
    .refine(Number.isFinite),
  boolean: z
    .string()
    .transform((s) => s.toLowerCase())
    .refine((s) => TRUE_WORDS.includes(s) || FALSE_WORDS.includes(s))
    .transform((s) => TRUE_WORDS.includes(s)),
  // Presence flags given an explicit value (`--force=false`) read it as a boolean.
  flag: z
    .string()
    .transform((s) => s.toLowerCase())
    .refine((s) => TRUE_WORDS.includes(s) || FALSE_WORDS.includes(s))
    .transform((s) => TRUE_WORDS.includes(s)),
};

export type CoerceResult = { ok: true; value: ArgValue } | { ok: false };

export function coerce(datatype: Datatype, raw: string): CoerceResult {
  const result = DATATYPE_SCHEMAS[datatype].safeParse(raw);
  return result.success ? { ok: true, value: result.data } : { ok: false };
}

/** Human label used in validation messages. */
export function describeDatatype(datatype: Datatype): string {
  return datatype === "flag" ? "boolean" : datatype;
}

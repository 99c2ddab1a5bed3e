/**
 * Zod schemas for key and flag specs supplied at registration time.
 */

import { z } from "zod";
import type { FlagSpec, KeySpec } from "@corral/sdk";
import { RegistrationError } from "@corral/sdk";
import { formatZodError } from "@corral/shared";
import { GLOBAL_FLAGS } from "./global-flags.js";

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const KeySpecEntrySchema = z.object({
  name: z.string().regex(NAME_PATTERN, "invalid key name"),
  datatype: z.enum(["string", "integer", "float", "boolean"]).optional(),
  required: z.boolean().optional(),
  description: z.string().optional(),
});

const FlagSpecEntrySchema = z.object({
  name: z.string().regex(NAME_PATTERN, "invalid flag name"),
  shortname: z.string().regex(/^[A-Za-z]$/, "shortname must be a single letter").optional(),
  datatype: z.enum(["string", "integer", "float", "boolean", "flag"]).optional(),
  required: z.boolean().optional(),
  description: z.string().optional(),
});

const reservedNames = new Set(GLOBAL_FLAGS.map((f) => f.name));
const reservedShortnames = new Set(GLOBAL_FLAGS.flatMap((f) => (f.shortname ? [f.shortname] : [])));

export const KeySpecEntriesSchema = z
  .array(KeySpecEntrySchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    let optionalSeen = false;
    entries.forEach((entry, i) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "name"], message: `duplicate key "${entry.name}"` });
      }
      seen.add(entry.name);
      const required = entry.required ?? true;
      if (required && optionalSeen) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "required"],
          message: `required key "${entry.name}" follows an optional key`,
        });
      }
      if (!required) optionalSeen = true;
    });
  });

export const FlagSpecEntriesSchema = z
  .array(FlagSpecEntrySchema)
  .superRefine((entries, ctx) => {
    const names = new Set<string>();
    const shortnames = new Set<string>();
    entries.forEach((entry, i) => {
      if (reservedNames.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "name"], message: `"--${entry.name}" is a global flag` });
      }
      if (names.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "name"], message: `duplicate flag "${entry.name}"` });
      }
      names.add(entry.name);
      if (entry.shortname !== undefined) {
        if (reservedShortnames.has(entry.shortname)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, "shortname"],
            message: `"-${entry.shortname}" is a global flag`,
          });
        }
        if (shortnames.has(entry.shortname)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, "shortname"],
            message: `duplicate shortname "${entry.shortname}"`,
          });
        }
        shortnames.add(entry.shortname);
      }
    });
  });

/** `"_"` needs no checking; entry lists are validated in full. */
export function checkKeySpec(spec: KeySpec): void {
  if (spec === "_") return;
  const result = KeySpecEntriesSchema.safeParse(spec);
  if (!result.success) {
    throw new RegistrationError("key spec", formatZodError(result.error));
  }
}

export function checkFlagSpec(spec: FlagSpec): void {
  if (spec === "_") return;
  const result = FlagSpecEntriesSchema.safeParse(spec);
  if (!result.success) {
    throw new RegistrationError("flag spec", formatZodError(result.error));
  }
}

/**
 * UUID v4 generation, used for invocation trace ids.
 */

import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

/**
 * Writer contract: one named output format.
 */

import type { Status } from "./status.js";

export interface RenderedOutput {
  stdout: string;
  stderr: string;
}

/** Renders a status payload into the text for each stream. */
export type Writer = (status: Status) => RenderedOutput;

import type { Writer } from "@corral/sdk";
import { humanWriter } from "./human.js";
import { jsonWriter } from "./json.js";
import { csvWriter } from "./csv.js";

export { humanWriter, jsonWriter, csvWriter };

/** Writers registered on every new instance. */
export const BUILTIN_WRITERS: ReadonlyArray<[string, Writer]> = [
  ["human", humanWriter],
  ["json", jsonWriter],
  ["csv", csvWriter],
];

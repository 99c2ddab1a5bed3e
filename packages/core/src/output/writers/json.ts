/**
 * JSON writer: one JSON document per stream.
 *
 * stdout carries the non-alert elements as an array; alerts are written to
 * stderr as `{"alert": [...]}`, one line each.
 */

import type { RenderedOutput, Status, StatusElement } from "@corral/sdk";

export function jsonWriter(status: Status): RenderedOutput {
  const body: StatusElement[] = [];
  let stderr = "";
  for (const element of status) {
    if (element.type === "alert") {
      stderr += `${JSON.stringify({ alert: element.elements })}\n`;
    } else {
      body.push(element);
    }
  }
  const stdout = body.length > 0 || stderr === "" ? `${JSON.stringify(body)}\n` : "";
  return { stdout, stderr };
}

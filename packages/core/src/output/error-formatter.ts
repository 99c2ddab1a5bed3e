/**
 * Turns errors into alert statuses for the human writer.
 */

import type { Status, StatusElement } from "@corral/sdk";
import {
  CorralError,
  HandlerError,
  UnknownCommandError,
  ValidationError,
  alert,
  list,
  text,
} from "@corral/sdk";

/**
 * Usage is appended for unknown-command and validation errors, where it
 * tells the operator what to type instead.
 */
export function formatError(error: Error, usage?: string): Status {
  const elements: StatusElement[] = [];

  if (error instanceof CorralError) {
    elements.push(text(error.message));
  } else {
    elements.push(text(`Error: ${error.message}`));
  }

  if (error instanceof HandlerError && error.failedNodes.length > 0) {
    elements.push(list(error.failedNodes, "Failed nodes"));
  }

  if (usage !== undefined && (error instanceof UnknownCommandError || error instanceof ValidationError)) {
    elements.push(text(usage));
  }

  return [alert(elements)];
}

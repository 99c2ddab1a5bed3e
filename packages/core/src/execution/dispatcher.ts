/**
 * Dispatcher: invokes a matched handler and shapes whatever comes back
 * into one of the three status forms. No retries.
 */

import type {
  CommandContext,
  ErrorStatus,
  HandlerResult,
  ParsedArgs,
  RemoteTransport,
  StatusElement,
} from "@corral/sdk";
import { CorralError, HandlerError, errorStatus, exitStatus } from "@corral/sdk";
import { createLogger } from "@corral/shared";
import type { CommandMatch } from "../infrastructure/command-registry.js";

const logger = createLogger("Dispatcher");

export interface DispatcherDeps {
  transport: RemoteTransport;
  nodes(): Promise<string[]>;
}

const ELEMENT_TYPES = new Set<string>(["text", "list", "table", "alert"]);

function isStatusElement(value: unknown): value is StatusElement {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    ELEMENT_TYPES.has(value.type)
  );
}

function isStatusPayload(value: unknown): value is StatusElement[] {
  return Array.isArray(value) && value.every(isStatusElement);
}

function invalidResult(path: readonly string[]): ErrorStatus {
  return errorStatus(new HandlerError(path, `Command "${path.join(" ")}" returned an invalid status`));
}

/** Check a handler's return value; anything unrecognized becomes an error status. */
export function normalizeResult(path: readonly string[], result: unknown): HandlerResult {
  if (isStatusPayload(result)) return result;
  if (typeof result !== "object" || result === null || !("kind" in result)) {
    return invalidResult(path);
  }
  if (result.kind === "error" && "error" in result && result.error instanceof Error) {
    return errorStatus(result.error);
  }
  if (
    result.kind === "exit" &&
    "status" in result &&
    "exitCode" in result &&
    "format" in result &&
    isStatusPayload(result.status) &&
    typeof result.exitCode === "number" &&
    Number.isInteger(result.exitCode) &&
    typeof result.format === "string"
  ) {
    return exitStatus(result.exitCode, result.status, result.format);
  }
  return invalidResult(path);
}

function wrapError(path: readonly string[], err: unknown): Error {
  if (err instanceof CorralError) return err;
  if (err instanceof Error) return new HandlerError(path, err.message, { cause: err });
  return new HandlerError(path, String(err));
}

export async function execute(match: CommandMatch, args: ParsedArgs, deps: DispatcherDeps): Promise<HandlerResult> {
  const ctx: CommandContext = {
    args,
    globals: args.globals,
    localNode: deps.transport.localNode,
    transport: deps.transport,
    nodes: () => deps.nodes(),
  };

  try {
    const result: unknown = await match.entry.handler(match.path, args.keys, args.flags, ctx);
    return normalizeResult(match.path, result);
  } catch (err) {
    const error = wrapError(match.path, err);
    logger.error(`Command failed: ${match.path.join(" ")}`, { error: error.message });
    return errorStatus(error);
  }
}

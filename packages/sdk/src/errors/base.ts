/**
 * Error hierarchy for command routing and execution.
 */

import { ErrorCode } from "./codes.js";

export class CorralError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CorralError";
  }
}

/** No registered pattern matches the argv prefix. */
export class UnknownCommandError extends CorralError {
  constructor(public readonly path: readonly string[]) {
    super(`Unknown command: ${path.join(" ")}`, ErrorCode.UNKNOWN_COMMAND);
    this.name = "UnknownCommandError";
  }
}

/**
 * Malformed invocation: missing or excess keys, unknown or mistyped flags.
 * `field` names the offending key or flag.
 */
export class ValidationError extends CorralError {
  public readonly field?: string;
  public readonly value?: string;

  constructor(
    message: string,
    options?: { code?: string; field?: string; value?: string },
  ) {
    super(message, options?.code ?? ErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

export class ConfigError extends CorralError {
  public readonly keys: string[];

  constructor(
    message: string,
    options?: { cause?: Error; code?: string; keys?: string[] },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
    this.keys = options?.keys ?? [];
  }
}

/** No writer is registered for the requested format. Never downgraded. */
export class RenderError extends CorralError {
  constructor(public readonly format: string) {
    super(`No writer registered for format "${format}"`, ErrorCode.RENDER_ERROR);
    this.name = "RenderError";
  }
}

export class HandlerError extends CorralError {
  public readonly failedNodes: string[];

  constructor(
    public readonly path: readonly string[],
    message: string,
    options?: { cause?: Error; code?: string; failedNodes?: string[] },
  ) {
    super(message, options?.code ?? ErrorCode.HANDLER_ERROR, options);
    this.name = "HandlerError";
    this.failedNodes = options?.failedNodes ?? [];
  }
}

export class RegistrationError extends CorralError {
  constructor(
    public readonly kind: string,
    message: string,
    cause?: Error,
  ) {
    super(`Invalid ${kind} registration: ${message}`, ErrorCode.REGISTRATION_ERROR, { cause });
    this.name = "RegistrationError";
  }
}

export class TransportError extends CorralError {
  constructor(
    public readonly node: string,
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(`Transport to node "${node}" failed: ${message}`, options?.code ?? ErrorCode.TRANSPORT_ERROR, options);
    this.name = "TransportError";
  }
}

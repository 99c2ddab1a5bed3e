/**
 * Error codes carried on CorralError.code.
 */

export const ErrorCode = {
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",

  VALIDATION_ERROR: "VALIDATION_ERROR",
  MISSING_KEY: "MISSING_KEY",
  EXCESS_ARGUMENTS: "EXCESS_ARGUMENTS",
  DUPLICATE_KEY: "DUPLICATE_KEY",
  UNKNOWN_FLAG: "UNKNOWN_FLAG",
  DUPLICATE_FLAG: "DUPLICATE_FLAG",
  MISSING_FLAG: "MISSING_FLAG",
  MISSING_FLAG_VALUE: "MISSING_FLAG_VALUE",
  INVALID_VALUE: "INVALID_VALUE",

  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_KEY_NOT_WHITELISTED: "CONFIG_KEY_NOT_WHITELISTED",
  CONFIG_KEY_UNKNOWN: "CONFIG_KEY_UNKNOWN",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",

  RENDER_ERROR: "RENDER_ERROR",

  HANDLER_ERROR: "HANDLER_ERROR",
  PARTIAL_FAILURE: "PARTIAL_FAILURE",

  REGISTRATION_ERROR: "REGISTRATION_ERROR",

  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  TRANSPORT_TIMEOUT: "TRANSPORT_TIMEOUT",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Runtime config loading: optional JSON file, then environment overrides,
 * then schema validation.
 */

import { readFileSync } from "node:fs";
import process from "node:process";
import { ConfigError, ErrorCode } from "@corral/sdk";
import { RuntimeConfigSchema, validateInput, type RuntimeConfig } from "@corral/shared";

/** Environment variable → config field. */
export const ENV_OVERRIDES = {
  CORRAL_NODE: "nodeName",
  CORRAL_SOCKET_DIR: "socketDir",
  CORRAL_FORMAT: "defaultFormat",
} as const;

export interface LoadConfigOptions {
  path?: string;
  /** Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
}

function readConfigFile(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadRuntimeConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const input: Record<string, unknown> = options.path ? readConfigFile(options.path) : {};

  const env = options.env ?? process.env;
  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== "") input[field] = value;
  }

  const result = validateInput(RuntimeConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(`Invalid runtime config: ${result.error}`, { code: ErrorCode.CONFIG_VALIDATION_ERROR });
  }
  return result.data;
}

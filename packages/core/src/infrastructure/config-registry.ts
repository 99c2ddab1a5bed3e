/**
 * ConfigRegistry: per-key callbacks and formatters plus the settable-key
 * whitelist, layered over a ConfigStore.
 *
 * Nothing is settable until an application whitelists it. Whitelisting a key
 * the store does not know fails the whole call with the offending keys.
 */

import type {
  ArgValue,
  ConfigCallback,
  ConfigFormatter,
  ConfigStore,
  WhitelistResult,
} from "@corral/sdk";
import { ConfigError, ErrorCode } from "@corral/sdk";
import { createLogger } from "@corral/shared";

const logger = createLogger("ConfigRegistry");

export interface ConfigDescription {
  key: string;
  value: string;
  settable: boolean;
  apps: string[];
}

export interface ConfigRegistry {
  readonly store: ConfigStore;
  registerCallback(key: string, callback: ConfigCallback): void;
  unregisterCallback(key: string): boolean;
  registerFormatter(key: string, formatter: ConfigFormatter): void;
  unregisterFormatter(key: string): boolean;
  whitelist(keys: readonly string[], app: string): WhitelistResult;
  unwhitelist(keys: readonly string[], app: string): WhitelistResult;
  isSettable(key: string): boolean;
  /** Current values, passed through each key's formatter. */
  show(keys: readonly string[]): Record<string, string>;
  /**
   * Store every value, then run each key's callback. Rejects before writing
   * anything if one key is unknown or not whitelisted.
   */
  set(values: Readonly<Record<string, string>>, flags: Readonly<Record<string, ArgValue>>): Promise<string[]>;
  describe(keys: readonly string[]): ConfigDescription[];
  clear(): void;
}

export function createConfigRegistry(store: ConfigStore): ConfigRegistry {
  const callbacks = new Map<string, ConfigCallback>();
  const formatters = new Map<string, ConfigFormatter>();
  const whitelists = new Map<string, Set<string>>();

  function unknownKeys(keys: readonly string[]): string[] {
    return keys.filter((key) => !store.has(key));
  }

  function requireKnown(keys: readonly string[]): void {
    const unknown = unknownKeys(keys);
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown config key: ${unknown.join(", ")}`, {
        code: ErrorCode.CONFIG_KEY_UNKNOWN,
        keys: unknown,
      });
    }
  }

  function appsFor(key: string): string[] {
    return Array.from(whitelists.entries())
      .filter(([, keys]) => keys.has(key))
      .map(([app]) => app);
  }

  return {
    store,

    registerCallback(key: string, callback: ConfigCallback): void {
      logger.debug(`Registering config callback: ${key}`);
      callbacks.set(key, callback);
    },

    unregisterCallback(key: string): boolean {
      return callbacks.delete(key);
    },

    registerFormatter(key: string, formatter: ConfigFormatter): void {
      logger.debug(`Registering config formatter: ${key}`);
      formatters.set(key, formatter);
    },

    unregisterFormatter(key: string): boolean {
      return formatters.delete(key);
    },

    whitelist(keys: readonly string[], app: string): WhitelistResult {
      const invalid = unknownKeys(keys);
      if (invalid.length > 0) {
        logger.warn(`Rejected whitelist for ${app}`, { keys: invalid });
        return { ok: false, error: "invalid_config_keys", keys: invalid };
      }
      const existing = whitelists.get(app) ?? new Set<string>();
      for (const key of keys) existing.add(key);
      whitelists.set(app, existing);
      return { ok: true };
    },

    unwhitelist(keys: readonly string[], app: string): WhitelistResult {
      const invalid = unknownKeys(keys);
      if (invalid.length > 0) {
        return { ok: false, error: "invalid_config_keys", keys: invalid };
      }
      const existing = whitelists.get(app);
      if (existing) {
        for (const key of keys) existing.delete(key);
        if (existing.size === 0) whitelists.delete(app);
      }
      return { ok: true };
    },

    isSettable(key: string): boolean {
      return appsFor(key).length > 0;
    },

    show(keys: readonly string[]): Record<string, string> {
      requireKnown(keys);
      const values: Record<string, string> = {};
      for (const key of keys) {
        const raw = store.get(key) ?? "";
        const formatter = formatters.get(key);
        values[key] = formatter ? formatter(raw) : raw;
      }
      return values;
    },

    async set(
      values: Readonly<Record<string, string>>,
      flags: Readonly<Record<string, ArgValue>>,
    ): Promise<string[]> {
      const keys = Object.keys(values);
      requireKnown(keys);
      const denied = keys.filter((key) => appsFor(key).length === 0);
      if (denied.length > 0) {
        throw new ConfigError(`Config key not settable: ${denied.join(", ")}`, {
          code: ErrorCode.CONFIG_KEY_NOT_WHITELISTED,
          keys: denied,
        });
      }

      const messages: string[] = [];
      for (const key of keys) {
        await store.set(key, values[key]);
        logger.info(`Config key set: ${key}`);
        const callback = callbacks.get(key);
        if (callback) {
          const message = await callback(key, values[key], flags);
          if (typeof message === "string" && message.length > 0) messages.push(message);
        }
      }
      return messages;
    },

    describe(keys: readonly string[]): ConfigDescription[] {
      requireKnown(keys);
      return keys.map((key) => ({
        key,
        value: store.get(key) ?? "",
        settable: appsFor(key).length > 0,
        apps: appsFor(key),
      }));
    },

    clear(): void {
      callbacks.clear();
      formatters.clear();
      whitelists.clear();
    },
  };
}

/** In-process ConfigStore; its initial keys are the only recognized keys. */
export function createMemoryConfigStore(initial: Readonly<Record<string, string>> = {}): ConfigStore {
  const values = new Map(Object.entries(initial));
  return {
    keys: () => Array.from(values.keys()),
    has: (key) => values.has(key),
    get: (key) => values.get(key),
    set: (key, value) => {
      if (!values.has(key)) {
        throw new ConfigError(`Unknown config key: ${key}`, { code: ErrorCode.CONFIG_KEY_UNKNOWN, keys: [key] });
      }
      values.set(key, value);
    },
  };
}

/**
 * PluginLoader: runs each CliPlugin's register() against the registration
 * API, in dependency order.
 */

import type { CliPlugin, RegistrationApi } from "@corral/sdk";
import { RegistrationError } from "@corral/sdk";
import { createLogger } from "@corral/shared";

const logger = createLogger("PluginLoader");

/**
 * Order plugins so that every name in `after` registers first (Kahn's
 * algorithm). Independent plugins keep their given order; `after` names
 * outside the batch are ignored.
 *
 * @throws RegistrationError on a cycle
 */
export function sortPlugins(plugins: readonly CliPlugin[]): CliPlugin[] {
  const byName = new Map(plugins.map((p) => [p.name, p]));
  const pending = new Map<CliPlugin, Set<CliPlugin>>();

  for (const plugin of plugins) {
    const deps = new Set<CliPlugin>();
    for (const name of plugin.after ?? []) {
      const dep = byName.get(name);
      if (dep) {
        deps.add(dep);
      } else {
        logger.debug(`Plugin "${plugin.name}" runs after "${name}", which is not in this batch`);
      }
    }
    pending.set(plugin, deps);
  }

  const sorted: CliPlugin[] = [];
  while (pending.size > 0) {
    const ready = plugins.find((p) => pending.get(p)?.size === 0);
    if (!ready) {
      const names = Array.from(pending.keys()).map((p) => p.name).join(", ");
      throw new RegistrationError("plugin", `circular dependency among plugins: ${names}`);
    }
    pending.delete(ready);
    sorted.push(ready);
    for (const deps of pending.values()) deps.delete(ready);
  }

  return sorted;
}

export interface PluginLoader {
  load(plugin: CliPlugin): Promise<void>;
  loadAll(plugins: readonly CliPlugin[]): Promise<void>;
  loaded(): string[];
  disposeAll(): Promise<void>;
}

export function createPluginLoader(api: RegistrationApi): PluginLoader {
  const plugins = new Map<string, CliPlugin>();

  async function load(plugin: CliPlugin): Promise<void> {
    if (plugins.has(plugin.name)) {
      logger.warn(`Plugin already loaded, skipping: ${plugin.name}`);
      return;
    }
    logger.debug(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.register(api);
    } catch (err) {
      throw new RegistrationError(
        "plugin",
        `${plugin.name}: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      );
    }

    plugins.set(plugin.name, plugin);
    logger.info(`Plugin loaded: ${plugin.name}`);
  }

  return {
    load,

    async loadAll(batch: readonly CliPlugin[]): Promise<void> {
      const ordered = sortPlugins(batch);
      logger.debug(`Plugin load order: ${ordered.map((p) => p.name).join(" → ")}`);
      for (const plugin of ordered) {
        await load(plugin);
      }
    },

    loaded(): string[] {
      return Array.from(plugins.keys());
    },

    /** Reverse load order, so dependents go first. */
    async disposeAll(): Promise<void> {
      for (const plugin of Array.from(plugins.values()).reverse()) {
        if (!plugin.dispose) continue;
        try {
          await plugin.dispose();
        } catch (err) {
          logger.error(`Error disposing plugin ${plugin.name}`, { error: String(err) });
        }
      }
      plugins.clear();
    },
  };
}

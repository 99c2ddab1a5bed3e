export { createCommandRegistry, leadingPath } from "./command-registry.js";
export type { CommandMatch, CommandRegistry } from "./command-registry.js";

export { createUsageRegistry } from "./usage-registry.js";
export type { UsageRegistry } from "./usage-registry.js";

export { createWriterRegistry } from "./writer-registry.js";
export type { WriterRegistry } from "./writer-registry.js";

export { createConfigRegistry, createMemoryConfigStore } from "./config-registry.js";
export type { ConfigDescription, ConfigRegistry } from "./config-registry.js";

export { createNodeRegistry } from "./node-registry.js";
export type { NodeRegistry } from "./node-registry.js";

export { createPluginLoader, sortPlugins } from "./plugin-loader.js";
export type { PluginLoader } from "./plugin-loader.js";

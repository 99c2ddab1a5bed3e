/**
 * Corral: the registry service and invocation pipeline in one object.
 *
 *   match → parse → extract global flags → validate → execute → print
 *
 * Matcher and parser errors abort before the handler runs and print as an
 * error status (exit 1). A format with no writer is never downgraded:
 * run() and print() reject with RenderError.
 */

import type {
  CliPlugin,
  ConfigStore,
  ParsedArgs,
  Printable,
  RegistrationApi,
  RemoteTransport,
} from "@corral/sdk";
import { CorralError, errorStatus } from "@corral/sdk";
import { createLogger } from "@corral/shared";
import { registerConfigCommands } from "../config/config-commands.js";
import { execute } from "../execution/dispatcher.js";
import {
  createCommandRegistry,
  createConfigRegistry,
  createMemoryConfigStore,
  createNodeRegistry,
  createPluginLoader,
  createUsageRegistry,
  createWriterRegistry,
  leadingPath,
  type CommandMatch,
  type CommandRegistry,
  type ConfigRegistry,
  type UsageRegistry,
  type WriterRegistry,
} from "../infrastructure/index.js";
import { DEFAULT_FORMAT, createOutputPipeline } from "../output/pipeline.js";
import { createNodeProcessIO, type ProcessIO } from "../output/process-io.js";
import { BUILTIN_WRITERS } from "../output/writers/index.js";
import { extractGlobalFlags, parse, validate, type ParsedCommandWithGlobals } from "../parser/args-parser.js";
import { createLoopbackTransport } from "../transport/loopback.js";
import type { RpcTarget } from "../transport/node-server.js";

const logger = createLogger("Corral");

export interface CorralOptions {
  /** Ignored when `transport` is given; the transport names the node. */
  localNode?: string;
  transport?: RemoteTransport;
  io?: ProcessIO;
  configStore?: ConfigStore;
  /** Command prefix of the built-in config commands. */
  script?: string;
  /** Writer for bare statuses when no --format is given. */
  defaultFormat?: string;
  /** Register show/set/describe under `script` (default true). */
  configCommands?: boolean;
}

export interface Corral extends RegistrationApi, RpcTarget {
  readonly localNode: string;
  readonly script: string;
  readonly transport: RemoteTransport;
  readonly io: ProcessIO;
  readonly commands: CommandRegistry;
  readonly usage: UsageRegistry;
  readonly writers: WriterRegistry;
  readonly config: ConfigRegistry;

  use(plugins: CliPlugin | readonly CliPlugin[]): Promise<void>;
  /** Invocation entry point; resolves with the process exit code. */
  run(argv: readonly string[]): Promise<number>;
  /** Print entry point; see OutputPipeline.print. */
  print(result: Printable, path: readonly string[], format?: string): Promise<number>;
  nodes(): Promise<string[]>;
  dispose(): Promise<void>;
}

interface Invocation {
  result: Printable;
  path: readonly string[];
  format?: string;
}

function asksForHelp(argv: readonly string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

/** Validation problems become an error status; anything else propagates. */
function rejected(err: unknown, path: readonly string[]): Invocation {
  if (err instanceof CorralError) {
    logger.debug(`Rejected ${path.join(" ")}: ${err.message}`, { code: err.code });
    return { result: errorStatus(err), path };
  }
  throw err;
}

export function createCorral(options: CorralOptions = {}): Corral {
  const io = options.io ?? createNodeProcessIO();
  const localNode = options.transport?.localNode ?? options.localNode ?? "local";
  const transport = options.transport ?? createLoopbackTransport(localNode, io);
  const script = options.script ?? "corral-admin";
  const defaultFormat = options.defaultFormat ?? DEFAULT_FORMAT;

  const commands = createCommandRegistry();
  const usage = createUsageRegistry();
  const writers = createWriterRegistry();
  const config = createConfigRegistry(options.configStore ?? createMemoryConfigStore());
  const nodeRegistry = createNodeRegistry(localNode);
  const pipeline = createOutputPipeline({ writers, usage, transport, io });

  for (const [format, writer] of BUILTIN_WRITERS) {
    writers.register(format, writer);
  }

  const api: RegistrationApi = {
    registerCommand: (pattern, keySpec, flagSpec, handler) => commands.register(pattern, keySpec, flagSpec, handler),
    unregisterCommand: (pattern) => commands.unregister(pattern),
    registerUsage: (path, text) => usage.register(path, text),
    unregisterUsage: (path) => usage.unregister(path),
    registerWriter: (format, writer) => writers.register(format, writer),
    unregisterWriter: (format) => writers.unregister(format),
    registerConfig: (key, callback) => config.registerCallback(key, callback),
    unregisterConfig: (key) => config.unregisterCallback(key),
    registerFormatter: (key, formatter) => config.registerFormatter(key, formatter),
    unregisterFormatter: (key) => config.unregisterFormatter(key),
    registerConfigWhitelist: (keys, app) => config.whitelist(keys, app),
    unregisterConfigWhitelist: (keys, app) => config.unwhitelist(keys, app),
    registerNodeFinder: (finder) => nodeRegistry.register(finder),
    unregisterNodeFinder: () => nodeRegistry.unregister(),
  };

  const plugins = createPluginLoader(api);

  if (options.configCommands !== false) {
    registerConfigCommands(api, config, script);
  }

  async function invoke(argv: readonly string[]): Promise<Invocation> {
    let match: CommandMatch;
    try {
      match = commands.match(argv);
    } catch (err) {
      const path = leadingPath(argv);
      if (asksForHelp(argv)) return { result: "usage", path };
      return rejected(err, path);
    }

    let parsed: ParsedCommandWithGlobals;
    try {
      parsed = extractGlobalFlags(parse(match));
    } catch (err) {
      return rejected(err, match.path);
    }

    if (parsed.globals.help) {
      return { result: "usage", path: match.path };
    }

    // Fails fast with RenderError before anything runs.
    const format = parsed.globals.format ?? defaultFormat;
    writers.require(format);

    let args: ParsedArgs;
    try {
      args = validate(parsed);
    } catch (err) {
      return rejected(err, match.path);
    }

    const result = await execute(match, args, { transport, nodes: () => nodeRegistry.nodes() });
    return { result, path: match.path, format };
  }

  return {
    ...api,
    localNode,
    script,
    transport,
    io,
    commands,
    usage,
    writers,
    config,

    async use(batch: CliPlugin | readonly CliPlugin[]): Promise<void> {
      await plugins.loadAll("register" in batch ? [batch] : batch);
    },

    async run(argv: readonly string[]): Promise<number> {
      const { result, path, format } = await invoke(argv);
      return pipeline.print(result, path, format);
    },

    print: (result, path, format) => pipeline.print(result, path, format),

    nodes: () => nodeRegistry.nodes(),

    async dispose(): Promise<void> {
      await plugins.disposeAll();
      transport.close?.();
      logger.debug("Disposed");
    },
  };
}

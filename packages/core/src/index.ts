// Facade
export { createCorral } from "./corral/index.js";
export type { Corral, CorralOptions } from "./corral/index.js";

// Registries
export {
  createCommandRegistry,
  createUsageRegistry,
  createWriterRegistry,
  createConfigRegistry,
  createMemoryConfigStore,
  createNodeRegistry,
  createPluginLoader,
  leadingPath,
  sortPlugins,
} from "./infrastructure/index.js";
export type {
  CommandMatch,
  CommandRegistry,
  UsageRegistry,
  WriterRegistry,
  ConfigDescription,
  ConfigRegistry,
  NodeRegistry,
  PluginLoader,
} from "./infrastructure/index.js";

// Parser
export { parse, extractGlobalFlags, validate } from "./parser/args-parser.js";
export type { ParsedCommand, ParsedCommandWithGlobals, RawFlag } from "./parser/args-parser.js";
export { compilePattern, specificity, compareSpecificity } from "./parser/pattern.js";
export { GLOBAL_FLAGS } from "./parser/global-flags.js";

// Execution
export { execute, normalizeResult } from "./execution/dispatcher.js";
export type { DispatcherDeps } from "./execution/dispatcher.js";
export { multicall } from "./execution/fanout.js";
export type { MulticallResult, NodeFailure, NodeResult } from "./execution/fanout.js";
export { currentCallContext, runInCallContext } from "./execution/call-context.js";
export type { CallContext } from "./execution/call-context.js";

// Output
export { createOutputPipeline, DEFAULT_FORMAT } from "./output/pipeline.js";
export type { OutputPipeline, OutputPipelineDeps } from "./output/pipeline.js";
export { formatError } from "./output/error-formatter.js";
export { createNodeProcessIO } from "./output/process-io.js";
export type { ProcessIO } from "./output/process-io.js";
export { humanWriter, jsonWriter, csvWriter, BUILTIN_WRITERS } from "./output/writers/index.js";

// Config
export { registerConfigCommands } from "./config/config-commands.js";

// Transport
export {
  IpcServer,
  IpcClient,
  RpcTimeoutError,
  createIpcTransport,
  createLoopbackNetwork,
  createLoopbackTransport,
  createNodeServer,
  createRpcHandler,
  runRemote,
  RpcErrorCode,
  RpcFault,
  RpcMethod,
} from "./transport/index.js";
export type {
  IpcTransportOptions,
  LoopbackNetwork,
  LoopbackTransport,
  NodeServer,
  NodeServerOptions,
  RpcHandler,
  RpcTarget,
} from "./transport/index.js";

export { CLI_NODE_PREFIX, cliNodeName, createNodesPlugin, createSocketDirFinder } from "./nodes.js";
export type { NodeDiscoveryOptions } from "./nodes.js";
export { createStatusPlugin, STATUS_DOWN_EXIT_CODE } from "./status.js";
export { createStopPlugin, NOT_SERVING_EXIT_CODE } from "./stop.js";
export type { ServerControl } from "./stop.js";

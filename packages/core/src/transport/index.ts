export { IpcServer } from "./ipc-server.js";
export type { IpcServerOptions } from "./ipc-server.js";
export { IpcClient, RpcTimeoutError } from "./ipc-client.js";
export type { IpcClientOptions } from "./ipc-client.js";
export { createIpcTransport, toTransportError } from "./ipc-transport.js";
export type { IpcTransportOptions } from "./ipc-transport.js";
export { createLoopbackNetwork, createLoopbackTransport } from "./loopback.js";
export type { LoopbackNetwork, LoopbackTransport } from "./loopback.js";
export { createNodeServer, createRpcHandler } from "./node-server.js";
export type { NodeServer, NodeServerOptions, RpcHandlerOptions, RpcTarget } from "./node-server.js";
export { runRemote } from "./remote-run.js";
export { RpcErrorCode, RpcFault, RpcMethod } from "./types.js";
export type { RpcError, RpcHandler, RpcRequest, RpcResponse } from "./types.js";

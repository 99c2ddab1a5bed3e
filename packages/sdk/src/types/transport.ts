/**
 * Remote-call contracts between cluster nodes.
 */

/**
 * Transport used for fan-out and for forwarding stderr to the node that
 * issued a command. Timeouts belong to the implementation.
 */
export interface RemoteTransport {
  /** Name of the node this process runs as. */
  readonly localNode: string;

  /** Invoke `method` on `node` and resolve with its result. */
  call(node: string, method: string, params?: unknown): Promise<unknown>;

  /** Write `text` to the standard error stream of `node`. */
  writeStderr(node: string, text: string): Promise<void>;

  /** Release connections held by the transport. */
  close?(): void;
}

/** Supplies the cluster members to contact for `--all` fan-out. */
export type NodeFinder = () => string[] | Promise<string[]>;

/** Result of running a command on a remote node (RPC method `corral.run`). */
export interface RemoteRunResult {
  exitCode: number;
  stdout: string;
}

/**
 * Per-invocation execution context.
 *
 * A command run on behalf of another node carries that node's name as
 * `originNode` and a `stdout` sink that ships output back with the RPC
 * reply. stderr is never redirected this way; the output pipeline forwards
 * it to `originNode` explicitly.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface CallContext {
  originNode: string;
  stdout(text: string): void;
  traceId?: string;
}

const storage = new AsyncLocalStorage<CallContext>();

export function currentCallContext(): CallContext | undefined {
  return storage.getStore();
}

export function runInCallContext<T>(context: CallContext, fn: () => T): T {
  return storage.run(context, fn);
}

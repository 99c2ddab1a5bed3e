import type { RemoteTransport } from "@corral/sdk";
import { TransportError } from "@corral/sdk";
import { validateInput } from "@corral/shared";
import { currentCallContext } from "../execution/call-context.js";
import type { ProcessIO } from "../output/process-io.js";
import { RemoteRunResultSchema, RpcMethod } from "./types.js";

/**
 * Run argv on `node`. Its stdout comes back with the reply and is written
 * locally; its stderr reaches this node through `stderr.write`.
 */
export async function runRemote(
  transport: RemoteTransport,
  node: string,
  argv: readonly string[],
  io: ProcessIO,
): Promise<number> {
  const context = currentCallContext();
  const reply = await transport.call(node, RpcMethod.RUN, {
    argv,
    origin: transport.localNode,
    traceId: context?.traceId,
  });

  const result = validateInput(RemoteRunResultSchema, reply);
  if (!result.success) {
    throw new TransportError(node, `malformed ${RpcMethod.RUN} reply: ${result.error}`);
  }

  const { exitCode, stdout } = result.data;
  if (stdout.length > 0) {
    if (context) context.stdout(stdout);
    else io.writeStdout(stdout);
  }
  return exitCode;
}

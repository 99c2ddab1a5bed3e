/**
 * Output pipeline: status → writer → streams.
 *
 * stdout goes to the local stdout of this invocation (which the call
 * context may redirect into an RPC reply). stderr goes to the node that
 * issued the command, found in two steps: resolve the origin node from the
 * call context, then ask the transport to write to that node's stderr.
 */

import type { Printable, RenderedOutput, RemoteTransport, Status } from "@corral/sdk";
import { isErrorStatus, isExitStatus } from "@corral/sdk";
import { createLogger } from "@corral/shared";
import type { UsageRegistry } from "../infrastructure/usage-registry.js";
import type { WriterRegistry } from "../infrastructure/writer-registry.js";
import { currentCallContext } from "../execution/call-context.js";
import { formatError } from "./error-formatter.js";
import type { ProcessIO } from "./process-io.js";

const logger = createLogger("OutputPipeline");

export const DEFAULT_FORMAT = "human";

export interface OutputPipelineDeps {
  writers: WriterRegistry;
  usage: UsageRegistry;
  transport: RemoteTransport;
  io: ProcessIO;
}

export interface OutputPipeline {
  /**
   * Render and deliver; resolves with the exit code. Rejects with
   * RenderError when the format has no writer.
   */
  print(result: Printable, path: readonly string[], format?: string): Promise<number>;
  /** Render only. Throws RenderError when the format has no writer. */
  render(status: Status, format: string): RenderedOutput;
  /** Write already-rendered output to the right streams. */
  deliver(output: RenderedOutput): Promise<void>;
}

export function createOutputPipeline(deps: OutputPipelineDeps): OutputPipeline {
  function render(status: Status, format: string): RenderedOutput {
    return deps.writers.require(format)(status);
  }

  /** Step one of stderr delivery: who asked for this command? */
  function resolveOriginNode(): string {
    return currentCallContext()?.originNode ?? deps.transport.localNode;
  }

  async function deliver(output: RenderedOutput): Promise<void> {
    if (output.stdout.length > 0) {
      const context = currentCallContext();
      if (context) {
        context.stdout(output.stdout);
      } else {
        deps.io.writeStdout(output.stdout);
      }
    }

    if (output.stderr.length > 0) {
      const origin = resolveOriginNode();
      try {
        await deps.transport.writeStderr(origin, output.stderr);
      } catch (err) {
        logger.error(`Failed to deliver stderr to node ${origin}; writing locally`, { error: String(err) });
        deps.io.writeStderr(output.stderr);
      }
    }
  }

  async function print(result: Printable, path: readonly string[], format = DEFAULT_FORMAT): Promise<number> {
    if (result === "usage") {
      const usage = deps.usage.resolve(path);
      if (usage === undefined) {
        await deliver({ stdout: "", stderr: `No usage available for: ${path.join(" ")}\n` });
        return 1;
      }
      await deliver({ stdout: usage.endsWith("\n") ? usage : `${usage}\n`, stderr: "" });
      return 0;
    }

    if (isErrorStatus(result)) {
      const status = formatError(result.error, deps.usage.resolve(path));
      await deliver(render(status, DEFAULT_FORMAT));
      return 1;
    }

    if (isExitStatus(result)) {
      await deliver(render(result.status, result.format));
      return result.exitCode;
    }

    await deliver(render(result, format));
    return 0;
  }

  return { print, render, deliver };
}

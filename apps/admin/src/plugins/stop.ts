/**
 * `<script> stop`: shut down the node server of the node it runs on.
 * Usually sent with `--node <name>`.
 */

import type { CliPlugin } from "@corral/sdk";
import { alert, exitStatus, text } from "@corral/sdk";

/** Returned when the node has no server to stop. */
export const NOT_SERVING_EXIT_CODE = 3;

export interface ServerControl {
  isServing(): boolean;
  /** Begin shutdown; called after the reply has been produced. */
  requestStop(): void;
}

export function createStopPlugin(script: string, control: ServerControl): CliPlugin {
  return {
    name: "stop",
    after: ["status"],

    register(api) {
      api.registerCommand([script, "stop"], [], [], (_path, _keys, _flags, ctx) => {
        if (!control.isServing()) {
          return exitStatus(NOT_SERVING_EXIT_CODE, [alert([text(`Node ${ctx.localNode} is not serving`)])]);
        }
        setImmediate(() => control.requestStop());
        return [text(`Stopping ${ctx.localNode}`)];
      });
      api.registerUsage([script, "stop"], `Usage: ${script} --node <name> stop`);
    },
  };
}

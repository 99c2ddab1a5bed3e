#!/usr/bin/env node

/**
 * corral-admin entry point.
 *
 *   corral-admin [--config <path>] --serve
 *   corral-admin [--config <path>] [--node <name>] <command>...
 *
 * Without --node the command runs in this process. With --node it runs on
 * that node over its socket; stdout comes back in the reply and stderr is
 * written here.
 */

import { createNodeProcessIO, runRemote } from "@corral/core";
import { createAdminNode, type AdminNode } from "./bootstrap.js";
import { cliNodeName } from "./plugins/index.js";
import { parseLauncherArgs } from "./utils/args.js";
import { loadRuntimeConfig } from "./utils/config-loader.js";

async function serveUntilStopped(admin: AdminNode): Promise<number> {
  await admin.serve();
  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
    void admin.stopped().then(() => resolve());
  });
  return 0;
}

async function main(): Promise<number> {
  const launcher = parseLauncherArgs(process.argv.slice(2));
  const loaded = loadRuntimeConfig({ path: launcher.config });
  const remote = launcher.node !== undefined && launcher.node !== loaded.nodeName ? launcher.node : undefined;
  const config = remote === undefined ? loaded : { ...loaded, nodeName: cliNodeName(loaded.nodeName) };
  const io = createNodeProcessIO();
  const admin = await createAdminNode(config, { io });

  try {
    if (launcher.serve) return await serveUntilStopped(admin);

    // Commands are registered under the script name, which argv omits.
    const argv = [config.script, ...launcher.argv];
    if (remote !== undefined) {
      // The remote node sends its stderr back through this socket.
      await admin.serve();
      return await runRemote(admin.corral.transport, remote, argv, io);
    }
    return await admin.corral.run(argv);
  } finally {
    await admin.dispose();
  }
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });

/**
 * Launcher option parser.
 *
 * Only leading options belong to the launcher; everything from the first
 * other token on is the command argv, handed to the router untouched.
 *
 * Examples:
 *   parseLauncherArgs(["--node", "b", "status", "--all"])
 *     → { serve: false, node: "b", argv: ["status", "--all"] }
 *   parseLauncherArgs(["--serve", "--config", "./node.json"])
 *     → { serve: true, config: "./node.json", argv: [] }
 */

export interface LauncherArgs {
  /** Path to a runtime config JSON file */
  config?: string;
  /** Run a node server until interrupted */
  serve: boolean;
  /** Run the command on this node instead of locally */
  node?: string;
  argv: string[];
}

const VALUED = new Set(["--config", "--node"]);

export function parseLauncherArgs(argv: readonly string[]): LauncherArgs {
  const result: LauncherArgs = { serve: false, argv: [] };
  let i = 0;

  while (i < argv.length) {
    const arg = argv[i];
    if (arg === "--serve") {
      result.serve = true;
      i++;
      continue;
    }
    if (!VALUED.has(arg)) break;

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("-")) {
      throw new Error(`Missing value for ${arg}`);
    }
    if (arg === "--config") result.config = value;
    else result.node = value;
    i += 2;
  }

  result.argv = argv.slice(i);
  return result;
}

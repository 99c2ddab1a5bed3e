/**
 * Concurrent per-node calls for `--all` style commands.
 */

export interface NodeResult<T> {
  node: string;
  value: T;
}

export interface NodeFailure {
  node: string;
  error: Error;
}

export interface MulticallResult<T> {
  results: NodeResult<T>[];
  /** Nodes whose call rejected, in input order. */
  down: NodeFailure[];
}

/** Run `fn` against every node; never rejects. */
export async function multicall<T>(
  nodes: readonly string[],
  fn: (node: string) => Promise<T>,
): Promise<MulticallResult<T>> {
  const settled = await Promise.allSettled(nodes.map((node) => fn(node)));
  const results: NodeResult<T>[] = [];
  const down: NodeFailure[] = [];
  settled.forEach((outcome, i) => {
    const node = nodes[i];
    if (outcome.status === "fulfilled") {
      results.push({ node, value: outcome.value });
    } else {
      const reason: unknown = outcome.reason;
      down.push({ node, error: reason instanceof Error ? reason : new Error(String(reason)) });
    }
  });
  return { results, down };
}

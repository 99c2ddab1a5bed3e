import process from "node:process";

/** The local output streams of this process. */
export interface ProcessIO {
  writeStdout(text: string): void;
  writeStderr(text: string): void;
}

type NodeLikeProcess = Pick<NodeJS.Process, "stdout" | "stderr">;

export function createNodeProcessIO(proc: NodeLikeProcess = process): ProcessIO {
  return {
    writeStdout(text: string) {
      proc.stdout.write(text);
    },
    writeStderr(text: string) {
      proc.stderr.write(text);
    },
  };
}

import readline from "readline";

export type ReadResult = { kind: "line"; text: string } | { kind: "interrupt" } | { kind: "eof" };

export type LineReader = {
  read(prompt: string): Promise<ReadResult>;
  close(): void;
};

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Line-at-a-time reader over stdin. Ctrl-C surfaces as an `interrupt` result instead of killing the
 * process; once the input ends every further read resolves to `eof`.
 */
export function createLineReader(
  input: InputStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LineReader {
  const rl = readline.createInterface({ input, output, terminal: Boolean(input.isTTY) });
  const buffered: ReadResult[] = [];
  let waiting: ((result: ReadResult) => void) | null = null;
  let closed = false;

  const push = (result: ReadResult): void => {
    if (waiting) {
      const resolve = waiting;
      waiting = null;
      resolve(result);
      return;
    }
    buffered.push(result);
  };

  rl.on("line", (text) => push({ kind: "line", text }));
  rl.on("SIGINT", () => push({ kind: "interrupt" }));
  rl.on("close", () => {
    closed = true;
    push({ kind: "eof" });
  });

  return {
    read(prompt: string): Promise<ReadResult> {
      const next = buffered.shift();
      if (next) {
        return Promise.resolve(next);
      }
      if (closed) {
        return Promise.resolve({ kind: "eof" });
      }
      rl.setPrompt(prompt);
      rl.prompt();
      return new Promise((resolve) => {
        waiting = resolve;
      });
    },
    close(): void {
      if (!closed) {
        rl.close();
      }
    }
  };
}

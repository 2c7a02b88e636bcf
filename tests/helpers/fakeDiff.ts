import { readFile } from "node:fs/promises";
import { Readable, Writable } from "node:stream";
import type { DiffLauncher } from "../../src/compare/diff.js";

export interface DiffCall {
  command: string;
  args: readonly string[];
}

// Close enough to `-b --strip-trailing-cr -B` for the fixtures used here.
function lenientLines(content: Buffer): string[] {
  return content
    .toString("utf8")
    .split("\n")
    .map((line) => line.replace(/\r$/, "").replace(/\s+/g, " ").trimEnd())
    .filter((line) => line.length > 0);
}

/**
 * Compares the last two arguments in process instead of spawning `diff`:
 * byte for byte, or line by line when the lenient flags are present.
 */
export function createFakeDiff(calls: DiffCall[] = []): DiffLauncher {
  return (command, args) => {
    calls.push({ command, args });
    const [expected, actual] = args.slice(-2);
    const lenient = args.includes("-b");
    const same = Promise.all([readFile(expected), readFile(actual)]).then(([left, right]) =>
      lenient ? lenientLines(left).join("\n") === lenientLines(right).join("\n") : left.equals(right),
    );

    const stdout = Readable.from(
      (async function* () {
        if (!(await same)) {
          yield `Files ${expected} and ${actual} differ\n`;
        }
      })(),
    );

    return {
      stdout,
      stderr: Readable.from([]),
      exited: same.then((equal) => (equal ? 0 : 1)),
    };
  };
}

export function collectSink() {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString("utf8") };
}

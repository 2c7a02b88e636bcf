import { spawn } from "node:child_process";
import { once } from "node:events";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { Readable, Writable } from "node:stream";
import { logger } from "../logger.js";

export interface DiffProcess {
  stdout: Readable;
  stderr: Readable;
  /** Resolves with the exit code, or null when the process was killed by a signal. */
  exited: Promise<number | null>;
}

export type DiffLauncher = (command: string, args: readonly string[]) => DiffProcess;

export const launchDiff: DiffLauncher = (command, args) => {
  const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });
  const exited = new Promise<number | null>((resolvePromise, reject) => {
    child.once("error", reject);
    child.once("exit", (code) => resolvePromise(code));
  });
  return { stdout: child.stdout, stderr: child.stderr, exited };
};

/**
 * Flags for `diff`. Lenient mode is for hosts whose files may carry CRLF line
 * endings or trailing blanks that the recorded baselines do not.
 */
export function diffFlags(lenient: boolean): string[] {
  const flags = ["-a"];
  if (lenient) {
    flags.push("-b", "--strip-trailing-cr", "-B");
  }
  return flags;
}

export function lenientDiffDefault(platform: NodeJS.Platform = process.platform): boolean {
  return platform === "win32";
}

export interface CompareOptions {
  command?: string;
  lenient?: boolean;
  launcher?: DiffLauncher;
  stdout?: Writable;
  stderr?: Writable;
}

async function forward(source: Readable, sink: Writable): Promise<void> {
  for await (const chunk of source) {
    if (!sink.write(chunk)) {
      await once(sink, "drain");
    }
  }
}

/** True iff `diff` exits with status 0 for the two files. */
export async function compareFiles(
  expectedPath: string,
  actualPath: string,
  options: CompareOptions = {},
): Promise<boolean> {
  if (!existsSync(expectedPath)) {
    logger.error("Expected results file does not exist", "compare", { expectedPath });
    return false;
  }

  const command = options.command ?? "diff";
  const args = [
    ...diffFlags(options.lenient ?? lenientDiffDefault()),
    resolve(expectedPath),
    resolve(actualPath),
  ];
  logger.info(`Running: ${[command, ...args].join(" ")}`, "compare");

  const launcher = options.launcher ?? launchDiff;
  const child = launcher(command, args);

  const [exitCode] = await Promise.all([
    child.exited,
    forward(child.stdout, options.stdout ?? process.stdout),
    forward(child.stderr, options.stderr ?? process.stderr),
  ]);

  return exitCode === 0;
}

import type { Writable } from "node:stream";

/** Status codes a shell returns for one command batch. */
export const SHELL_STATUS = {
  OK: 0,
  ERROR: 1,
  NOOP: 2,
  UNKNOWN: 3,
} as const;

export type ShellStatus = (typeof SHELL_STATUS)[keyof typeof SHELL_STATUS];

/**
 * Only the explicit error sentinel marks a script as failed. No-op, unknown
 * and unrecognized codes all count as completed runs.
 */
export function isFailureStatus(status: number): boolean {
  return status === SHELL_STATUS.ERROR;
}

/**
 * The interactive query client. Each call runs the commands in order against
 * the same session and resolves with the status of the batch.
 */
export interface QueryShell {
  runCommands(commands: readonly string[]): Promise<number>;
}

export interface ShellStreams {
  output: Writable;
  error: Writable;
}

export type ShellFactory = (streams: ShellStreams) => QueryShell | Promise<QueryShell>;

export function isQueryShell(value: unknown): value is QueryShell {
  return (
    typeof value === "object" &&
    value !== null &&
    "runCommands" in value &&
    typeof value.runCommands === "function"
  );
}

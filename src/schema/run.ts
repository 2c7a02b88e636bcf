export type RunStatus = "passed" | "mismatch" | "script-error" | "crashed" | "baseline";

export type RunMode = "compare" | "baseline";

/** Outcome of one qfile. `success` is script completion, `matched` the baseline verdict. */
export interface RunResult {
  readonly success: boolean;
  readonly matched: boolean;
}

export interface RunRecord {
  id: string;
  testName: string;
  qFileName: string;
  status: RunStatus;
  mode: RunMode;
  success: boolean;
  matched: boolean;
  error?: string;
  startedAt: string;
  finishedAt: string;
}

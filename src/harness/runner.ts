import type { CompareOptions } from "../compare/diff.js";
import type { DriverConfig } from "../config.js";
import type { HistoryStore } from "../data/historyStore.js";
import { QFileClient } from "../driver/qfileClient.js";
import type { FilterContextOverrides } from "../filter/regexFilterSet.js";
import { logger } from "../logger.js";
import type { RunMode, RunResult, RunStatus } from "../schema/run.js";
import type { ShellFactory } from "../shell/types.js";

export interface RunQFilesOptions {
  shellFactory: ShellFactory;
  /** Replace baselines instead of comparing against them. */
  overwrite?: boolean;
  history?: HistoryStore;
  compare?: CompareOptions;
  filterContext?: FilterContextOverrides;
  now?: () => Date;
}

export interface QFileOutcome {
  qFileName: string;
  testName: string;
  status: RunStatus;
  mode: RunMode;
  result: RunResult;
  error?: Error;
}

export interface RunSummary {
  outcomes: QFileOutcome[];
  counts: Record<RunStatus, number>;
  passed: boolean;
}

function compareOptionsFor(config: DriverConfig, override?: CompareOptions): CompareOptions {
  return {
    command: config.diff.command,
    lenient: config.diff.lenient,
    ...override,
  };
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

async function runOne(
  config: DriverConfig,
  qFileName: string,
  options: RunQFilesOptions,
): Promise<QFileOutcome> {
  const client = new QFileClient(config, {
    shellFactory: options.shellFactory,
    compare: compareOptionsFor(config, options.compare),
    filterContext: options.filterContext,
  }).setQFileName(qFileName);
  const testName = client.getTestName();

  const outcome = (
    status: RunStatus,
    mode: RunMode,
    result: RunResult,
    error?: Error,
  ): QFileOutcome => ({
    qFileName,
    testName,
    status,
    mode,
    result: Object.freeze(result),
    error,
  });

  try {
    await client.run();
  } catch (error) {
    return outcome("crashed", "compare", { success: false, matched: false }, toError(error));
  }

  if (client.hasErrors()) {
    return outcome("script-error", "compare", { success: false, matched: false });
  }

  if (options.overwrite || !client.hasExpectedResults()) {
    await client.overwriteResults();
    return outcome("baseline", "baseline", { success: true, matched: true });
  }

  let matched: boolean;
  try {
    matched = await client.compareResults();
  } catch (error) {
    return outcome("crashed", "compare", { success: true, matched: false }, toError(error));
  }
  return outcome(matched ? "passed" : "mismatch", "compare", { success: true, matched });
}

/** Runs each qfile in turn: one client, one session, one verdict per file. */
export async function runQFiles(
  config: DriverConfig,
  qFileNames: readonly string[],
  options: RunQFilesOptions,
): Promise<RunSummary> {
  const now = options.now ?? (() => new Date());
  const counts: Record<RunStatus, number> = {
    passed: 0,
    mismatch: 0,
    "script-error": 0,
    crashed: 0,
    baseline: 0,
  };
  const outcomes: QFileOutcome[] = [];

  for (const qFileName of qFileNames) {
    const startedAt = now().toISOString();
    const outcome = await runOne(config, qFileName, options);
    const finishedAt = now().toISOString();

    counts[outcome.status] += 1;
    outcomes.push(outcome);

    const level = outcome.status === "passed" || outcome.status === "baseline" ? "info" : "error";
    logger[level](`qfile ${outcome.status}`, "harness", {
      qFileName,
      testName: outcome.testName,
      error: outcome.error?.message,
    });

    if (options.history) {
      await options.history.recordRun({
        testName: outcome.testName,
        qFileName,
        status: outcome.status,
        mode: outcome.mode,
        success: outcome.result.success,
        matched: outcome.result.matched,
        error: outcome.error?.message,
        startedAt,
        finishedAt,
      });
    }
  }

  return {
    outcomes,
    counts,
    passed: counts.mismatch === 0 && counts["script-error"] === 0 && counts.crashed === 0,
  };
}

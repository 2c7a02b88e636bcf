export { compareFiles, diffFlags, launchDiff, lenientDiffDefault } from "./compare/diff.js";
export type { CompareOptions, DiffLauncher, DiffProcess } from "./compare/diff.js";
export { ConfigError, driverConfigSchema, loadConfig, parseConfig } from "./config.js";
export type { DriverConfig, DriverConfigInput } from "./config.js";
export { HistoryStore } from "./data/historyStore.js";
export { QFileClient } from "./driver/qfileClient.js";
export type { ClientState, QFileClientOptions, QFilePaths } from "./driver/qfileClient.js";
export {
  RegexFilterSet,
  buildQFileFilterSet,
  createFilterContext,
  escapeRegExp,
} from "./filter/regexFilterSet.js";
export type { FilterContext, FilterDirectories, FilterRule } from "./filter/regexFilterSet.js";
export { OPERATOR_TAGS } from "./filter/operators.js";
export { runQFiles } from "./harness/runner.js";
export type { QFileOutcome, RunQFilesOptions, RunSummary } from "./harness/runner.js";
export { logger, setLogLevel } from "./logger.js";
export type { RunRecord, RunResult, RunStatus } from "./schema/run.js";
export { loadShellFactory, ShellModuleError } from "./shell/loader.js";
export { SessionDriver } from "./shell/sessionDriver.js";
export { SHELL_STATUS, isFailureStatus, isQueryShell } from "./shell/types.js";
export type { QueryShell, ShellFactory, ShellStatus, ShellStreams } from "./shell/types.js";
export { DRIVER_VERSION } from "./version.js";

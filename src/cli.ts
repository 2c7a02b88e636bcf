#!/usr/bin/env node
/* eslint-disable no-console */
import process from "node:process";
import { parseArguments } from "./cliArgs.js";
import { loadConfig } from "./config.js";
import { HistoryStore } from "./data/historyStore.js";
import { runQFiles, type RunSummary } from "./harness/runner.js";
import { logger } from "./logger.js";
import { loadShellFactory } from "./shell/loader.js";
import { DRIVER_VERSION } from "./version.js";

function printHelp(): void {
  console.log(
    `qfile-driver v${DRIVER_VERSION}\n\n` +
      `Usage: qfile-driver [options] <qfile...>\n\n` +
      `Options:\n` +
      `  --config, -c <file>   Driver configuration (default: $QFILE_DRIVER_CONFIG)\n` +
      `  --shell, -s <module>  Module exporting createShell()\n` +
      `  --overwrite           Write outputs as the new expected results\n` +
      `  --history <file>      Record outcomes in this JSON file\n` +
      `  --help, -h            Show this help message\n` +
      `  --version, -v         Print the current version`,
  );
}

function printSummary(summary: RunSummary): void {
  for (const outcome of summary.outcomes) {
    const detail = outcome.error ? ` (${outcome.error.message})` : "";
    console.log(`${outcome.status.padEnd(12)} ${outcome.qFileName}${detail}`);
  }
  const { counts } = summary;
  console.log(
    `\n${counts.passed} passed, ${counts.mismatch} mismatched, ${counts["script-error"]} script errors, ` +
      `${counts.crashed} crashed, ${counts.baseline} baselines written`,
  );
}

async function main(): Promise<void> {
  const cliOptions = parseArguments(process.argv.slice(2));

  if (cliOptions.showVersion) {
    console.log(`qfile-driver v${DRIVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  if (cliOptions.errors.length > 0 || cliOptions.qFiles.length === 0 || !cliOptions.shellModule) {
    for (const message of cliOptions.errors) {
      console.error(message);
    }
    if (cliOptions.qFiles.length === 0) {
      console.error("No qfiles given");
    }
    if (!cliOptions.shellModule) {
      console.error("No shell module given (use --shell)");
    }
    process.exitCode = 1;
    return;
  }

  try {
    const config = await loadConfig(cliOptions.configPath);
    const shellFactory = await loadShellFactory(cliOptions.shellModule);
    const historyPath = cliOptions.historyPath ?? config.historyPath;

    const summary = await runQFiles(config, cliOptions.qFiles, {
      shellFactory,
      overwrite: cliOptions.overwrite,
      history: historyPath ? new HistoryStore(historyPath) : undefined,
    });

    printSummary(summary);
    if (!summary.passed) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error("qfile-driver failed", "cli", { error });
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();

import { join } from "node:path";
import { logger } from "../logger.js";
import { isFailureStatus, type QueryShell } from "./types.js";

export interface ConnectionSettings {
  url: string;
  driver: string;
  username: string;
  password: string;
}

export interface SessionSettings {
  testName: string;
  connection: ConnectionSettings;
  dataDir: string;
  scriptDir: string;
  initScript: string;
  cleanupScript: string;
}

export interface ExecutionStatus {
  status: number;
  failed: boolean;
}

/**
 * Sends the fixed command batches of a qfile run to one shell session.
 * Batches are awaited one at a time and never retried.
 */
export class SessionDriver {
  constructor(
    private readonly shell: QueryShell,
    private readonly settings: SessionSettings,
  ) {}

  async connect(): Promise<void> {
    const { url, username, password, driver } = this.settings.connection;
    await this.send("connect", [
      "!set verbose true",
      "!set shownestederrs true",
      "!set showwarnings true",
      "!set showelapsedtime false",
      "!set maxwidth -1",
      `!connect ${url} ${username} ${password} ${driver}`,
    ]);
  }

  async setUp(): Promise<void> {
    const { testName, dataDir, scriptDir, initScript } = this.settings;
    await this.send("setup", [
      "USE default;",
      "SHOW TABLES;",
      `DROP DATABASE IF EXISTS \`${testName}\` CASCADE;`,
      `CREATE DATABASE \`${testName}\`;`,
      `USE \`${testName}\`;`,
      `set test.data.dir=${dataDir};`,
      `set test.script.dir=${scriptDir};`,
      `!run ${join(scriptDir, initScript)}`,
    ]);
  }

  async execute(qFilePath: string, rawOutputPath: string): Promise<ExecutionStatus> {
    await this.send("record", ["!set outputformat csv", `!record ${rawOutputPath}`]);
    const status = await this.send("execute", [`!run ${qFilePath}`]);
    await this.send("record", ["!record"]);
    return { status, failed: isFailureStatus(status) };
  }

  async tearDown(): Promise<void> {
    const { testName, scriptDir, cleanupScript } = this.settings;
    await this.send("teardown", [
      "!set outputformat table",
      "USE default;",
      `DROP DATABASE IF EXISTS \`${testName}\` CASCADE;`,
      `!run ${join(scriptDir, cleanupScript)}`,
    ]);
  }

  async quit(): Promise<void> {
    await this.send("quit", ["!quit"]);
  }

  private async send(phase: string, commands: readonly string[]): Promise<number> {
    const status = await this.shell.runCommands(commands);
    logger.debug("Shell batch finished", "session", {
      testName: this.settings.testName,
      phase,
      commands: commands.length,
      status,
    });
    return status;
  }
}

import { createWriteStream, existsSync, type WriteStream } from "node:fs";
import { copyFile, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { compareFiles, type CompareOptions } from "../compare/diff.js";
import type { DriverConfig } from "../config.js";
import {
  buildQFileFilterSet,
  createFilterContext,
  type FilterContextOverrides,
} from "../filter/regexFilterSet.js";
import { logger } from "../logger.js";
import { SessionDriver } from "../shell/sessionDriver.js";
import type { ShellFactory } from "../shell/types.js";

export type ClientState =
  | "init"
  | "connected"
  | "setup-done"
  | "executed"
  | "torn-down"
  | "filtered";

export interface QFileClientOptions {
  shellFactory: ShellFactory;
  compare?: CompareOptions;
  filterContext?: FilterContextOverrides;
}

export interface QFilePaths {
  qFile: string;
  rawOutput: string;
  output: string;
  trace: string;
  expected: string;
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    stream.once("error", reject);
    stream.end(() => resolvePromise());
  });
}

/**
 * Drives one qfile through a shell session and keeps the files of the run:
 * the raw transcript, the masked output and the expected baseline.
 */
export class QFileClient {
  private username: string;
  private password: string;
  private jdbcUrl: string;
  private jdbcDriver: string;

  private readonly rootDirectory: string;
  private readonly scratchDirectory: string;
  private readonly warehouseDirectory: string;
  private readonly initScript: string;
  private readonly cleanupScript: string;
  private qFileDirectory: string;
  private outputDirectory: string;
  private expectedDirectory: string;
  private testDataDirectory: string;
  private testScriptDirectory: string;

  private qFileName?: string;
  private testName?: string;
  private paths?: QFilePaths;

  private session?: SessionDriver;
  private traceStream?: WriteStream;
  private state: ClientState = "init";
  private errors = false;
  private cleanedUp = true;

  constructor(
    config: DriverConfig,
    private readonly options: QFileClientOptions,
  ) {
    this.rootDirectory = resolve(config.rootDir);
    this.qFileDirectory = resolve(config.qFileDir);
    this.outputDirectory = resolve(config.outputDir);
    this.expectedDirectory = resolve(config.expectedDir);
    this.testDataDirectory = resolve(config.dataDir);
    this.testScriptDirectory = resolve(config.scriptDir);
    this.initScript = config.initScript;
    this.cleanupScript = config.cleanupScript;
    this.scratchDirectory = resolve(config.engine.scratchDir);
    this.warehouseDirectory = resolve(config.engine.warehouseDir);
    this.username = config.connection.username;
    this.password = config.connection.password;
    this.jdbcUrl = config.connection.url;
    this.jdbcDriver = config.connection.driver;
  }

  setUsername(username: string): this {
    this.username = username;
    return this;
  }

  setPassword(password: string): this {
    this.password = password;
    return this;
  }

  setJdbcUrl(jdbcUrl: string): this {
    this.jdbcUrl = jdbcUrl;
    return this;
  }

  setJdbcDriver(jdbcDriver: string): this {
    this.jdbcDriver = jdbcDriver;
    return this;
  }

  setQFileName(qFileName: string): this {
    this.qFileName = qFileName;
    this.testName = qFileName.split(".")[0];
    this.derivePaths();
    return this;
  }

  setQFileDirectory(qFileDirectory: string): this {
    this.qFileDirectory = resolve(qFileDirectory);
    this.derivePaths();
    return this;
  }

  setOutputDirectory(outputDirectory: string): this {
    this.outputDirectory = resolve(outputDirectory);
    this.derivePaths();
    return this;
  }

  setExpectedDirectory(expectedDirectory: string): this {
    this.expectedDirectory = resolve(expectedDirectory);
    this.derivePaths();
    return this;
  }

  setTestDataDirectory(testDataDirectory: string): this {
    this.testDataDirectory = resolve(testDataDirectory);
    return this;
  }

  setTestScriptDirectory(testScriptDirectory: string): this {
    this.testScriptDirectory = resolve(testScriptDirectory);
    return this;
  }

  private derivePaths(): void {
    const qFileName = this.qFileName;
    if (qFileName === undefined) {
      return;
    }
    const rawOutput = join(this.outputDirectory, `${qFileName}.raw`);
    this.paths = Object.freeze({
      qFile: join(this.qFileDirectory, qFileName),
      rawOutput,
      output: join(this.outputDirectory, `${qFileName}.out`),
      trace: join(this.outputDirectory, `${qFileName}.beeline`),
      expected: join(this.expectedDirectory, `${qFileName}.out`),
    });
  }

  getPaths(): QFilePaths {
    if (!this.paths) {
      throw new Error("No qfile name set; call setQFileName() first");
    }
    return this.paths;
  }

  getTestName(): string {
    if (this.testName === undefined) {
      throw new Error("No qfile name set; call setQFileName() first");
    }
    return this.testName;
  }

  getState(): ClientState {
    return this.state;
  }

  hasErrors(): boolean {
    return this.errors;
  }

  private async initSession(): Promise<SessionDriver> {
    const paths = this.getPaths();
    await mkdir(this.outputDirectory, { recursive: true });

    const traceStream = createWriteStream(paths.trace);
    traceStream.on("error", (error) => {
      logger.error("Trace stream error", "client", { trace: paths.trace, error });
    });
    this.traceStream = traceStream;

    const shell = await this.options.shellFactory({ output: traceStream, error: traceStream });
    const session = new SessionDriver(shell, {
      testName: this.getTestName(),
      connection: {
        url: this.jdbcUrl,
        driver: this.jdbcDriver,
        username: this.username,
        password: this.password,
      },
      dataDir: this.testDataDirectory,
      scriptDir: this.testScriptDirectory,
      initScript: this.initScript,
      cleanupScript: this.cleanupScript,
    });
    this.session = session;

    await session.connect();
    this.state = "connected";
    return session;
  }

  private async filterResults(): Promise<void> {
    const paths = this.getPaths();
    const filterSet = buildQFileFilterSet(
      createFilterContext(
        {
          scratchDir: this.scratchDirectory,
          warehouseDir: this.warehouseDirectory,
          expectedDir: this.expectedDirectory,
          outputDir: this.outputDirectory,
          qFileDir: this.qFileDirectory,
          rootDir: this.rootDirectory,
        },
        this.options.filterContext,
      ),
    );
    const rawOutput = await readFile(paths.rawOutput, "utf8");
    await writeFile(paths.output, filterSet.filter(rawOutput), "utf8");
  }

  async run(): Promise<void> {
    const paths = this.getPaths();
    this.state = "init";
    this.errors = false;
    this.cleanedUp = false;
    this.session = undefined;
    this.traceStream = undefined;

    try {
      const session = await this.initSession();

      await session.setUp();
      this.state = "setup-done";

      const execution = await session.execute(paths.qFile, paths.rawOutput);
      this.errors = execution.failed;
      this.state = "executed";

      await session.tearDown();
      this.state = "torn-down";

      await this.filterResults();
      this.state = "filtered";
    } finally {
      await this.cleanup();
    }
  }

  /** Releases the session and, for failed runs, parks the raw transcript as `.raw.error`. */
  async cleanup(): Promise<void> {
    if (this.cleanedUp) {
      return;
    }
    this.cleanedUp = true;

    if (this.session) {
      try {
        await this.session.quit();
      } catch (error) {
        logger.error("Failed to quit shell session", "client", { qFileName: this.qFileName, error });
      }
    }

    if (this.traceStream) {
      try {
        await closeStream(this.traceStream);
      } catch (error) {
        logger.error("Failed to close trace stream", "client", { qFileName: this.qFileName, error });
      }
    }

    if (this.errors && this.paths) {
      const oldFileName = this.paths.rawOutput;
      const newFileName = `${oldFileName}.error`;
      try {
        await rename(oldFileName, newFileName);
      } catch (error) {
        logger.error(`Failed to move '${oldFileName}' to '${newFileName}'`, "client", { error });
      }
    }
  }

  /**
   * Whether a baseline exists to compare against. False usually means a new
   * test whose output should become the baseline.
   */
  hasExpectedResults(): boolean {
    return existsSync(this.getPaths().expected);
  }

  async compareResults(): Promise<boolean> {
    const paths = this.getPaths();
    return compareFiles(paths.expected, paths.output, this.options.compare);
  }

  async overwriteResults(): Promise<void> {
    const paths = this.getPaths();
    try {
      await rm(paths.expected, { force: true });
      await mkdir(dirname(paths.expected), { recursive: true });
      await copyFile(paths.output, paths.expected);
    } catch (error) {
      logger.error("Failed to overwrite results", "client", { expected: paths.expected, error });
    }
  }
}

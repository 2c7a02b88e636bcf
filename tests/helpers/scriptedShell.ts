import { readFile, writeFile } from "node:fs/promises";
import { SHELL_STATUS, type QueryShell, type ShellStreams } from "../../src/shell/types.js";

export interface ScriptedShellOptions {
  /** Status returned for `!run` of the script being recorded. */
  runStatus?: number;
  /** Throw this error when the predicate matches a command. */
  failOn?: (command: string) => Error | undefined;
}

/**
 * In-process stand-in for the query shell. `!record <path>` starts a
 * transcript, `!run <file>` while recording appends the file's text to it,
 * and a bare `!record` writes the transcript out.
 */
export class ScriptedShell implements QueryShell {
  readonly batches: string[][] = [];
  private recordingPath?: string;
  private transcript: string[] = [];

  constructor(
    private readonly streams: ShellStreams,
    private readonly options: ScriptedShellOptions = {},
  ) {}

  async runCommands(commands: readonly string[]): Promise<number> {
    this.batches.push([...commands]);
    let status: number = SHELL_STATUS.OK;
    for (const command of commands) {
      const error = this.options.failOn?.(command);
      if (error) {
        throw error;
      }
      this.streams.output.write(`> ${command}\n`);
      status = await this.apply(command);
    }
    return status;
  }

  commands(): string[] {
    return this.batches.flat();
  }

  private async apply(command: string): Promise<number> {
    if (command === "!record") {
      if (this.recordingPath) {
        await writeFile(this.recordingPath, this.transcript.join(""), "utf8");
        this.recordingPath = undefined;
      }
      return SHELL_STATUS.OK;
    }

    if (command.startsWith("!record ")) {
      this.recordingPath = command.slice("!record ".length);
      this.transcript = [];
      return SHELL_STATUS.OK;
    }

    if (command.startsWith("!run ") && this.recordingPath) {
      this.transcript.push(await readFile(command.slice("!run ".length), "utf8"));
      return this.options.runStatus ?? SHELL_STATUS.OK;
    }

    return SHELL_STATUS.OK;
  }
}

export function scriptedShellFactory(options: ScriptedShellOptions = {}) {
  const shells: ScriptedShell[] = [];
  const factory = (streams: ShellStreams) => {
    const shell = new ScriptedShell(streams, options);
    shells.push(shell);
    return shell;
  };
  return { factory, shells };
}

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { isQueryShell, type ShellFactory } from "./types.js";

export class ShellModuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShellModuleError";
  }
}

function isShellFactory(value: unknown): value is ShellFactory {
  return typeof value === "function";
}

/** Imports a module that exports `createShell` and wraps it so each shell it makes is checked. */
export async function loadShellFactory(modulePath: string): Promise<ShellFactory> {
  const url = pathToFileURL(resolve(modulePath)).href;

  let loaded: unknown;
  try {
    loaded = await import(url);
  } catch (error) {
    throw new ShellModuleError(
      `Unable to import shell module ${modulePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (typeof loaded !== "object" || loaded === null || !("createShell" in loaded)) {
    throw new ShellModuleError(`Shell module ${modulePath} does not export createShell`);
  }

  const { createShell } = loaded;
  if (!isShellFactory(createShell)) {
    throw new ShellModuleError(`createShell exported by ${modulePath} is not a function`);
  }
  return async (streams) => {
    const shell: unknown = await createShell(streams);
    if (!isQueryShell(shell)) {
      throw new ShellModuleError(`createShell exported by ${modulePath} did not return a shell with runCommands()`);
    }
    return shell;
  };
}

import { describe, expect, it } from "vitest";
import { parseArguments } from "../src/cliArgs.js";

describe("parseArguments", () => {
  it("collects options and qfile names", () => {
    expect(
      parseArguments(["-c", "conf.json", "--shell", "./shell.js", "--overwrite", "a.q", "b.q"]),
    ).toEqual({
      showHelp: false,
      showVersion: false,
      overwrite: true,
      configPath: "conf.json",
      shellModule: "./shell.js",
      qFiles: ["a.q", "b.q"],
      errors: [],
    });
  });

  it("reports missing values and unknown options", () => {
    const options = parseArguments(["--history", "--frobnicate", "x.q", "--config"]);
    expect(options.errors).toEqual([
      "--history requires a value",
      "Unknown option: --frobnicate",
      "--config requires a value",
    ]);
    expect(options.qFiles).toEqual(["x.q"]);
  });

  it("recognizes help and version flags", () => {
    expect(parseArguments(["-h"]).showHelp).toBe(true);
    expect(parseArguments(["--version"]).showVersion).toBe(true);
  });
});

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { logger } from "./logger.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const pathSchema = z.string().trim().min(1, "Path must not be empty");

const connectionSchema = z.object({
  url: z.string().trim().min(1, "Connection URL is required"),
  driver: z.string().trim().min(1, "Driver class is required"),
  username: z.string().default(""),
  password: z.string().default(""),
});

const engineSchema = z.object({
  scratchDir: pathSchema,
  warehouseDir: pathSchema,
});

const diffSchema = z
  .object({
    command: z.string().trim().min(1).default("diff"),
    lenient: z.boolean().optional(),
  })
  .default({});

export const driverConfigSchema = z.object({
  rootDir: pathSchema,
  qFileDir: pathSchema,
  outputDir: pathSchema,
  expectedDir: pathSchema,
  scriptDir: pathSchema,
  dataDir: pathSchema,
  initScript: pathSchema,
  cleanupScript: pathSchema,
  engine: engineSchema,
  connection: connectionSchema,
  diff: diffSchema,
  historyPath: pathSchema.optional(),
});

export type DriverConfigInput = z.input<typeof driverConfigSchema>;
export type DriverConfig = z.infer<typeof driverConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates a raw config object. Directories are resolved against `baseDir`,
 * which also drops trailing separators; script names stay relative to `scriptDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): DriverConfig {
  const parsed = driverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid qfile-driver configuration: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  const toAbsolute = (path: string) => resolve(baseDir, path);

  const historyOverride = process.env.QFILE_DRIVER_HISTORY_PATH?.trim();

  return {
    ...config,
    rootDir: toAbsolute(config.rootDir),
    qFileDir: toAbsolute(config.qFileDir),
    outputDir: toAbsolute(config.outputDir),
    expectedDir: toAbsolute(config.expectedDir),
    scriptDir: toAbsolute(config.scriptDir),
    dataDir: toAbsolute(config.dataDir),
    engine: {
      scratchDir: toAbsolute(config.engine.scratchDir),
      warehouseDir: toAbsolute(config.engine.warehouseDir),
    },
    historyPath: historyOverride
      ? toAbsolute(historyOverride)
      : config.historyPath
        ? toAbsolute(config.historyPath)
        : undefined,
  };
}

export async function loadConfig(path?: string): Promise<DriverConfig> {
  const configPath = path ?? process.env.QFILE_DRIVER_CONFIG;
  if (!configPath || configPath.trim().length === 0) {
    throw new ConfigError("No configuration file given (use --config or QFILE_DRIVER_CONFIG)");
  }

  const absolutePath = resolve(configPath);
  let text: string;
  try {
    text = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Unable to read configuration file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Configuration file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  logger.info("Loaded configuration", "config", { path: absolutePath });
  return parseConfig(raw, dirname(absolutePath));
}

import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  meta?: unknown;
  timestamp?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Unknown names fall back to "info"; empty or unset means no threshold. */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return undefined;
  }
  return isLogLevel(value) ? value : "info";
}

// Unset means silent: transcripts and diff output own stdout/stderr by default.
function thresholdFromEnv(): LogLevel | undefined {
  return parseLogLevel(process.env.QFILE_DRIVER_LOG_LEVEL);
}

let threshold: LogLevel | undefined = thresholdFromEnv();

export function setLogLevel(level: LogLevel | undefined): void {
  threshold = level;
}

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  try {
    JSON.stringify(meta, serializeErrors);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

export function log(entry: LogEntry): void {
  if (threshold === undefined || LEVEL_ORDER[entry.level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  console.error(JSON.stringify(payload, serializeErrors));
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};

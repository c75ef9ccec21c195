import type { EventClientLogger, LogLevel, LogMeta } from "./types";

const noop = (): void => undefined;

export const NOOP_LOGGER: EventClientLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  prefix?: string;
  /** Records below this level are dropped. Default: info. */
  level?: LogLevel;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return /\s/.test(value) || value === "" ? JSON.stringify(value) : value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value, (_key, inner: unknown) => (typeof inner === "bigint" ? inner.toString() : inner));
}

/** `[prefix] LEVEL message key=value ...`; undefined meta values are left out. */
export function formatLogLine(prefix: string, level: LogLevel, message: string, meta?: LogMeta): string {
  const fields = Object.entries(meta ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join("");
  return `[${prefix}] ${level.toUpperCase()} ${message}${fields}`;
}

/** Build a logger that hands each formatted record to `write`. */
export function createLineLogger(
  write: (level: LogLevel, line: string) => void,
  options: LoggerOptions = {},
): EventClientLogger {
  const prefix = options.prefix ?? "EventClient";
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const record =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      write(level, formatLogLine(prefix, level, message, meta));
    };

  return {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export function createConsoleLogger(options: LoggerOptions = {}): EventClientLogger {
  return createLineLogger((level, line) => console[level](line), options);
}

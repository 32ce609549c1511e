// packages/audit/src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger for a sub-scope, e.g. "gateway" -> "gateway.pipeline". */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to LOG_LEVEL, then "info". */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_ORDER;
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info"
): LogLevel {
  const v = (raw ?? "").trim().toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/**
 * Console-backed logger. Lines look like the rest of the gateway's output:
 *   [gateway.pipeline] backend call failed { service: "order-service", ... }
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const threshold = LEVEL_ORDER[level];

  const emit = (lvl: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[lvl] < threshold) return;

    const line = `[${scope}] ${message}`;
    const write =
      lvl === "error"
        ? console.error
        : lvl === "warn"
        ? console.warn
        : lvl === "debug"
        ? console.debug
        : console.log;

    if (meta && Object.keys(meta).length > 0) {
      write(line, meta);
    } else {
      write(line);
    }
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (sub) => createLogger(`${scope}.${sub}`, { level }),
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};

/**
 * Best-effort message for anything thrown.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

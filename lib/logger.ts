/**
 * Tagged console logging.
 *
 * Every line is prefixed with `[Tag]`. The minimum level comes from
 * KICKSENSE_LOG_LEVEL (debug | info | warn | error | silent), default info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return normalized;
    default:
      return "info";
  }
}

let currentLevel: LogLevel = parseLogLevel(process.env.KICKSENSE_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (enabled("debug")) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

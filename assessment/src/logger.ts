/**
 * Leveled logger for the assessment service.
 *
 * In production (NODE_ENV=production):
 * - debug/info: no output unless DEBUG_MODE is enabled
 * - warn/error: always output
 *
 * Everywhere else all levels output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = Record<LogLevel, (...args: unknown[]) => void>;

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  production?: boolean;
  debugMode?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function shouldLog(level: LogLevel, production: boolean, debugMode: boolean): boolean {
  if (production && !debugMode) {
    return level === "warn" || level === "error";
  }

  return true;
}

function formatLogArgs(level: LogLevel, msg: string, ...args: unknown[]): unknown[] {
  const prefix = `[ResponseQuality][${level.toUpperCase()}]`;
  return [prefix, msg, ...args];
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const production = options.production ?? false;
  const debugMode = options.debugMode ?? false;
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, msg: string, args: unknown[]): void => {
    if (!shouldLog(level, production, debugMode)) {
      return;
    }
    sink[level](...formatLogArgs(level, msg, ...args));
  };

  return {
    debug: (msg, ...args) => write("debug", msg, args),
    info: (msg, ...args) => write("info", msg, args),
    warn: (msg, ...args) => write("warn", msg, args),
    error: (msg, ...args) => write("error", msg, args),
  };
}

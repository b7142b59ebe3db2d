/**
 * Category logger with levels. One global threshold, set at runtime
 * (World applies WorldOptions.log_level).
 */

import { DEFAULT_LOG_LEVEL } from "./constants";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let global_level: LogLevel = DEFAULT_LOG_LEVEL;

export function set_log_level(level: LogLevel): void {
  global_level = level;
}

export function get_log_level(): LogLevel {
  return global_level;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function create_logger(category: string): Logger {
  const prefix = `[${category}]`;

  function should_log(level: LogLevel): boolean {
    return LOG_PRIORITY[level] >= LOG_PRIORITY[global_level];
  }

  return {
    debug(...args: unknown[]): void {
      if (should_log("debug")) console.debug(prefix, ...args);
    },
    info(...args: unknown[]): void {
      if (should_log("info")) console.info(prefix, ...args);
    },
    warn(...args: unknown[]): void {
      if (should_log("warn")) console.warn(prefix, ...args);
    },
    error(...args: unknown[]): void {
      if (should_log("error")) console.error(prefix, ...args);
    },
  };
}

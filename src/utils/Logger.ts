/**
 * Simple structured logger with consistent formatting.
 * Supports log levels, filtering, custom sinks, and module-prefixed output.
 */

import { LogLevel, LOG_LEVEL_ENV_VAR, resolveLogLevel } from '../config/LogConfig';

export { LogLevel };

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

let currentLevel: LogLevel = resolveLogLevel(process.env[LOG_LEVEL_ENV_VAR]);
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  /** Replace the default console output with a custom sink. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return;
    currentSink(LogLevel.DEBUG, `[${this.module}]`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return;
    currentSink(LogLevel.INFO, `[${this.module}]`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return;
    currentSink(LogLevel.WARN, `[${this.module}]`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}]`, message, ...args);
  }
}

/**
 * Log level definitions and environment-driven level resolution.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/** Environment variable read once at startup to pick the initial log level */
export const LOG_LEVEL_ENV_VAR = 'FRAMEBIN_LOG_LEVEL';

/** Level used when the environment variable is unset or unrecognised */
export const DEFAULT_LOG_LEVEL: LogLevel = LogLevel.WARN;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Map a level name (`debug`, `info`, `warn`, `error`, any case) to a LogLevel.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return DEFAULT_LOG_LEVEL;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? DEFAULT_LOG_LEVEL;
}

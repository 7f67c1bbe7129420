/**
 * Logger utilities shared by the core modules
 *
 * Every component accepts a structural logger. When none is supplied it falls
 * back to a console logger whose lines carry a bracketed prefix.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal logger interface accepted throughout @pingctl/core
 */
export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Log levels in increasing order of severity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Options for creating a console logger
 */
export interface LoggerOptions {
  /** Prefix for log messages, e.g. "[scheduler]" */
  prefix: string;

  /** Minimum level that is written. Default: "info" */
  level?: LogLevel;

  /** Prepend an ISO timestamp to every line. Default: false */
  timestamps?: boolean;
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Check whether a string names a known log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the log level from the PINGCTL_LOG_LEVEL environment variable
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = "info"
): LogLevel {
  const value = env.PINGCTL_LOG_LEVEL?.trim().toLowerCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  return fallback;
}

/**
 * Create a level-filtered console logger
 */
export function createLogger(options: LoggerOptions): Logger {
  const { prefix, level = resolveLogLevel(), timestamps = false } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const format = (message: string): string =>
    timestamps
      ? `${new Date().toISOString()} ${prefix} ${message}`
      : `${prefix} ${message}`;

  const enabled = (candidate: LogLevel): boolean =>
    LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (message: string) => {
      if (enabled("debug")) console.debug(format(message));
    },
    info: (message: string) => {
      if (enabled("info")) console.info(format(message));
    },
    warn: (message: string) => {
      if (enabled("warn")) console.warn(format(message));
    },
    error: (message: string) => {
      if (enabled("error")) console.error(format(message));
    },
  };
}

/**
 * Create the default logger for a component
 */
export function createDefaultLogger(component: string): Logger {
  return createLogger({ prefix: `[${component}]` });
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

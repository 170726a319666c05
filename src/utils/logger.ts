/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export const LOG_LEVEL_NAMES: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "none",
];

// Module-level state
let currentLogLevel: LogLevel = "info";

/**
 * Set the active log level.
 * Called once at startup with the configured level; tests may call it freely.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Simple logger with configurable log levels.
 *
 * Before configuration, defaults to "info".
 *
 * Log levels (from most to least verbose):
 * - debug: Detailed debugging information (script runs, output sizes)
 * - info: General operational information (default)
 * - warn: Warning messages
 * - error: Error messages only
 * - none: No logging
 */
export const logger = {
  debug(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.debug) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  },

  info(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.info) {
      console.info(`[INFO] ${message}`, ...args);
    }
  },

  warn(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.warn) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  },

  error(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.error) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
};

/**
 * Level-filtered console logger
 */

import { LOG_LEVELS, DEFAULT_LOG_LEVEL } from './config.js';
import type { LogLevel, Logger } from './types.js';

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a logger that drops messages below `level`.
 * Output goes to stderr so stdout stays reserved for results.
 */
export function createLogger(
  level: LogLevel = DEFAULT_LOG_LEVEL,
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const threshold = SEVERITY[level];

  const emit = (messageLevel: LogLevel, message: string) => {
    if (SEVERITY[messageLevel] >= threshold) {
      write(`${messageLevel}: ${message}`);
    }
  };

  return {
    debug: (message) => emit('DEBUG', message),
    info: (message) => emit('INFO', message),
    warn: (message) => emit('WARNING', message)
  };
}

// Used when a caller does not hand in a logger
export const silentLogger: Logger = createLogger('WARNING', () => {});

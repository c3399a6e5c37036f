/**
 * Simple structured logger for the analysis pipeline.
 *
 * Provides consistent log formatting with component context.
 * Respects LOG_LEVEL environment variable (debug, info, warn, error)
 * unless a level was set explicitly with setLogLevel().
 *
 * Usage:
 *   import { logger } from './lib/logger.js';
 *   logger.info('Collectors', 'Fetching page', { url });
 *   logger.error('Providers', 'Request failed', error);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let overrideLevel: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Force a minimum level (pass null to go back to LOG_LEVEL)
 */
export function setLogLevel(level: LogLevel | null): void {
  overrideLevel = level;
}

/**
 * Get the minimum log level from the override or environment
 */
function getMinLevel(): number {
  if (overrideLevel) {
    return LOG_LEVELS[overrideLevel];
  }
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

function formatMessage(component: string, message: string): string {
  return `[${component}] ${message}`;
}

/**
 * Structured logger with component context
 */
export const logger = {
  /**
   * Debug-level logging (only shown when LOG_LEVEL=debug)
   */
  debug(component: string, message: string, meta?: unknown): void {
    if (getMinLevel() <= LOG_LEVELS.debug) {
      if (meta !== undefined) {
        console.debug(formatMessage(component, message), meta);
      } else {
        console.debug(formatMessage(component, message));
      }
    }
  },

  info(component: string, message: string, meta?: unknown): void {
    if (getMinLevel() <= LOG_LEVELS.info) {
      if (meta !== undefined) {
        console.info(formatMessage(component, message), meta);
      } else {
        console.info(formatMessage(component, message));
      }
    }
  },

  warn(component: string, message: string, meta?: unknown): void {
    if (getMinLevel() <= LOG_LEVELS.warn) {
      if (meta !== undefined) {
        console.warn(formatMessage(component, message), meta);
      } else {
        console.warn(formatMessage(component, message));
      }
    }
  },

  error(component: string, message: string, error?: unknown): void {
    if (getMinLevel() <= LOG_LEVELS.error) {
      if (error !== undefined) {
        console.error(formatMessage(component, message), error);
      } else {
        console.error(formatMessage(component, message));
      }
    }
  },
};

export default logger;

/**
 * Centralized pino logger factory for stacksmith.
 *
 * Singleton pattern. Diagnostics go to stderr so that stdout stays reserved
 * for the step-by-step progress lines. Context via child loggers
 * (getLogger('runner')).
 */

import pino from 'pino';
import type { LogLevel } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: LogLevel;
}

function createStderrLogger(level: LogLevel): pino.Logger {
  return pino(
    {
      level,
      base: { name: 'stacksmith' },
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging section of the resolved StackConfig
 */
export function initLogger(config: LoggerConfig): pino.Logger {
  rootLogger = createStderrLogger(config.level);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a warn-level stderr logger so
 * tests and early startup code never crash.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= createStderrLogger('warn');
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and drop the logger.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}

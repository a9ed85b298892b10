/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Custom formatters for uppercase level labels and ISO
 * timestamps. Context via child loggers (getLogger('subsystem')).
 *
 * The mediator never chooses a sink: the host passes a destination to
 * initLogger, otherwise entries go to stderr.
 */

import pino from 'pino';

let rootLogger: pino.Logger | null = null;

export type Logger = pino.Logger;

export interface LoggerConfig {
  level: string;
}

/** Anything pino can write serialized log lines to. */
export type LogDestination = pino.DestinationStream;

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Create a standalone logger with the mediator's formatting.
 *
 * @param config      - Level settings
 * @param destination - Sink for serialized entries (defaults to stderr)
 */
export function createLogger(config: LoggerConfig, destination?: LogDestination): pino.Logger {
  return pino(
    {
      level: config.level,
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination(2),
  );
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @returns The root pino logger instance
 */
export function initLogger(config: LoggerConfig, destination?: LogDestination): pino.Logger {
  rootLogger = createLogger(config, destination);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so early startup code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'mediator', 'validation')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: levelFormatter },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}

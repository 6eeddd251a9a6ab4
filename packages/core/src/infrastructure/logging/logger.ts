/**
 * @fileoverview Logger - Structured Logging with pino
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The library logs through a process-wide default logger that applications
 * replace with their own at startup:
 *
 * ```typescript
 * setDefaultLogger(createLogger(loadLoggingConfig()));
 * ```
 *
 * @version 1.0.0
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger.
 */
export const LogLevel = {
  TRACE: 'trace',
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
  FATAL: 'fatal',
  SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  level: LogLevel;
  /**
   * Emitted as `service` on every line.
   */
  serviceName: string;
  /**
   * Extra fields bound to every line.
   */
  base?: Record<string, unknown>;
}

/**
 * Create a configured pino logger.
 *
 * @remarks
 * Timestamps are ISO-8601 and the level is written as its label
 * (`"level":"info"`), not pino's numeric code.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      service: config.serviceName,
      ...config.base,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return pino(options);
}

/**
 * Create a child logger with additional bindings.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

let defaultLogger: Logger = createLogger({ level: LogLevel.INFO, serviceName: 'tessera' });

/**
 * Replace the process-wide default logger.
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Get the process-wide default logger.
 */
export function getLogger(): Logger {
  return defaultLogger;
}

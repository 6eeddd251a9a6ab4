/**
 * @fileoverview Infrastructure Logging Exports
 *
 * @module @tessera/core/infrastructure/logging
 * @license Apache-2.0
 */

export {
  type Logger,
  type LoggerConfig,
  LogLevel,
  createLogger,
  createChildLogger,
  setDefaultLogger,
  getLogger,
} from './logger';

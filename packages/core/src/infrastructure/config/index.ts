/**
 * @fileoverview Infrastructure Config Exports
 *
 * @module @tessera/core/infrastructure/config
 * @license Apache-2.0
 */

export { z, parseEnv, LoggingEnvSchema, type LoggingEnv, loadLoggingConfig } from './env';

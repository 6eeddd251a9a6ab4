/**
 * @fileoverview Domain Error Exports
 *
 * @module @tessera/core/domain/errors
 * @license Apache-2.0
 */

export {
  TesseraError,
  ArgumentError,
  DomainValidationError,
  ConfigurationError,
  requireArgument,
} from './tessera.errors';

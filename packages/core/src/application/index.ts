/**
 * @fileoverview Application Layer Exports
 *
 * @module @tessera/core/application
 * @license Apache-2.0
 */

export * from './mapping';

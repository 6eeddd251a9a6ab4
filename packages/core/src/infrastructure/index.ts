/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains external concerns: the container,
 * logging, configuration and mapper discovery.
 *
 * @module @tessera/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection implementation
// ============================================================================
export * from './di';

// ============================================================================
// Logging - pino
// ============================================================================
export * from './logging';

// ============================================================================
// Config - Environment parsing with zod
// ============================================================================
export * from './config';

// ============================================================================
// Mapping - Event mapper discovery and registration
// ============================================================================
export * from './mapping';

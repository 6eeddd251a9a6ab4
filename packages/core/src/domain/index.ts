/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains pure business logic that is technology-agnostic.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @tessera/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Errors - Argument, validation and configuration failures
// ============================================================================
export * from './errors';

// ============================================================================
// Model - Entity and value-object equality
// ============================================================================
export * from './model';

// ============================================================================
// Events - Event markers and domain event notifications
// ============================================================================
export * from './events';

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';

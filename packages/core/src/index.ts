/**
 * @fileoverview @tessera/core - Main Entry Point
 *
 * Tessera Core
 * Building blocks for Domain-Driven Design on Node.js: entity and
 * value-object equality, domain event notifications, and a registry
 * that wires event mappers into a dependency injection container.
 *
 * @packageDocumentation
 * @module @tessera/core
 * @version 1.0.0-alpha.1
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   addEventMappers,
 *   createServiceCollection,
 *   eventMapperOf,
 *   eventMapperToken,
 * } from '@tessera/core';
 *
 * class UserCreatedEventMapper implements IEventMapper<UserCreatedNotification> {
 *   static readonly mapsFrom = [eventMapperOf(UserCreatedNotification)];
 *
 *   async createEvents(notification: UserCreatedNotification) {
 *     return [new UserRegisteredIntegrationEvent(notification.domainEvent.userId)];
 *   }
 * }
 *
 * const provider = addEventMappers(createServiceCollection(), [UserCreatedEventMapper]).build();
 * const mapper = provider.resolve(eventMapperToken(UserCreatedNotification));
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Pure business logic - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Mapper contracts and capabilities
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Container, logging, configuration, mapper discovery
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0-alpha.1';

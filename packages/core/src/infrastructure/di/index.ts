/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete container implementations, for the application's composition root.
 */

export { ServiceCollection, createServiceCollection } from './service-collection';

export { ServiceProvider, type ServiceProviderOptions } from './service-provider';

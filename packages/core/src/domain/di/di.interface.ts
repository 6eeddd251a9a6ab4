/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Two phases:
 *
 * ```
 * startup                              runtime
 * ───────────────────────────────      ─────────────────────────────
 * IServiceCollection                   IServiceProvider
 *   .addSingleton(...)                   .resolve(token)
 *   .addTransient(...)     build() ─▶    .resolveAll(token)
 *   addEventMappers(services, ...)       .dispose()
 * ```
 *
 * The collection is sealed by `build()`; the provider never changes afterwards,
 * so any number of concurrent callers may resolve from it.
 *
 * @version 1.0.0
 */

import { type IServiceDescriptor, type ServiceFactory } from './service-descriptor';
import { type ServiceIdentifier, type Constructor } from './service-identifier';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Objects that release resources when the provider is disposed.
 *
 * @remarks
 * Only cached (Singleton) instances are disposed by the provider; transient
 * instances belong to whoever resolved them.
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' && obj !== null && 'dispose' in obj && typeof obj.dispose === 'function'
  );
}

// ============================================================================
// IServiceCollection - Service Registration
// ============================================================================

/**
 * IServiceCollection - Fluent API for registering services.
 *
 * @remarks
 * Registering an identifier again does not replace the earlier registration;
 * both are kept. `resolve` returns the latest, `resolveAll` every one in
 * registration order.
 *
 * @example
 * ```typescript
 * const services = createServiceCollection()
 *   .addSingleton(IClock, SystemClock)
 *   .addTransient(eventMapperToken(UserCreatedNotification), UserCreatedEventMapper);
 *
 * const provider = services.build();
 * ```
 */
export interface IServiceCollection {
  /**
   * Register a singleton service (self-registration).
   */
  addSingleton<T>(implementation: Constructor<T>): this;

  /**
   * Register a singleton service (interface-to-implementation).
   */
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;

  /**
   * Register a singleton built by a factory.
   */
  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  /**
   * Register an existing instance as a singleton.
   */
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this;

  /**
   * Register a transient service (self-registration).
   */
  addTransient<T>(implementation: Constructor<T>): this;

  /**
   * Register a transient service (interface-to-implementation).
   */
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;

  /**
   * Register a transient service built by a factory.
   */
  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  /**
   * Add a prepared descriptor.
   */
  addDescriptor<T>(descriptor: IServiceDescriptor<T>): this;

  /**
   * Check if at least one registration exists for the identifier.
   */
  has(identifier: ServiceIdentifier): boolean;

  /**
   * All descriptors, in registration order.
   */
  getDescriptors(): readonly IServiceDescriptor[];

  /**
   * Seal the collection and build the provider.
   */
  build(options?: IBuildOptions): IServiceProvider;
}

// ============================================================================
// IServiceProvider - Service Resolution
// ============================================================================

/**
 * IServiceProvider - Resolve services from the container.
 *
 * @example
 * ```typescript
 * const mapper = provider.resolve(eventMapperToken(UserCreatedNotification));
 * const events = await mapper.createEvents(notification);
 * ```
 */
export interface IServiceProvider {
  /**
   * Resolve the latest registration for an identifier.
   *
   * @throws ServiceNotRegisteredError if not registered
   * @throws CircularDependencyError if circular dependency detected
   * @throws ScopeMismatchError if a captive dependency is detected
   * @throws ServiceCreationError if a constructor or factory throws
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Like `resolve`, but `undefined` when nothing is registered.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;

  /**
   * Resolve every registration for an identifier, in registration order.
   *
   * @returns An empty array when nothing is registered
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>): T[];

  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Dispose every cached singleton that implements IDisposable.
   */
  dispose(): Promise<void>;
}

// ============================================================================
// Build Options
// ============================================================================

/**
 * Options for building the service provider.
 */
export interface IBuildOptions {
  /**
   * Reject captive dependencies (Singleton depending on Transient) at build time.
   *
   * Default: true
   */
  validateScopes?: boolean;

  /**
   * Instantiate every singleton during build, surfacing configuration errors early.
   *
   * Default: false
   */
  eagerSingletons?: boolean;
}

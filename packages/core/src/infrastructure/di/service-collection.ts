/**
 * @fileoverview ServiceCollection - Service Registration Implementation
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Registrations are kept per identifier in registration order. Nothing is
 * ever replaced: the provider resolves the latest and `resolveAll` sees them
 * all, which is what lets several modules contribute mappers for the same
 * notification.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type ServiceFactory,
  type IServiceCollection,
  type IServiceProvider,
  ServiceLifetime,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
  ContainerSealedError,
} from '../../domain/di';

import { ServiceProvider, type ServiceProviderOptions } from './service-provider';

/**
 * ServiceCollection - Fluent API for service registration.
 *
 * @remarks
 * Not meant for concurrent use; fill it once during startup, then `build()`.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services.addSingleton(IClock, SystemClock);
 * addEventMappers(services, userMappers, orderMappers);
 *
 * const provider = services.build();
 * ```
 */
export class ServiceCollection implements IServiceCollection {
  /**
   * Registrations per identifier, oldest first.
   */
  private readonly descriptors = new Map<ServiceIdentifier, IServiceDescriptor[]>();

  /**
   * Every registration, oldest first.
   */
  private readonly registrationOrder: IServiceDescriptor[] = [];

  private sealed = false;

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingleton<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.addDescriptor(createClassDescriptor(identifier, ServiceLifetime.Singleton, impl));
  }

  addSingletonFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.addDescriptor(
      createFactoryDescriptor(identifier, ServiceLifetime.Singleton, factory),
    );
  }

  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    return this.addDescriptor(createInstanceDescriptor(identifier, instance));
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransient<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.addDescriptor(createClassDescriptor(identifier, ServiceLifetime.Transient, impl));
  }

  addTransientFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.addDescriptor(
      createFactoryDescriptor(identifier, ServiceLifetime.Transient, factory),
    );
  }

  // ============================================================================
  // Descriptor Registration
  // ============================================================================

  /**
   * Register a prepared descriptor.
   *
   * @throws ContainerSealedError after `build()`
   * @throws TypeError if the descriptor is malformed
   */
  addDescriptor<T>(descriptor: IServiceDescriptor<T>): this {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
    validateDescriptor(descriptor);

    const existing = this.descriptors.get(descriptor.serviceIdentifier);
    if (existing) {
      existing.push(descriptor);
    } else {
      this.descriptors.set(descriptor.serviceIdentifier, [descriptor]);
    }
    this.registrationOrder.push(descriptor);

    return this;
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  has(identifier: ServiceIdentifier): boolean {
    return this.descriptors.has(identifier);
  }

  getDescriptors(): readonly IServiceDescriptor[] {
    return [...this.registrationOrder];
  }

  /**
   * The descriptor `resolve` would use: the latest one for the identifier.
   */
  getDescriptor<T>(identifier: ServiceIdentifier<T>): IServiceDescriptor<T> | undefined {
    const registrations = this.descriptors.get(identifier) as IServiceDescriptor<T>[] | undefined;
    return registrations?.[registrations.length - 1];
  }

  /**
   * Every descriptor registered for the identifier, oldest first.
   */
  getDescriptorsFor<T>(identifier: ServiceIdentifier<T>): readonly IServiceDescriptor<T>[] {
    const registrations = this.descriptors.get(identifier) as IServiceDescriptor<T>[] | undefined;
    return registrations ? [...registrations] : [];
  }

  /**
   * Remove every registration for an identifier.
   *
   * @returns True if anything was removed
   */
  remove(identifier: ServiceIdentifier): boolean {
    if (this.sealed) {
      throw new ContainerSealedError();
    }

    const removed = this.descriptors.delete(identifier);
    if (removed) {
      const kept = this.registrationOrder.filter((d) => d.serviceIdentifier !== identifier);
      this.registrationOrder.splice(0, this.registrationOrder.length, ...kept);
    }
    return removed;
  }

  clear(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
    this.descriptors.clear();
    this.registrationOrder.length = 0;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Seal the collection and build the provider.
   */
  build(options?: ServiceProviderOptions): IServiceProvider {
    this.sealed = true;

    const snapshot = new Map<ServiceIdentifier, readonly IServiceDescriptor[]>();
    for (const [identifier, registrations] of this.descriptors) {
      snapshot.set(identifier, [...registrations]);
    }

    return new ServiceProvider(snapshot, options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Handles `add*(Implementation)` and `add*(Identifier, Implementation)`.
   */
  private normalizeArgs<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): [ServiceIdentifier<T>, Constructor<T>] {
    if (implementation !== undefined) {
      return [identifierOrImpl, implementation];
    }

    if (typeof identifierOrImpl === 'function') {
      return [identifierOrImpl, identifierOrImpl];
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or [identifier, implementation], ` +
        `got ${typeof identifierOrImpl}`,
    );
  }
}

/**
 * Create a new ServiceCollection.
 */
export function createServiceCollection(): ServiceCollection {
  return new ServiceCollection();
}

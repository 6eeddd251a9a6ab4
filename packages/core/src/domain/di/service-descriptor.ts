/**
 * @fileoverview IServiceDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * One descriptor per registration. An identifier may carry several
 * descriptors; the container resolves the latest and can enumerate all.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, type Constructor, getServiceName } from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Factory function type for creating service instances.
 *
 * @example
 * ```typescript
 * const clockFactory: ServiceFactory<IClock> = () => ({ now: () => new Date() });
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * Minimal resolver handed to factories.
 */
export interface IServiceResolver {
  resolve<T>(identifier: ServiceIdentifier<T>): T;
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;
}

/**
 * IServiceDescriptor - Everything the container needs to build one service.
 *
 * @remarks
 * Exactly one of `implementationType` and `factory` is set.
 */
export interface IServiceDescriptor<T = unknown> {
  readonly serviceIdentifier: ServiceIdentifier<T>;
  readonly lifetime: ServiceLifetime;

  /**
   * Concrete class; its `static inject` dependencies are resolved first.
   */
  readonly implementationType?: Constructor<T> | undefined;

  /**
   * Builds the instance instead of a constructor.
   */
  readonly factory?: ServiceFactory<T> | undefined;

  /**
   * Tags for filtering, e.g. `['event-mapper']`.
   */
  readonly tags?: readonly string[] | undefined;

  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Options for creating a descriptor.
 */
export interface IServiceDescriptorOptions {
  tags?: readonly string[];
  metadata?: Record<string, unknown>;
}

/**
 * Create a descriptor for a class-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createClassDescriptor(
 *   eventMapperToken(UserCreatedNotification),
 *   ServiceLifetime.Transient,
 *   UserCreatedEventMapper,
 *   { tags: ['event-mapper'] },
 * );
 * ```
 */
export function createClassDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  implementationType: Constructor<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    implementationType,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for a factory-based registration.
 */
export function createFactoryDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    factory,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for an existing instance. Always Singleton.
 */
export function createInstanceDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  instance: T,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return createFactoryDescriptor(serviceIdentifier, ServiceLifetime.Singleton, () => instance, options);
}

/**
 * Validate a descriptor.
 *
 * @throws TypeError if the descriptor has neither or both of
 * `implementationType` and `factory`, or if either is not a function
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const hasImplementation = descriptor.implementationType !== undefined;
  const hasFactory = descriptor.factory !== undefined;

  if (hasImplementation === hasFactory) {
    throw new TypeError(
      `Descriptor for '${name}' must have exactly one of implementationType or factory`,
    );
  }

  if (hasImplementation && typeof descriptor.implementationType !== 'function') {
    throw new TypeError(`implementationType for '${name}' must be a constructor function`);
  }

  if (hasFactory && typeof descriptor.factory !== 'function') {
    throw new TypeError(`factory for '${name}' must be a function`);
  }
}

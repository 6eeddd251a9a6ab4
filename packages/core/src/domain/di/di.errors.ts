/**
 * @fileoverview DI Errors - Dependency Injection Error Classes
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Each error records the resolution path that led to it, so a failure deep in
 * a dependency graph still tells you where it started.
 *
 * @version 1.0.0
 */

import { TesseraError } from '../errors';

import { type ServiceIdentifier, getServiceName } from './service-identifier';
import { type ServiceLifetime, getLifetimeName } from './service-lifetime';

/**
 * Base error class for all DI-related errors.
 *
 * @example
 * ```typescript
 * try {
 *   provider.resolve(eventMapperToken(OrderPlacedNotification));
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     logger.error({ path: error.resolutionPath }, error.message);
 *   }
 * }
 * ```
 */
export abstract class DIError extends TesseraError {
  /**
   * Chain of services being resolved when the error occurred, outermost first.
   */
  public readonly resolutionPath: string[];

  /**
   * The resolution path drawn as an indented tree:
   * ```
   * OrderPlacedEventMapper
   *   └─ IClock (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = resolutionPath
      .map((entry, depth) => `${'  '.repeat(depth)}${depth === 0 ? '' : '└─ '}${entry}`)
      .join('\n');
  }
}

/**
 * A requested service has no registration.
 *
 * @remarks
 * For mappers this usually means the mapper's module was never passed to
 * `addEventMappers`, or its class does not list the capability in `mapsFrom`.
 */
export class ServiceNotRegisteredError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(
      `Service '${name}' is not registered in the container. ` +
        `Did you forget to register it before calling build()?`,
      [...resolutionPath, `${name} (UNREGISTERED)`],
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * A service (indirectly) depends on itself.
 */
export class CircularDependencyError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The cycle, starting and ending with the same service.
   */
  public readonly cyclePath: string[];

  constructor(identifier: ServiceIdentifier, resolutionPath: string[]) {
    const name = getServiceName(identifier);
    const cyclePath = [...resolutionPath, name];

    super(
      `Circular dependency detected: ${cyclePath.join(' -> ')}\n\n` +
        `To fix:\n` +
        `  1. Refactor to break the cycle\n` +
        `  2. Resolve lazily through SERVICE_PROVIDER_TOKEN`,
      [...resolutionPath, `${name} (CIRCULAR!)`],
    );
    this.serviceIdentifier = identifier;
    this.cyclePath = cyclePath;
  }
}

/**
 * A longer-lived service depends on a shorter-lived one (captive dependency).
 *
 * @example
 * ```typescript
 * // Singleton holding a Transient mapper: the "new instance per resolution"
 * // promise of the mapper would silently be broken.
 * class MapperCache {
 *   static inject = [eventMapperToken(UserCreatedNotification)] as const;
 * }
 * services.addSingleton(MapperCache); // ScopeMismatchError at build()
 * ```
 */
export class ScopeMismatchError extends DIError {
  public readonly dependentIdentifier: ServiceIdentifier;
  public readonly dependencyIdentifier: ServiceIdentifier;
  public readonly dependentLifetime: ServiceLifetime;
  public readonly dependencyLifetime: ServiceLifetime;

  constructor(
    dependentId: ServiceIdentifier,
    dependencyId: ServiceIdentifier,
    dependentLifetime: ServiceLifetime,
    dependencyLifetime: ServiceLifetime,
    resolutionPath: string[] = [],
  ) {
    const dependentName = getServiceName(dependentId);
    const dependencyName = getServiceName(dependencyId);
    const dependentLifetimeName = getLifetimeName(dependentLifetime);
    const dependencyLifetimeName = getLifetimeName(dependencyLifetime);

    super(
      `Scope mismatch: ${dependentLifetimeName} service '${dependentName}' ` +
        `cannot depend on ${dependencyLifetimeName} service '${dependencyName}'.`,
      [...resolutionPath, `${dependencyName} (${dependencyLifetimeName}) ← SCOPE MISMATCH`],
    );

    this.dependentIdentifier = dependentId;
    this.dependencyIdentifier = dependencyId;
    this.dependentLifetime = dependentLifetime;
    this.dependencyLifetime = dependencyLifetime;
  }
}

/**
 * A constructor or factory threw. The original error is kept as `cause`.
 */
export class ServiceCreationError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;
  public override readonly cause: Error;

  constructor(identifier: ServiceIdentifier, cause: Error, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(`Failed to create service '${name}': ${cause.message}`, [
      ...resolutionPath,
      `${name} (CREATION FAILED)`,
    ]);
    this.serviceIdentifier = identifier;
    this.cause = cause;
  }
}

/**
 * Registration attempted after `build()`.
 */
export class ContainerSealedError extends DIError {
  constructor() {
    super(
      'Cannot register services after the container has been built. ' +
        'Register all services, event mappers included, before calling build().',
    );
  }
}

/**
 * Resolution attempted on a disposed provider.
 */
export class ProviderDisposedError extends DIError {
  constructor() {
    super('ServiceProvider has been disposed');
  }
}

/**
 * @fileoverview ServiceProvider - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(identifier)
 *   1. Take the latest descriptor for the identifier
 *   2. Fail if the identifier is already on the resolution stack (cycle)
 *   3. Singleton: return the cached instance, creating it once
 *      Transient: always create
 *   4. Creating:
 *      a. factory(resolver), or
 *      b. resolve `static inject` dependencies, then `new ctor(...deps)`
 * ```
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type IServiceProvider,
  type IServiceResolver,
  type IBuildOptions,
  ServiceLifetime,
  getServiceName,
  getInjectDependencies,
  canDependOn,
  isDisposable,
  createInstanceDescriptor,
  DIError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  ServiceCreationError,
  ProviderDisposedError,
  SERVICE_PROVIDER_TOKEN,
} from '../../domain/di';
import { type Logger, getLogger } from '../logging';

/**
 * Build options accepted by the concrete provider.
 */
export interface ServiceProviderOptions extends IBuildOptions {
  /**
   * Logger for provider diagnostics. Default: the process-wide default logger.
   */
  logger?: Logger;
}

type ResolvedOptions = Required<IBuildOptions> & { logger: Logger };

/**
 * ServiceProvider - IServiceProvider implementation.
 *
 * @remarks
 * The descriptor map is never modified after construction and singletons are
 * created synchronously, so concurrent async callers always observe the same
 * singleton instance.
 *
 * @example
 * ```typescript
 * const provider = services.build({ eagerSingletons: true });
 *
 * const mappers = provider.resolveAll(flexibleEventMapperToken(UserCreatedNotification));
 * ```
 */
export class ServiceProvider implements IServiceProvider, IServiceResolver {
  private readonly descriptors: ReadonlyMap<ServiceIdentifier, readonly IServiceDescriptor[]>;

  /**
   * Singleton instances, one per descriptor.
   */
  private readonly singletonCache = new Map<IServiceDescriptor, unknown>();

  private readonly options: ResolvedOptions;

  private disposed = false;

  constructor(
    descriptors: ReadonlyMap<ServiceIdentifier, readonly IServiceDescriptor[]>,
    options?: ServiceProviderOptions,
  ) {
    const withSelf = new Map(descriptors);
    if (!withSelf.has(SERVICE_PROVIDER_TOKEN)) {
      withSelf.set(SERVICE_PROVIDER_TOKEN, [createInstanceDescriptor(SERVICE_PROVIDER_TOKEN, this)]);
    }
    this.descriptors = withSelf;

    this.options = {
      validateScopes: options?.validateScopes ?? true,
      eagerSingletons: options?.eagerSingletons ?? false,
      logger: options?.logger ?? getLogger(),
    };

    if (this.options.validateScopes) {
      this.validateScopeDependencies();
    }

    if (this.options.eagerSingletons) {
      this.createEagerSingletons();
    }
  }

  // ============================================================================
  // IServiceProvider Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    this.ensureNotDisposed();
    return this.resolveInternal(identifier, []);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    if (!this.isRegistered(identifier)) {
      return undefined;
    }
    return this.resolve(identifier);
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    this.ensureNotDisposed();

    return this.getRegistrations(identifier).map((descriptor) =>
      this.resolveDescriptor(descriptor, []),
    );
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.descriptors.has(identifier);
  }

  /**
   * Dispose every disposable singleton, newest first.
   *
   * @remarks
   * Disposal is best-effort: a failing `dispose()` is logged and the
   * remaining singletons are still disposed.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    const instances = [...this.singletonCache.values()].reverse();
    this.singletonCache.clear();

    for (const instance of instances) {
      if (instance === this || !isDisposable(instance)) {
        continue;
      }
      try {
        await instance.dispose();
      } catch (error) {
        this.options.logger.error({ err: error }, 'Error disposing singleton');
      }
    }
  }

  // ============================================================================
  // Internal Resolution
  // ============================================================================

  private getRegistrations<T>(identifier: ServiceIdentifier<T>): readonly IServiceDescriptor<T>[] {
    return (this.descriptors.get(identifier) ?? []) as readonly IServiceDescriptor<T>[];
  }

  private resolveInternal<T>(
    identifier: ServiceIdentifier<T>,
    resolutionStack: readonly ServiceIdentifier[],
  ): T {
    if (resolutionStack.includes(identifier)) {
      throw new CircularDependencyError(identifier, resolutionStack.map(getServiceName));
    }

    const registrations = this.getRegistrations(identifier);
    const descriptor = registrations[registrations.length - 1];
    if (!descriptor) {
      throw new ServiceNotRegisteredError(identifier, resolutionStack.map(getServiceName));
    }

    return this.resolveDescriptor(descriptor, resolutionStack);
  }

  private resolveDescriptor<T>(
    descriptor: IServiceDescriptor<T>,
    resolutionStack: readonly ServiceIdentifier[],
  ): T {
    switch (descriptor.lifetime) {
      case ServiceLifetime.Singleton:
        return this.resolveSingleton(descriptor, resolutionStack);

      case ServiceLifetime.Transient:
        return this.createInstance(descriptor, resolutionStack);

      default:
        throw new TypeError(`Unknown lifetime: ${String(descriptor.lifetime)}`);
    }
  }

  private resolveSingleton<T>(
    descriptor: IServiceDescriptor<T>,
    resolutionStack: readonly ServiceIdentifier[],
  ): T {
    if (this.singletonCache.has(descriptor)) {
      return this.singletonCache.get(descriptor) as T;
    }

    const instance = this.createInstance(descriptor, resolutionStack);
    this.singletonCache.set(descriptor, instance);

    return instance;
  }

  private createInstance<T>(
    descriptor: IServiceDescriptor<T>,
    resolutionStack: readonly ServiceIdentifier[],
  ): T {
    const newStack = [...resolutionStack, descriptor.serviceIdentifier];

    try {
      if (descriptor.factory) {
        return descriptor.factory(this.createResolver(newStack));
      }

      if (descriptor.implementationType) {
        return this.createFromConstructor(descriptor.implementationType, descriptor, newStack);
      }

      throw new TypeError(
        `No factory or implementation type for '${getServiceName(descriptor.serviceIdentifier)}'`,
      );
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }

      throw new ServiceCreationError(
        descriptor.serviceIdentifier,
        error instanceof Error ? error : new Error(String(error)),
        resolutionStack.map(getServiceName),
      );
    }
  }

  private createFromConstructor<T>(
    ctor: Constructor<T>,
    descriptor: IServiceDescriptor<T>,
    resolutionStack: readonly ServiceIdentifier[],
  ): T {
    const dependencies = getInjectDependencies(ctor);

    if (this.options.validateScopes) {
      this.validateDependencyScopes(descriptor, dependencies, resolutionStack);
    }

    const resolvedDeps = dependencies.map((dep) => this.resolveInternal(dep, resolutionStack));

    return new ctor(...resolvedDeps);
  }

  /**
   * Resolver handed to factories; keeps the factory on the resolution stack.
   */
  private createResolver(resolutionStack: readonly ServiceIdentifier[]): IServiceResolver {
    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): T =>
        this.resolveInternal(identifier, resolutionStack),
      tryResolve: <T>(identifier: ServiceIdentifier<T>): T | undefined =>
        this.isRegistered(identifier) ? this.resolveInternal(identifier, resolutionStack) : undefined,
    };
  }

  // ============================================================================
  // Validation
  // ============================================================================

  private validateScopeDependencies(): void {
    for (const registrations of this.descriptors.values()) {
      for (const descriptor of registrations) {
        if (descriptor.implementationType) {
          const deps = getInjectDependencies(descriptor.implementationType);
          this.validateDependencyScopes(descriptor, deps, []);
        }
      }
    }
  }

  /**
   * @throws ScopeMismatchError when a dependency lives shorter than its dependent
   */
  private validateDependencyScopes(
    descriptor: IServiceDescriptor,
    dependencies: readonly ServiceIdentifier[],
    resolutionStack: readonly ServiceIdentifier[],
  ): void {
    for (const dep of dependencies) {
      const registrations = this.getRegistrations(dep);
      const depDescriptor = registrations[registrations.length - 1];

      // Unregistered dependencies fail later, during resolution
      if (!depDescriptor) {
        continue;
      }

      if (!canDependOn(descriptor.lifetime, depDescriptor.lifetime)) {
        throw new ScopeMismatchError(
          descriptor.serviceIdentifier,
          dep,
          descriptor.lifetime,
          depDescriptor.lifetime,
          resolutionStack.map(getServiceName),
        );
      }
    }
  }

  private createEagerSingletons(): void {
    for (const registrations of this.descriptors.values()) {
      for (const descriptor of registrations) {
        if (descriptor.lifetime === ServiceLifetime.Singleton) {
          this.resolveSingleton(descriptor, []);
        }
      }
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ProviderDisposedError();
    }
  }
}

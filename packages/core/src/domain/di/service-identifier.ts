/**
 * @fileoverview ServiceIdentifier - Keys Used to Register and Resolve Services
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A service is identified by one of:
 *
 * 1. **Constructor**: the class itself, `services.addTransient(UserCreatedEventMapper)`
 * 2. **Symbol**: a token standing for an interface, `createToken<IClock>('IClock')`
 * 3. **String**: configuration-driven keys, `'mappers.user-created'`
 *
 * Identifiers are compared by identity: two classes that happen to share a
 * name are two different services.
 *
 * ## Zero-Reflection Dependencies
 *
 * No decorators and no reflect-metadata. A class lists what its constructor
 * needs in a static `inject` array, in parameter order.
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Abstract constructor type, for abstract base classes.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * ServiceIdentifier - Unified type for identifying services in the container.
 *
 * @template T - The service instance type
 *
 * @example
 * ```typescript
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * services.addSingleton(IClock, SystemClock);
 * const clock = provider.resolve(IClock); // typed as IClock
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceIdentifier<T = any> = Constructor<T> | symbol | string;

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used in error messages and logs.
 *
 * @example
 * ```typescript
 * getServiceName(SystemClock); // 'SystemClock'
 * getServiceName(Symbol('IClock')); // 'Symbol(IClock)'
 * getServiceName('clock'); // 'clock'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }

  if (typeof identifier === 'string') {
    return identifier;
  }

  return identifier.name || 'AnonymousClass';
}

// ============================================================================
// Static Inject Pattern
// ============================================================================

/**
 * A constructor that declares its dependencies via `static inject`.
 *
 * @example
 * ```typescript
 * class UserCreatedEventMapper {
 *   static inject = [IClock] as const;
 *   constructor(private readonly clock: IClock) {}
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export interface IInjectableConstructor<T = any> extends Constructor<T> {
  /**
   * Dependency identifiers, in constructor parameter order.
   */
  inject?: readonly ServiceIdentifier[];
}

/**
 * Check if a constructor has a static inject array.
 */
export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Get dependencies from a constructor's static inject property.
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token (Symbol) for an interface.
 *
 * @template T - The interface type this token stands for
 * @param description - Shown in errors and logs
 *
 * @example
 * ```typescript
 * interface IOutbox { enqueue(events: readonly unknown[]): Promise<void>; }
 * const IOutbox = createToken<IOutbox>('IOutbox');
 * ```
 */
export function createToken<T>(description: string): ServiceIdentifier<T> {
  return Symbol(description);
}

/**
 * Token for the service provider itself.
 *
 * @example
 * ```typescript
 * class MapperLocator {
 *   static inject = [SERVICE_PROVIDER_TOKEN] as const;
 *   constructor(private readonly provider: IServiceProvider) {}
 * }
 * ```
 */
export const SERVICE_PROVIDER_TOKEN = Symbol('IServiceProvider');

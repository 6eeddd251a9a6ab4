/**
 * @fileoverview ServiceLifetime - When Service Instances Are Created
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * | Lifetime | Created | Shared | Destroyed |
 * |----------|---------|--------|-----------|
 * | Singleton | First resolution | Across the provider | `provider.dispose()` |
 * | Transient | Every resolution | Never | GC collected |
 *
 * Event mappers are registered as Transient: each resolution gets a fresh
 * mapper, so a mapper may keep per-call state without leaking it.
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created and destroyed.
 *
 * @remarks
 * A Singleton must not depend on a Transient: the singleton would capture one
 * transient instance forever ("captive dependency"). The provider rejects
 * that graph when `validateScopes` is on.
 *
 * @example
 * ```typescript
 * services.addSingleton(IClock, SystemClock);
 * services.addTransient(eventMapperToken(UserCreatedNotification), UserCreatedEventMapper);
 * ```
 */
export enum ServiceLifetime {
  /**
   * One instance per provider, created on first resolution.
   *
   * @remarks
   * Shared by every caller, so it must hold no per-call state.
   */
  Singleton = 'singleton',

  /**
   * A new instance on every resolution. Never cached.
   */
  Transient = 'transient',
}

/**
 * Get the priority of a lifetime (higher = shorter-lived).
 *
 * @internal
 */
export function getLifetimePriority(lifetime: ServiceLifetime): number {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 0;
    case ServiceLifetime.Transient:
      return 1;
    default:
      return 999;
  }
}

/**
 * Check if a service with `from` lifetime can depend on a service with `to` lifetime.
 *
 * @example
 * ```typescript
 * canDependOn(ServiceLifetime.Transient, ServiceLifetime.Singleton); // true
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Transient); // false
 * ```
 */
export function canDependOn(from: ServiceLifetime, to: ServiceLifetime): boolean {
  // Longer-lived services cannot hold shorter-lived ones
  return getLifetimePriority(from) >= getLifetimePriority(to);
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Transient:
      return 'Transient';
    default:
      return 'Unknown';
  }
}

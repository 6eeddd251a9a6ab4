/**
 * @fileoverview Entity and Aggregate Root - Identity-Based Equality
 *
 * @packageDocumentation
 * @module @tessera/core/domain/model
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Entities are distinguished by identity, not by attribute values. The helpers
 * here are free functions rather than a base class so that any class (or an
 * object built by an ORM) can opt in:
 *
 * ```typescript
 * class Customer implements IEntity<string> {
 *   constructor(readonly id: string, public name: string) {}
 *
 *   equals(other: unknown): boolean {
 *     return entityEquals(this, other);
 *   }
 *
 *   hashCode(): number {
 *     return entityHashCode(this);
 *   }
 * }
 * ```
 *
 * @version 1.0.0
 */

import { requireArgument } from '../errors';

import {
  type IEquatable,
  componentEquals,
  componentHashCode,
  isSameVariant,
} from './equality';

/**
 * Types usable as an entity identifier.
 *
 * @remarks
 * Object identifiers must implement {@link IEquatable}; otherwise two
 * identifiers holding the same value would never compare equal.
 */
export type EntityId = string | number | bigint | IEquatable;

/**
 * A domain object with a unique, stable identity.
 *
 * @template TId - Identifier type
 *
 * @remarks
 * The identity never changes after construction. This is a convention the
 * helpers rely on, not something they enforce.
 */
export interface IEntity<TId extends EntityId = EntityId> {
  readonly id: TId;
}

/**
 * Runtime tag carried by aggregate roots.
 */
export const AGGREGATE_ROOT: unique symbol = Symbol('AggregateRoot');

/**
 * An entity that is the entry point and consistency boundary of an aggregate.
 *
 * @remarks
 * Adds no comparison rule. The tag lets repositories and unit-of-work code
 * insist on receiving a root:
 *
 * ```typescript
 * class ShoppingCart implements IAggregateRoot<string> {
 *   readonly [AGGREGATE_ROOT] = true;
 *   constructor(readonly id: string) {}
 * }
 * ```
 */
export interface IAggregateRoot<TId extends EntityId = EntityId> extends IEntity<TId> {
  readonly [AGGREGATE_ROOT]: true;
}

/**
 * Check whether a value exposes an `id`.
 */
export function isEntity(value: unknown): value is IEntity {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return false;
  }

  const id: unknown = value.id;
  return (
    typeof id === 'string' ||
    typeof id === 'number' ||
    typeof id === 'bigint' ||
    (typeof id === 'object' && id !== null)
  );
}

/**
 * Check whether a value is tagged as an aggregate root.
 */
export function isAggregateRoot(value: unknown): value is IAggregateRoot {
  return isEntity(value) && AGGREGATE_ROOT in value && value[AGGREGATE_ROOT] === true;
}

/**
 * Identity equality for entities.
 *
 * @param self - The receiver (must not be absent)
 * @param other - Anything
 * @returns True when `other` is the same instance, or the same concrete class
 * with an equal `id`
 * @throws ArgumentError if `self` is absent
 *
 * @example
 * ```typescript
 * const a = new Customer('u1', 'Alice');
 * const b = new Customer('u1', 'Bob');
 *
 * entityEquals(a, b); // true - names are ignored
 * entityEquals(a, new Supplier('u1')); // false - different class
 * ```
 */
export function entityEquals<TId extends EntityId>(
  self: IEntity<TId>,
  other: unknown,
): boolean {
  requireArgument(self, 'self');

  if (other === null || other === undefined) {
    return false;
  }
  if (self === other) {
    return true;
  }
  if (!isSameVariant(self, other)) {
    return false;
  }

  return componentEquals(self.id, other.id);
}

/**
 * Hash an entity by its `id`.
 *
 * @throws ArgumentError if `self` is absent
 */
export function entityHashCode<TId extends EntityId>(self: IEntity<TId>): number {
  requireArgument(self, 'self');
  return componentHashCode(self.id);
}

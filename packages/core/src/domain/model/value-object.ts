/**
 * @fileoverview Value Object - Structural Equality from Equality Components
 *
 * @packageDocumentation
 * @module @tessera/core/domain/model
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A value object has no identity. Two value objects are equal when they are
 * the same concrete class and their ordered equality components are pairwise
 * equal.
 *
 * ```typescript
 * class Address implements IValueObject, IValueObjectWithComponents {
 *   constructor(readonly street: string, readonly city: string) {
 *     ensureValid(this);
 *   }
 *
 *   validate(): void {
 *     if (this.street.length === 0) {
 *       throw new DomainValidationError('Street is required');
 *     }
 *   }
 *
 *   *getEqualityComponents(): Iterable<unknown> {
 *     yield this.street;
 *     yield this.city;
 *   }
 *
 *   equals(other: unknown): boolean {
 *     return valueObjectEquals(this, other, (address) => address.getEqualityComponents());
 *   }
 *
 *   hashCode(): number {
 *     return valueObjectHashCode(this, (address) => address.getEqualityComponents());
 *   }
 * }
 * ```
 *
 * @version 1.0.0
 */

import { requireArgument } from '../errors';

import { ABSENT_HASH, componentHashCode, isSameVariant, sequenceEquals } from './equality';

/**
 * An immutable, identity-less domain object.
 */
export interface IValueObject {
  /**
   * Check the object's invariants.
   *
   * @throws DomainValidationError when they are violated
   */
  validate(): void;
}

/**
 * A value object that lists the components its equality is built from.
 *
 * @remarks
 * The sequence must be deterministic: the same instance yields the same
 * components in the same order on every call.
 */
export interface IValueObjectWithComponents {
  getEqualityComponents(): Iterable<unknown>;
}

/**
 * Reads the ordered equality components of a value object.
 */
export type EqualityComponentsAccessor<T> = (valueObject: T) => Iterable<unknown>;

/**
 * Check whether a value exposes `validate()`.
 */
export function isValueObject(value: unknown): value is IValueObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    'validate' in value &&
    typeof value.validate === 'function'
  );
}

/**
 * Check whether a value exposes its own component accessor.
 */
export function hasEqualityComponents(value: unknown): value is IValueObjectWithComponents {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getEqualityComponents' in value &&
    typeof value.getEqualityComponents === 'function'
  );
}

/**
 * Structural equality for value objects.
 *
 * @param self - The receiver (must not be absent)
 * @param other - Anything
 * @param getComponents - Reads the components of a value of `self`'s type
 * @returns True for the same instance, or for the same concrete class with
 * pairwise-equal components of the same length
 * @throws ArgumentError if `self` is absent
 *
 * @remarks
 * When `other` exposes `getEqualityComponents()`, its own components are used.
 * This lets a class compare against another implementation of the same value
 * that lists its components itself. Otherwise `getComponents` is applied to
 * `other`.
 */
export function valueObjectEquals<T extends object>(
  self: T,
  other: unknown,
  getComponents: EqualityComponentsAccessor<T>,
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

  const selfComponents = getComponents(self);

  if (hasEqualityComponents(other)) {
    return sequenceEquals(selfComponents, other.getEqualityComponents());
  }

  return sequenceEquals(selfComponents, getComponents(other));
}

/**
 * Hash a value object by XOR-ing the hashes of its components.
 *
 * @remarks
 * Absent components contribute {@link ABSENT_HASH}. A value object with no
 * components hashes to `0`.
 *
 * @throws ArgumentError if `self` is absent
 */
export function valueObjectHashCode<T extends object>(
  self: T,
  getComponents: EqualityComponentsAccessor<T>,
): number {
  requireArgument(self, 'self');

  let hash = ABSENT_HASH;
  for (const component of getComponents(self)) {
    hash ^= componentHashCode(component);
  }
  return hash;
}

/**
 * Validate a value object and hand it back.
 *
 * @remarks
 * Meant for constructors and factories; nothing else in the library calls
 * `validate()`.
 *
 * @throws DomainValidationError (or whatever `validate()` throws)
 */
export function ensureValid<T extends IValueObject>(valueObject: T): T {
  requireArgument(valueObject, 'valueObject').validate();
  return valueObject;
}

/**
 * @fileoverview Component Equality - Equality and Hashing of Plain Values
 *
 * @packageDocumentation
 * @module @tessera/core/domain/model
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * JavaScript has no `equals`/`hashCode` protocol, so the entity and value
 * object helpers compare the pieces they are given through the rules below.
 *
 * | Value | Equality | Hash |
 * |-------|----------|------|
 * | `null` / `undefined` | only to another absent value | `0` |
 * | `IEquatable` | `a.equals(b)` | `a.hashCode()` |
 * | `Date` | same epoch milliseconds | hash of epoch milliseconds |
 * | string | `===` | 31-polynomial over UTF-16 units |
 * | number | `===`, `NaN` equals `NaN` | itself when a 32-bit int, else its string form |
 * | boolean | `===` | `1` / `0` |
 * | bigint | `===` | its string form |
 * | anything else | reference | per-process identity number |
 *
 * A value is only `IEquatable` when it has both `equals` and `hashCode`; an
 * object with just one of them compares by reference.
 *
 * @version 1.0.0
 */

/**
 * A value that defines its own equality and hash.
 *
 * @remarks
 * Implementations must keep the usual contract: `a.equals(b)` implies
 * `a.hashCode() === b.hashCode()`.
 *
 * @example
 * ```typescript
 * class Sku implements IEquatable {
 *   constructor(readonly code: string) {}
 *   equals(other: unknown): boolean {
 *     return other instanceof Sku && other.code === this.code;
 *   }
 *   hashCode(): number {
 *     return componentHashCode(this.code);
 *   }
 * }
 * ```
 */
export interface IEquatable {
  equals(other: unknown): boolean;
  hashCode(): number;
}

/**
 * Hash returned for absent components.
 */
export const ABSENT_HASH = 0;

const identityHashes = new WeakMap<object, number>();
const symbolHashes = new Map<symbol, number>();
let nextIdentityHash = 1;

function identityHashOf(value: object): number {
  let hash = identityHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash++ | 0;
    identityHashes.set(value, hash);
  }
  return hash;
}

function symbolHashOf(value: symbol): number {
  let hash = symbolHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash++ | 0;
    symbolHashes.set(value, hash);
  }
  return hash;
}

/**
 * Check whether a value implements {@link IEquatable}.
 */
export function isEquatable(value: unknown): value is IEquatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function' &&
    'hashCode' in value &&
    typeof value.hashCode === 'function'
  );
}

/**
 * Polynomial string hash, `h = 31 * h + unit` over UTF-16 code units,
 * kept to a signed 32-bit integer.
 */
export function stringHashCode(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Compare two equality components.
 *
 * @example
 * ```typescript
 * componentEquals('Main St', 'Main St'); // true
 * componentEquals(null, undefined); // true
 * componentEquals(NaN, NaN); // true
 * componentEquals({}, {}); // false (different references)
 * ```
 */
export function componentEquals(a: unknown, b: unknown): boolean {
  if (a === null || a === undefined) {
    return b === null || b === undefined;
  }
  if (b === null || b === undefined) {
    return false;
  }

  if (typeof a === 'object' || typeof a === 'function') {
    if (a === b) {
      return true;
    }
    if (a instanceof Date) {
      return b instanceof Date && a.getTime() === b.getTime();
    }
    if (isEquatable(a)) {
      return a.equals(b);
    }
    return false;
  }

  if (typeof a === 'number' && typeof b === 'number') {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }

  return a === b;
}

/**
 * Hash an equality component.
 *
 * @remarks
 * Consistent with {@link componentEquals}: equal components hash equally.
 */
export function componentHashCode(value: unknown): number {
  switch (typeof value) {
    case 'undefined':
      return ABSENT_HASH;
    case 'string':
      return stringHashCode(value);
    case 'number':
      return (value | 0) === value ? value | 0 : stringHashCode(String(value));
    case 'boolean':
      return value ? 1 : 0;
    case 'bigint':
      return stringHashCode(value.toString());
    case 'symbol':
      return symbolHashOf(value);
    case 'function':
      return identityHashOf(value);
    case 'object':
      if (value === null) {
        return ABSENT_HASH;
      }
      if (value instanceof Date) {
        return componentHashCode(value.getTime());
      }
      if (isEquatable(value)) {
        return value.hashCode() | 0;
      }
      return identityHashOf(value);
  }
}

/**
 * Pairwise comparison of two component sequences.
 *
 * @returns True when both have the same length and every pair is equal.
 */
export function sequenceEquals(left: Iterable<unknown>, right: Iterable<unknown>): boolean {
  const a = Array.from(left);
  const b = Array.from(right);

  if (a.length !== b.length) {
    return false;
  }

  return a.every((component, index) => componentEquals(component, b[index]));
}

/**
 * Check that two objects are the same concrete runtime variant.
 *
 * @remarks
 * Two class instances share a variant when they share a prototype; a subclass
 * instance is a different variant from its base class.
 */
export function isSameVariant<T extends object>(self: T, other: unknown): other is T {
  return (
    typeof other === 'object' &&
    other !== null &&
    Object.getPrototypeOf(other) === Object.getPrototypeOf(self)
  );
}

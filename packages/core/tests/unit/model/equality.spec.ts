/**
 * @fileoverview Component Equality Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  ABSENT_HASH,
  type IEquatable,
  componentEquals,
  componentHashCode,
  isEquatable,
  isSameVariant,
  sequenceEquals,
  stringHashCode,
} from '../../../src/domain/model';

// ============================================================================
// Test Fixtures
// ============================================================================

class Sku implements IEquatable {
  constructor(readonly code: string) {}

  equals(other: unknown): boolean {
    return other instanceof Sku && other.code.toUpperCase() === this.code.toUpperCase();
  }

  hashCode(): number {
    return stringHashCode(this.code.toUpperCase());
  }
}

class Point {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

class Point3D extends Point {}

/**
 * Defines equals() without hashCode(), so it is not IEquatable.
 */
class LooseCode {
  constructor(readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof LooseCode && other.value === this.value;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('stringHashCode', () => {
  it('should hash the empty string to 0', () => {
    expect(stringHashCode('')).toBe(0);
  });

  it('should follow the 31-multiplier polynomial', () => {
    expect(stringHashCode('a')).toBe(97);
    expect(stringHashCode('ab')).toBe(31 * 97 + 98);
  });

  it('should stay within a signed 32-bit integer', () => {
    const hash = stringHashCode('a fairly long string that overflows many times');

    expect(hash).toBe(hash | 0);
  });
});

describe('componentEquals', () => {
  it('should treat null and undefined as the same absent value', () => {
    expect(componentEquals(null, undefined)).toBe(true);
    expect(componentEquals(undefined, undefined)).toBe(true);
  });

  it('should never equate an absent value with a present one', () => {
    expect(componentEquals(null, 0)).toBe(false);
    expect(componentEquals('', undefined)).toBe(false);
  });

  it('should compare primitives by value', () => {
    expect(componentEquals('Main St', 'Main St')).toBe(true);
    expect(componentEquals(1, 2)).toBe(false);
    expect(componentEquals(10n, 10n)).toBe(true);
    expect(componentEquals(1, '1')).toBe(false);
  });

  it('should treat NaN as equal to NaN', () => {
    expect(componentEquals(NaN, NaN)).toBe(true);
  });

  it('should compare dates by epoch milliseconds', () => {
    expect(componentEquals(new Date(5_000), new Date(5_000))).toBe(true);
    expect(componentEquals(new Date(5_000), new Date(6_000))).toBe(false);
    expect(componentEquals(new Date(5_000), 5_000)).toBe(false);
  });

  it('should delegate to equals() when present', () => {
    expect(componentEquals(new Sku('abc'), new Sku('ABC'))).toBe(true);
    expect(componentEquals(new Sku('abc'), new Sku('xyz'))).toBe(false);
  });

  it('should compare objects with equals() but no hashCode() by reference', () => {
    const code = new LooseCode('x');

    expect(componentEquals(code, new LooseCode('x'))).toBe(false);
    expect(componentEquals(code, code)).toBe(true);
  });

  it('should compare other objects by reference', () => {
    const point = new Point(1, 2);

    expect(componentEquals(point, point)).toBe(true);
    expect(componentEquals(point, new Point(1, 2))).toBe(false);
  });
});

describe('componentHashCode', () => {
  it('should hash absent values to ABSENT_HASH', () => {
    expect(componentHashCode(null)).toBe(ABSENT_HASH);
    expect(componentHashCode(undefined)).toBe(ABSENT_HASH);
  });

  it('should hash 32-bit integers to themselves', () => {
    expect(componentHashCode(42)).toBe(42);
    expect(componentHashCode(-7)).toBe(-7);
    expect(componentHashCode(-0)).toBe(0);
  });

  it('should hash other numbers through their string form', () => {
    expect(componentHashCode(1.5)).toBe(stringHashCode('1.5'));
    expect(componentHashCode(2 ** 31)).toBe(stringHashCode('2147483648'));
  });

  it('should hash bigints through their string form', () => {
    expect(componentHashCode(10n)).toBe(stringHashCode('10'));
  });

  it('should hash booleans to 1 and 0', () => {
    expect(componentHashCode(true)).toBe(1);
    expect(componentHashCode(false)).toBe(0);
  });

  it('should hash dates by epoch milliseconds', () => {
    expect(componentHashCode(new Date(1_000))).toBe(1_000);
  });

  it('should delegate to hashCode() when present', () => {
    expect(componentHashCode(new Sku('abc'))).toBe(stringHashCode('ABC'));
  });

  it('should give the same object the same identity hash', () => {
    const point = new Point(1, 2);

    expect(componentHashCode(point)).toBe(componentHashCode(point));
    expect(componentHashCode(point)).not.toBe(componentHashCode(new Point(1, 2)));
  });

  it('should hash equal components equally', () => {
    const shared = new LooseCode('x');
    const pairs: Array<[unknown, unknown]> = [
      [NaN, NaN],
      [null, undefined],
      [new Date(9), new Date(9)],
      [new Sku('abc'), new Sku('ABC')],
      [shared, shared],
    ];

    for (const [a, b] of pairs) {
      expect(componentEquals(a, b)).toBe(true);
      expect(componentHashCode(a)).toBe(componentHashCode(b));
    }
  });
});

describe('sequenceEquals', () => {
  it('should compare pairwise', () => {
    expect(sequenceEquals(['a', 1, null], ['a', 1, undefined])).toBe(true);
    expect(sequenceEquals(['a', 1], ['a', 2])).toBe(false);
  });

  it('should require equal length', () => {
    expect(sequenceEquals(['a'], ['a', 'b'])).toBe(false);
    expect(sequenceEquals([], [])).toBe(true);
  });

  it('should accept any iterable', () => {
    function* components(): Iterable<unknown> {
      yield 'Main St';
      yield 'Metropolis';
    }

    expect(sequenceEquals(components(), ['Main St', 'Metropolis'])).toBe(true);
  });
});

describe('isEquatable', () => {
  it('should recognize objects with equals and hashCode', () => {
    expect(isEquatable(new Sku('abc'))).toBe(true);
    expect(isEquatable(new Point(1, 2))).toBe(false);
    expect(isEquatable('abc')).toBe(false);
    expect(isEquatable(null)).toBe(false);
  });
});

describe('isSameVariant', () => {
  it('should match instances of the same class', () => {
    expect(isSameVariant(new Point(1, 2), new Point(3, 4))).toBe(true);
  });

  it('should not match a subclass instance', () => {
    expect(isSameVariant(new Point(1, 2), new Point3D(1, 2))).toBe(false);
    expect(isSameVariant(new Point3D(1, 2), new Point(1, 2))).toBe(false);
  });

  it('should not match primitives or absent values', () => {
    expect(isSameVariant(new Point(1, 2), null)).toBe(false);
    expect(isSameVariant(new Point(1, 2), 'point')).toBe(false);
  });
});

/**
 * @fileoverview Value Object Equality Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { ArgumentError, DomainValidationError } from '../../../src/domain/errors';
import {
  type IValueObject,
  type IValueObjectWithComponents,
  componentHashCode,
  ensureValid,
  hasEqualityComponents,
  isValueObject,
  valueObjectEquals,
  valueObjectHashCode,
} from '../../../src/domain/model';

// ============================================================================
// Test Fixtures
// ============================================================================

class Address implements IValueObject, IValueObjectWithComponents {
  constructor(
    readonly street: string,
    readonly city: string,
    readonly unit?: string,
  ) {}

  validate(): void {
    if (this.street.length === 0) {
      throw new DomainValidationError('Street is required', { field: 'street' });
    }
  }

  *getEqualityComponents(): Iterable<unknown> {
    yield this.street;
    yield this.city;
    yield this.unit;
  }

  equals(other: unknown): boolean {
    return valueObjectEquals(this, other, (address) => address.getEqualityComponents());
  }

  hashCode(): number {
    return valueObjectHashCode(this, (address) => address.getEqualityComponents());
  }
}

class PostalAddress extends Address {}

/**
 * Lists its components only through the accessor handed to the helpers.
 */
class Money {
  constructor(
    readonly amount: number,
    readonly currency: string,
  ) {}
}

const moneyComponents = (money: Money): Iterable<unknown> => [money.amount, money.currency];

class Tags {
  constructor(readonly values: readonly string[]) {}
}

const tagComponents = (tags: Tags): Iterable<unknown> => tags.values;

/**
 * Has equals() but no hashCode().
 */
class LooseCode {
  constructor(readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof LooseCode && other.value === this.value;
  }
}

class Labelled {
  constructor(readonly code: LooseCode) {}
}

const labelledComponents = (labelled: Labelled): Iterable<unknown> => [labelled.code];

// ============================================================================
// Tests
// ============================================================================

describe('valueObjectEquals', () => {
  it('should not equate addresses that differ in one component', () => {
    const metropolis = new Address('Main St', 'Metropolis');
    const gotham = new Address('Main St', 'Gotham');

    expect(metropolis.equals(gotham)).toBe(false);
  });

  it('should equate addresses with equal components', () => {
    const first = new Address('Main St', 'Metropolis');
    const second = new Address('Main St', 'Metropolis');

    expect(first.equals(second)).toBe(true);
    expect(first.hashCode()).toBe(second.hashCode());
  });

  it('should treat absent components as equal', () => {
    const withoutUnit = new Address('Main St', 'Metropolis');
    const explicitUnit = new Address('Main St', 'Metropolis', undefined);

    expect(explicitUnit.equals(withoutUnit)).toBe(true);
  });

  it('should be reflexive', () => {
    const address = new Address('Main St', 'Metropolis');

    expect(address.equals(address)).toBe(true);
  });

  it('should return false for an absent other', () => {
    const address = new Address('Main St', 'Metropolis');

    expect(address.equals(null)).toBe(false);
    expect(address.equals(undefined)).toBe(false);
  });

  it('should not equate a subclass instance with equal components', () => {
    const address = new Address('Main St', 'Metropolis');
    const postal = new PostalAddress('Main St', 'Metropolis');

    expect(address.equals(postal)).toBe(false);
    expect(postal.equals(address)).toBe(false);
  });

  it('should apply the accessor to other when other lists no components itself', () => {
    const getComponents = vi.fn(moneyComponents);
    const ten = new Money(10, 'EUR');
    const twenty = new Money(20, 'EUR');

    expect(valueObjectEquals(ten, twenty, getComponents)).toBe(false);
    expect(getComponents).toHaveBeenNthCalledWith(1, ten);
    expect(getComponents).toHaveBeenNthCalledWith(2, twenty);
  });

  it('should equate accessor-based values with equal components', () => {
    expect(valueObjectEquals(new Money(10, 'EUR'), new Money(10, 'EUR'), moneyComponents)).toBe(
      true,
    );
  });

  it('should not equate sequences of different length', () => {
    const short = new Tags(['a']);
    const long = new Tags(['a', 'b']);

    expect(valueObjectEquals(short, long, tagComponents)).toBe(false);
    expect(valueObjectEquals(long, short, tagComponents)).toBe(false);
  });

  it('should keep equality consistent with hashing for components without hashCode()', () => {
    const first = new Labelled(new LooseCode('x'));
    const second = new Labelled(new LooseCode('x'));
    const sharing = new Labelled(first.code);

    expect(valueObjectEquals(first, second, labelledComponents)).toBe(false);
    expect(valueObjectEquals(first, sharing, labelledComponents)).toBe(true);
    expect(valueObjectHashCode(first, labelledComponents)).toBe(
      valueObjectHashCode(sharing, labelledComponents),
    );
  });

  it('should throw ArgumentError when self is absent', () => {
    expect(() =>
      Reflect.apply(valueObjectEquals, undefined, [null, new Money(1, 'EUR'), moneyComponents]),
    ).toThrow(ArgumentError);
  });
});

describe('valueObjectHashCode', () => {
  it('should XOR the component hashes', () => {
    const money = new Money(10, 'EUR');

    expect(valueObjectHashCode(money, moneyComponents)).toBe(
      componentHashCode(10) ^ componentHashCode('EUR'),
    );
  });

  it('should hash an empty component sequence to 0', () => {
    expect(valueObjectHashCode(new Tags([]), tagComponents)).toBe(0);
  });

  it('should let absent components contribute nothing', () => {
    const withUnit = new Address('Main St', 'Metropolis', undefined);

    expect(withUnit.hashCode()).toBe(
      componentHashCode('Main St') ^ componentHashCode('Metropolis'),
    );
  });
});

describe('ensureValid', () => {
  it('should return the same instance when valid', () => {
    const address = new Address('Main St', 'Metropolis');

    expect(ensureValid(address)).toBe(address);
  });

  it('should propagate the validation error', () => {
    const invalid = new Address('', 'Metropolis');

    expect(() => ensureValid(invalid)).toThrow(DomainValidationError);
    expect(() => ensureValid(invalid)).toThrow('Street is required');
  });
});

describe('type guards', () => {
  it('isValueObject should require validate()', () => {
    expect(isValueObject(new Address('Main St', 'Metropolis'))).toBe(true);
    expect(isValueObject(new Money(1, 'EUR'))).toBe(false);
  });

  it('hasEqualityComponents should require getEqualityComponents()', () => {
    expect(hasEqualityComponents(new Address('Main St', 'Metropolis'))).toBe(true);
    expect(hasEqualityComponents(new Money(1, 'EUR'))).toBe(false);
    expect(hasEqualityComponents(null)).toBe(false);
  });
});

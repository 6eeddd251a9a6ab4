/**
 * @fileoverview Entity Equality Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { ArgumentError } from '../../../src/domain/errors';
import {
  AGGREGATE_ROOT,
  type IAggregateRoot,
  type IEntity,
  type IEquatable,
  componentHashCode,
  entityEquals,
  entityHashCode,
  isAggregateRoot,
  isEntity,
  stringHashCode,
} from '../../../src/domain/model';

// ============================================================================
// Test Fixtures
// ============================================================================

class Customer implements IEntity<string> {
  constructor(
    readonly id: string,
    public name: string,
  ) {}

  equals(other: unknown): boolean {
    return entityEquals(this, other);
  }

  hashCode(): number {
    return entityHashCode(this);
  }
}

class Supplier implements IEntity<string> {
  constructor(readonly id: string) {}
}

class PreferredCustomer extends Customer {}

class OrderId implements IEquatable {
  constructor(
    readonly region: string,
    readonly sequence: number,
  ) {}

  equals(other: unknown): boolean {
    return (
      other instanceof OrderId && other.region === this.region && other.sequence === this.sequence
    );
  }

  hashCode(): number {
    return stringHashCode(this.region) ^ this.sequence;
  }
}

class Order implements IAggregateRoot<OrderId> {
  readonly [AGGREGATE_ROOT] = true as const;

  constructor(readonly id: OrderId) {}
}

// ============================================================================
// Tests
// ============================================================================

describe('entityEquals', () => {
  it('should equate same-class entities with equal ids regardless of other fields', () => {
    const alice = new Customer('u1', 'Alice');
    const bob = new Customer('u1', 'Bob');

    expect(entityEquals(alice, bob)).toBe(true);
    expect(alice.hashCode()).toBe(bob.hashCode());
  });

  it('should not equate different ids', () => {
    expect(entityEquals(new Customer('u1', 'Alice'), new Customer('u2', 'Alice'))).toBe(false);
  });

  it('should be reflexive', () => {
    const alice = new Customer('u1', 'Alice');

    expect(entityEquals(alice, alice)).toBe(true);
  });

  it('should not equate different classes with equal ids', () => {
    expect(entityEquals(new Customer('u1', 'Alice'), new Supplier('u1'))).toBe(false);
    expect(entityEquals(new Supplier('u1'), new Customer('u1', 'Alice'))).toBe(false);
  });

  it('should not equate a subclass instance with its base class', () => {
    expect(entityEquals(new Customer('u1', 'Alice'), new PreferredCustomer('u1', 'Alice'))).toBe(
      false,
    );
  });

  it('should return false for an absent other', () => {
    const alice = new Customer('u1', 'Alice');

    expect(entityEquals(alice, null)).toBe(false);
    expect(entityEquals(alice, undefined)).toBe(false);
  });

  it('should not equate a plain object carrying the same id', () => {
    expect(entityEquals(new Customer('u1', 'Alice'), { id: 'u1', name: 'Alice' })).toBe(false);
  });

  it('should compare object ids through their equals()', () => {
    const first = new Order(new OrderId('eu', 7));
    const second = new Order(new OrderId('eu', 7));

    expect(entityEquals(first, second)).toBe(true);
    expect(entityEquals(first, new Order(new OrderId('us', 7)))).toBe(false);
  });

  it('should throw ArgumentError when self is absent', () => {
    expect(() => Reflect.apply(entityEquals, undefined, [null, new Supplier('u1')])).toThrow(
      ArgumentError,
    );
  });
});

describe('entityHashCode', () => {
  it('should hash by id', () => {
    expect(entityHashCode(new Supplier('u1'))).toBe(componentHashCode('u1'));
    expect(entityHashCode(new Order(new OrderId('eu', 7)))).toBe(stringHashCode('eu') ^ 7);
  });

  it('should hash numeric and bigint ids', () => {
    const numeric: IEntity<number> = { id: 42 };
    const big: IEntity<bigint> = { id: 42n };

    expect(entityHashCode(numeric)).toBe(42);
    expect(entityHashCode(big)).toBe(stringHashCode('42'));
  });

  it('should throw ArgumentError when self is absent', () => {
    expect(() => Reflect.apply(entityHashCode, undefined, [undefined])).toThrow(ArgumentError);
  });
});

describe('type guards', () => {
  it('isEntity should accept objects with a usable id', () => {
    expect(isEntity(new Customer('u1', 'Alice'))).toBe(true);
    expect(isEntity({ id: 1 })).toBe(true);
    expect(isEntity({ id: null })).toBe(false);
    expect(isEntity({ name: 'Alice' })).toBe(false);
    expect(isEntity('u1')).toBe(false);
  });

  it('isAggregateRoot should require the aggregate root tag', () => {
    expect(isAggregateRoot(new Order(new OrderId('eu', 1)))).toBe(true);
    expect(isAggregateRoot(new Customer('u1', 'Alice'))).toBe(false);
  });
});

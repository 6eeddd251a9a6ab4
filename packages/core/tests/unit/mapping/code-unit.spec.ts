/**
 * @fileoverview Code Unit Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  MapperCatalog,
  describeCodeUnit,
  getCandidates,
} from '../../../src/infrastructure/mapping';

class FirstMapper {}
class SecondMapper {}

describe('MapperCatalog', () => {
  it('should keep one entry per class in insertion order', () => {
    const catalog = new MapperCatalog('billing').add(FirstMapper, SecondMapper).add(FirstMapper);

    expect(catalog.size).toBe(2);
    expect([...catalog]).toEqual([FirstMapper, SecondMapper]);
  });

  it('should report membership', () => {
    const catalog = new MapperCatalog('billing').add(FirstMapper);

    expect(catalog.has(FirstMapper)).toBe(true);
    expect(catalog.has(SecondMapper)).toBe(false);
  });
});

describe('getCandidates', () => {
  it('should read the values of a record', () => {
    expect(getCandidates({ FirstMapper, version: 2 })).toEqual([FirstMapper, 2]);
  });

  it('should read any iterable and drop repeats', () => {
    expect(getCandidates([FirstMapper, SecondMapper, FirstMapper])).toEqual([
      FirstMapper,
      SecondMapper,
    ]);
    expect(getCandidates(new Set([SecondMapper]))).toEqual([SecondMapper]);
  });

  it('should read the values of a map', () => {
    const unit = new Map<string, unknown>([
      ['first', FirstMapper],
      ['second', SecondMapper],
    ]);

    expect(getCandidates(unit)).toEqual([FirstMapper, SecondMapper]);
  });

  it('should read a catalog', () => {
    expect(getCandidates(new MapperCatalog('billing').add(SecondMapper))).toEqual([SecondMapper]);
  });
});

describe('describeCodeUnit', () => {
  it('should use the catalog name', () => {
    expect(describeCodeUnit(new MapperCatalog('billing'), 0)).toBe('billing');
  });

  it('should number other code units from 1', () => {
    expect(describeCodeUnit([FirstMapper], 0)).toBe('code unit #1');
    expect(describeCodeUnit({ SecondMapper }, 2)).toBe('code unit #3');
  });
});

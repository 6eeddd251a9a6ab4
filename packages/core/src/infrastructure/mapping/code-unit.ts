/**
 * @fileoverview Code Units - Where Event Mappers Are Discovered
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/mapping
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A code unit is anything that lists candidate classes:
 *
 * - a module namespace: `import * as userMappers from './users/mappers'`
 * - a plain record or an array of classes
 * - a `Map`, whose values are the candidates
 * - a {@link MapperCatalog}, which mapper modules fill as they load
 *
 * @version 1.0.0
 */

import { type Constructor } from '../../domain/di';

/**
 * A source of candidate mapper classes.
 */
export type CodeUnit = Iterable<unknown> | Readonly<Record<string, unknown>>;

/**
 * A named, explicit list of mapper classes.
 *
 * @example
 * ```typescript
 * // users/mappers.ts
 * applicationMappers.add(UserCreatedEventMapper, UserDeletedEventMapper);
 *
 * // main.ts
 * import './users/mappers';
 * addApplicationEventMappers(services);
 * ```
 */
export class MapperCatalog implements Iterable<Constructor> {
  private readonly entries = new Set<Constructor>();

  constructor(public readonly name: string) {}

  /**
   * Add classes; adding a class twice keeps one entry.
   */
  add(...mappers: Constructor[]): this {
    for (const mapper of mappers) {
      this.entries.add(mapper);
    }
    return this;
  }

  has(mapper: Constructor): boolean {
    return this.entries.has(mapper);
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<Constructor> {
    return this.entries.values();
  }
}

/**
 * The application's own code unit, scanned by `addApplicationEventMappers`.
 */
export const applicationMappers = new MapperCatalog('application');

function isIterable(unit: CodeUnit): unit is Iterable<unknown> {
  return Symbol.iterator in unit && typeof unit[Symbol.iterator] === 'function';
}

/**
 * Every distinct value a code unit exposes, in declaration order.
 *
 * @remarks
 * For a `Map` the values are read, not the `[key, value]` entries.
 */
export function getCandidates(unit: CodeUnit): unknown[] {
  let values: unknown[];
  if (unit instanceof Map) {
    values = Array.from(unit.values());
  } else if (isIterable(unit)) {
    values = Array.from(unit);
  } else {
    values = Object.values(unit);
  }
  return [...new Set(values)];
}

/**
 * Name used for a code unit in logs.
 */
export function describeCodeUnit(unit: CodeUnit, index: number): string {
  return unit instanceof MapperCatalog ? unit.name : `code unit #${index + 1}`;
}

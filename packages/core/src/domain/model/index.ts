/**
 * @fileoverview Domain Model Exports
 *
 * @module @tessera/core/domain/model
 * @license Apache-2.0
 */

export {
  type IEquatable,
  ABSENT_HASH,
  isEquatable,
  stringHashCode,
  componentEquals,
  componentHashCode,
  sequenceEquals,
  isSameVariant,
} from './equality';

export {
  type EntityId,
  type IEntity,
  type IAggregateRoot,
  AGGREGATE_ROOT,
  isEntity,
  isAggregateRoot,
  entityEquals,
  entityHashCode,
} from './entity';

export {
  type IValueObject,
  type IValueObjectWithComponents,
  type EqualityComponentsAccessor,
  isValueObject,
  hasEqualityComponents,
  valueObjectEquals,
  valueObjectHashCode,
  ensureValid,
} from './value-object';

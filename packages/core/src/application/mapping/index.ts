/**
 * @fileoverview Application Mapping Exports
 *
 * @module @tessera/core/application/mapping
 * @license Apache-2.0
 */

export type { IEventMapper, IFlexibleEventMapper } from './event-mapper.interface';

export {
  MapperKind,
  type NotificationType,
  type MapperCapability,
  eventMapperToken,
  flexibleEventMapperToken,
  eventMapperOf,
  flexibleEventMapperOf,
  isMapperCapability,
} from './mapper-capability';

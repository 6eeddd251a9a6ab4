/**
 * @fileoverview Infrastructure Mapping Exports
 *
 * @module @tessera/core/infrastructure/mapping
 * @license Apache-2.0
 */

export {
  type CodeUnit,
  MapperCatalog,
  applicationMappers,
  getCandidates,
  describeCodeUnit,
} from './code-unit';

export {
  type MapperRegistration,
  type EventMapperRegistrationOptions,
  scanEventMappers,
  addEventMappers,
  addEventMappersWith,
  addApplicationEventMappers,
} from './event-mapper-registration';

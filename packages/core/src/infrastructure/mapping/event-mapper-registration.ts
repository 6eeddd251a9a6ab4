/**
 * @fileoverview Event Mapper Registration - Wire Every Mapper Found in Code Units
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/mapping
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Discovery Algorithm
 *
 * ```
 * for each code unit
 *   for each distinct candidate it exposes
 *     skip if not a class                 (interfaces, tokens, constants)
 *     skip if it declares own isAbstract   (base mapper classes)
 *     for each capability in static mapsFrom
 *       record (capability.token -> class)
 * register every record as Transient
 * ```
 *
 * Runs once, synchronously, at startup. Registering a token that already has
 * a registration adds another one: `resolve` returns the latest and
 * `resolveAll` returns all of them.
 *
 * @example
 * ```typescript
 * import * as userMappers from './users/mappers';
 * import * as orderMappers from './orders/mappers';
 *
 * const provider = addEventMappers(createServiceCollection(), userMappers, orderMappers).build();
 *
 * const mapper = provider.resolve(eventMapperToken(UserCreatedNotification));
 * ```
 *
 * @version 1.0.0
 */

import { type MapperCapability, isMapperCapability } from '../../application/mapping';
import {
  type Constructor,
  type IServiceCollection,
  ServiceLifetime,
  createClassDescriptor,
  getServiceName,
} from '../../domain/di';
import { ConfigurationError, requireArgument } from '../../domain/errors';
import { type Logger, getLogger } from '../logging';

import {
  type CodeUnit,
  applicationMappers,
  describeCodeUnit,
  getCandidates,
} from './code-unit';

/**
 * One discovered (interface instantiation, implementing class) pair.
 */
export interface MapperRegistration {
  readonly capability: MapperCapability;
  readonly implementationType: Constructor;
}

/**
 * Options for {@link addEventMappersWith}.
 */
export interface EventMapperRegistrationOptions {
  /**
   * Default: the process-wide default logger.
   */
  logger?: Logger;
}

/**
 * A class that declares mapper capabilities.
 */
interface IMapperConstructor extends Constructor {
  mapsFrom?: unknown;
  isAbstract?: unknown;
}

function isClass(value: unknown): value is IMapperConstructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

function isAbstractMapper(candidate: IMapperConstructor): boolean {
  return Object.hasOwn(candidate, 'isAbstract') && candidate.isAbstract === true;
}

/**
 * Read and check a class's `static mapsFrom` declaration.
 *
 * @throws ConfigurationError if `mapsFrom` is present but is not an array of
 * capabilities
 */
function readCapabilities(candidate: IMapperConstructor): readonly MapperCapability[] {
  const declared = candidate.mapsFrom;
  if (declared === undefined) {
    return [];
  }

  const name = getServiceName(candidate);
  if (!Array.isArray(declared)) {
    throw new ConfigurationError(
      `Invalid mapper declaration on '${name}': static mapsFrom must be an array.`,
    );
  }

  const problems: string[] = [];
  const capabilities: MapperCapability[] = [];
  declared.forEach((entry: unknown, index) => {
    if (isMapperCapability(entry)) {
      capabilities.push(entry);
    } else {
      problems.push(
        `  mapsFrom[${index}]: expected eventMapperOf(...) or flexibleEventMapperOf(...)`,
      );
    }
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid mapper declaration on '${name}':`, problems);
  }

  return capabilities;
}

function scanCodeUnit(unit: CodeUnit): MapperRegistration[] {
  const registrations: MapperRegistration[] = [];

  for (const candidate of getCandidates(unit)) {
    if (!isClass(candidate) || isAbstractMapper(candidate)) {
      continue;
    }

    for (const capability of readCapabilities(candidate)) {
      registrations.push({ capability, implementationType: candidate });
    }
  }

  return registrations;
}

function requireCodeUnits(codeUnits: readonly CodeUnit[]): void {
  if (codeUnits.length === 0) {
    throw new ConfigurationError('At least one code unit must be provided to scan for event mappers.');
  }
  codeUnits.forEach((unit, index) => requireArgument(unit, `codeUnits[${index}]`));
}

/**
 * Discover mapper registrations without touching a container.
 *
 * @throws ConfigurationError if no code units are given or a class declares
 * invalid capabilities
 * @throws ArgumentError if a code unit is absent
 */
export function scanEventMappers(...codeUnits: CodeUnit[]): MapperRegistration[] {
  requireCodeUnits(codeUnits);
  return codeUnits.flatMap(scanCodeUnit);
}

/**
 * Register every event mapper found in the code units, with an injected logger.
 *
 * @returns `services`, for chaining
 * @throws ConfigurationError if no code units are given or a class declares
 * invalid capabilities
 * @throws ArgumentError if `services` or a code unit is absent
 */
export function addEventMappersWith<TServices extends IServiceCollection>(
  services: TServices,
  options: EventMapperRegistrationOptions,
  ...codeUnits: CodeUnit[]
): TServices {
  requireArgument(services, 'services');
  requireCodeUnits(codeUnits);

  const logger = (options.logger ?? getLogger()).child({ component: 'event-mappers' });

  // Scan everything before registering anything: a malformed unit leaves
  // `services` untouched.
  const scanned = codeUnits.map(scanCodeUnit);

  codeUnits.forEach((unit, index) => {
    const registrations = scanned[index] ?? [];
    const codeUnit = describeCodeUnit(unit, index);

    if (registrations.length === 0) {
      logger.warn({ codeUnit }, 'Code unit contains no event mappers');
      return;
    }

    for (const { capability, implementationType } of registrations) {
      services.addDescriptor(
        createClassDescriptor(capability.token, ServiceLifetime.Transient, implementationType, {
          tags: [capability.kind],
          metadata: { notification: capability.notification },
        }),
      );

      logger.debug(
        {
          codeUnit,
          mapper: getServiceName(implementationType),
          service: getServiceName(capability.token),
        },
        'Registered event mapper',
      );
    }
  });

  return services;
}

/**
 * Register every event mapper found in the code units.
 *
 * @remarks
 * Each discovered (capability, class) pair becomes a Transient registration:
 * every resolution creates a new mapper.
 *
 * @returns `services`, for chaining
 * @throws ConfigurationError if no code units are given
 */
export function addEventMappers<TServices extends IServiceCollection>(
  services: TServices,
  ...codeUnits: CodeUnit[]
): TServices {
  return addEventMappersWith(services, {}, ...codeUnits);
}

/**
 * Register every event mapper in the application's own catalog.
 *
 * @remarks
 * The catalog may be empty; that registers nothing and logs a warning.
 */
export function addApplicationEventMappers<TServices extends IServiceCollection>(
  services: TServices,
  options: EventMapperRegistrationOptions = {},
): TServices {
  return addEventMappersWith(services, options, applicationMappers);
}

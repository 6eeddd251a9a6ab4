/**
 * @fileoverview Mapper Capabilities - Runtime Stand-Ins for Generic Mapper Interfaces
 *
 * @packageDocumentation
 * @module @tessera/core/application/mapping
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * TypeScript interfaces and their type arguments are erased at runtime, so
 * "implements `IEventMapper<UserCreatedNotification>`" cannot be discovered
 * by inspecting a class. A mapper states it instead, with the same
 * zero-reflection approach the container uses for `static inject`:
 *
 * ```typescript
 * class UserCreatedMapper
 *   implements IEventMapper<UserCreatedNotification>, IFlexibleEventMapper<UserCreatedNotification>
 * {
 *   static readonly mapsFrom = [
 *     eventMapperOf(UserCreatedNotification),
 *     flexibleEventMapperOf(UserCreatedNotification),
 *   ];
 * }
 * ```
 *
 * Each capability carries the service token of its interface instantiation;
 * the same (kind, notification class) pair always produces the same token.
 *
 * @version 1.0.0
 */

import { type AbstractConstructor, type ServiceIdentifier } from '../../domain/di';

import { type IEventMapper, type IFlexibleEventMapper } from './event-mapper.interface';

/**
 * The two mapper contracts.
 */
export const MapperKind = {
  EventMapper: 'event-mapper',
  FlexibleEventMapper: 'flexible-event-mapper',
} as const;

export type MapperKind = (typeof MapperKind)[keyof typeof MapperKind];

/**
 * A notification class, used as the runtime key of a mapper's type argument.
 */
export type NotificationType<TNotification = unknown> = AbstractConstructor<TNotification>;

/**
 * One generic mapper interface instantiated for one notification class.
 *
 * @template TMapper - The mapper interface the token resolves to
 */
export interface MapperCapability<TMapper = unknown> {
  readonly kind: MapperKind;
  readonly notification: NotificationType;
  readonly token: ServiceIdentifier<TMapper>;
}

const tokens: Record<MapperKind, WeakMap<object, symbol>> = {
  [MapperKind.EventMapper]: new WeakMap(),
  [MapperKind.FlexibleEventMapper]: new WeakMap(),
};

const interfaceNames: Record<MapperKind, string> = {
  [MapperKind.EventMapper]: 'IEventMapper',
  [MapperKind.FlexibleEventMapper]: 'IFlexibleEventMapper',
};

function tokenFor(kind: MapperKind, notification: NotificationType): symbol {
  const byNotification = tokens[kind];
  let token = byNotification.get(notification);
  if (token === undefined) {
    token = Symbol(`${interfaceNames[kind]}<${notification.name || 'AnonymousNotification'}>`);
    byNotification.set(notification, token);
  }
  return token;
}

/**
 * Service token of `IEventMapper<TNotification>`.
 *
 * @example
 * ```typescript
 * const mapper = provider.resolve(eventMapperToken(UserCreatedNotification));
 * ```
 */
export function eventMapperToken<TNotification>(
  notification: NotificationType<TNotification>,
): ServiceIdentifier<IEventMapper<TNotification>> {
  return tokenFor(MapperKind.EventMapper, notification);
}

/**
 * Service token of `IFlexibleEventMapper<TNotification>`.
 */
export function flexibleEventMapperToken<TNotification>(
  notification: NotificationType<TNotification>,
): ServiceIdentifier<IFlexibleEventMapper<TNotification>> {
  return tokenFor(MapperKind.FlexibleEventMapper, notification);
}

/**
 * Declare that a class implements `IEventMapper<TNotification>`.
 */
export function eventMapperOf<TNotification>(
  notification: NotificationType<TNotification>,
): MapperCapability<IEventMapper<TNotification>> {
  return {
    kind: MapperKind.EventMapper,
    notification,
    token: eventMapperToken(notification),
  };
}

/**
 * Declare that a class implements `IFlexibleEventMapper<TNotification>`.
 */
export function flexibleEventMapperOf<TNotification>(
  notification: NotificationType<TNotification>,
): MapperCapability<IFlexibleEventMapper<TNotification>> {
  return {
    kind: MapperKind.FlexibleEventMapper,
    notification,
    token: flexibleEventMapperToken(notification),
  };
}

/**
 * Check whether a value is a capability built by {@link eventMapperOf} or
 * {@link flexibleEventMapperOf}.
 */
export function isMapperCapability(value: unknown): value is MapperCapability {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('kind' in value) || !('notification' in value) || !('token' in value)) {
    return false;
  }

  const { kind, notification, token } = value;
  return (
    (kind === MapperKind.EventMapper || kind === MapperKind.FlexibleEventMapper) &&
    typeof notification === 'function' &&
    typeof token === 'symbol' &&
    tokens[kind].get(notification) === token
  );
}

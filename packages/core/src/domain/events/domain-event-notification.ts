/**
 * @fileoverview DomainEventNotification - A Domain Event Plus Mapping Context
 *
 * @packageDocumentation
 * @module @tessera/core/domain/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Some integration events need data that must never live on the domain event
 * itself, e.g. a one-time activation token generated while handling the
 * command. A notification carries the domain event together with that extra
 * context so a mapper can see both.
 *
 * @version 1.0.0
 */

import { requireArgument } from '../errors';

import { type IEvent } from './event.interface';

/**
 * A domain event together with context that is not part of the event.
 *
 * @template TEvent - The wrapped domain event type
 */
export interface IDomainEventNotification<TEvent extends IEvent = IEvent> {
  /**
   * The domain event that triggered this notification. Never absent.
   */
  readonly domainEvent: TEvent;
}

/**
 * Base class for notifications.
 *
 * @template TEvent - The wrapped domain event type
 *
 * @example
 * ```typescript
 * class UserCreatedNotification extends DomainEventNotification<UserCreated> {
 *   constructor(
 *     domainEvent: UserCreated,
 *     readonly activationToken: string,
 *   ) {
 *     super(domainEvent);
 *   }
 * }
 * ```
 */
export abstract class DomainEventNotification<TEvent extends IEvent>
  implements IDomainEventNotification<TEvent>
{
  public readonly domainEvent: TEvent;

  /**
   * @throws ArgumentError if `domainEvent` is absent
   */
  protected constructor(domainEvent: TEvent) {
    this.domainEvent = requireArgument(domainEvent, 'domainEvent');
  }
}

/**
 * Check whether a value wraps a domain event.
 */
export function isDomainEventNotification(value: unknown): value is IDomainEventNotification {
  return (
    typeof value === 'object' &&
    value !== null &&
    'domainEvent' in value &&
    typeof value.domainEvent === 'object' &&
    value.domainEvent !== null
  );
}

/**
 * @fileoverview Domain Events Exports
 *
 * @module @tessera/core/domain/events
 * @license Apache-2.0
 */

export type { IEvent, IDomainEvent, IIntegrationEvent } from './event.interface';

export {
  type IDomainEventNotification,
  DomainEventNotification,
  isDomainEventNotification,
} from './domain-event-notification';

/**
 * @fileoverview Event Mapper Contracts - Notifications to Integration Events
 *
 * @packageDocumentation
 * @module @tessera/core/application/mapping
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A mapper turns one domain event notification into zero or more outbound
 * events. Two shapes exist:
 *
 * | Contract | Produces | Use when |
 * |----------|----------|----------|
 * | `IEventMapper<N>` | `IIntegrationEvent[]` | Publishing your own integration contracts |
 * | `IFlexibleEventMapper<N>` | `unknown[]` | A messaging framework wants its own envelope types |
 *
 * Whatever a mapper throws (or rejects with) reaches the caller unchanged.
 * Retrying, partial results and publishing are the caller's business.
 *
 * @version 1.0.0
 */

import { type IIntegrationEvent } from '../../domain/events';

/**
 * Maps a notification to strongly typed integration events.
 *
 * @template TNotification - The notification this mapper accepts
 *
 * @example
 * ```typescript
 * class UserCreatedEventMapper implements IEventMapper<UserCreatedNotification> {
 *   static readonly mapsFrom = [eventMapperOf(UserCreatedNotification)];
 *
 *   async createEvents(notification: UserCreatedNotification): Promise<IIntegrationEvent[]> {
 *     const { userId, email } = notification.domainEvent;
 *     return [
 *       new UserRegistered(userId, email),
 *       new WelcomeEmailRequested(email, notification.activationToken),
 *     ];
 *   }
 * }
 * ```
 */
export interface IEventMapper<TNotification> {
  /**
   * @param notification - Domain event plus context
   * @param signal - Aborts long-running mapping work
   */
  createEvents(
    notification: TNotification,
    signal?: AbortSignal,
  ): Promise<readonly IIntegrationEvent[]>;
}

/**
 * Maps a notification to events of any shape.
 *
 * @template TNotification - The notification this mapper accepts
 */
export interface IFlexibleEventMapper<TNotification> {
  /**
   * @param notification - Domain event plus context
   * @param signal - Aborts long-running mapping work
   */
  createEvents(notification: TNotification, signal?: AbortSignal): Promise<readonly unknown[]>;
}

/**
 * @fileoverview Event Contracts - Domain and Integration Events
 *
 * @packageDocumentation
 * @module @tessera/core/domain/events
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Two kinds of events, told apart only by who consumes them:
 *
 * ```
 * Aggregate ──raises──▶ IDomainEvent ──wrapped in──▶ IDomainEventNotification
 *                                                        │
 *                                         IEventMapper   │  (application layer)
 *                                                        ▼
 *                                     IIntegrationEvent[] ──published──▶ other services
 * ```
 *
 * - **Domain events** stay inside the bounded context.
 * - **Integration events** are the published contract other services rely on.
 *
 * Neither interface requires any member; the payload is whatever the concrete
 * event declares.
 *
 * @version 1.0.0
 */

/**
 * Base capability of every event.
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface IEvent {}

/**
 * A business-significant state change internal to a bounded context.
 *
 * @example
 * ```typescript
 * class UserCreated implements IDomainEvent {
 *   constructor(
 *     readonly userId: string,
 *     readonly email: string,
 *   ) {}
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface IDomainEvent extends IEvent {}

/**
 * An event published for other services to consume.
 *
 * @example
 * ```typescript
 * class UserRegistered implements IIntegrationEvent {
 *   constructor(
 *     readonly userId: string,
 *     readonly fullName: string,
 *   ) {}
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface IIntegrationEvent extends IEvent {}

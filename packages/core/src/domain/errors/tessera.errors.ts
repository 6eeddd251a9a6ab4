/**
 * @fileoverview Library Errors - Argument, Validation and Configuration Failures
 *
 * @packageDocumentation
 * @module @tessera/core/domain/errors
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Every error raised by Tessera extends {@link TesseraError}. All of them are
 * precondition or startup failures: they surface synchronously to the caller
 * and nothing in the library retries or suppresses them.
 *
 * | Error | Raised when |
 * |-------|-------------|
 * | ArgumentError | A required input is absent |
 * | DomainValidationError | A value object's `validate()` rejects its state |
 * | ConfigurationError | Startup configuration cannot be used |
 *
 * @version 1.0.0
 */

/**
 * Base class for all Tessera errors.
 *
 * @example
 * ```typescript
 * try {
 *   services = addEventMappers(services);
 * } catch (error) {
 *   if (error instanceof TesseraError) {
 *     logger.error({ err: error }, 'startup failed');
 *   }
 * }
 * ```
 */
export abstract class TesseraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A required argument was `null` or `undefined`.
 *
 * @example
 * ```typescript
 * new UserCreatedNotification(undefined, 'token');
 * // ArgumentError: Argument 'domainEvent' must not be null or undefined.
 * ```
 */
export class ArgumentError extends TesseraError {
  /**
   * Name of the offending parameter.
   */
  public readonly paramName: string;

  constructor(paramName: string, message?: string) {
    super(message ?? `Argument '${paramName}' must not be null or undefined.`);
    this.paramName = paramName;
  }
}

/**
 * A value object's invariants do not hold.
 *
 * @remarks
 * The predicate and message belong to the value object. `details` carries
 * whatever the caller wants to attach (offending field, limits, ...).
 *
 * @example
 * ```typescript
 * class Money implements IValueObject {
 *   constructor(readonly amount: number, readonly currency: string) {}
 *
 *   validate(): void {
 *     if (this.amount < 0) {
 *       throw new DomainValidationError('Amount must not be negative', {
 *         amount: this.amount,
 *       });
 *     }
 *   }
 * }
 * ```
 */
export class DomainValidationError extends TesseraError {
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.details = details;
  }
}

/**
 * Startup configuration cannot be used: no code units to scan, or an
 * environment variable failed validation.
 */
export class ConfigurationError extends TesseraError {
  /**
   * One entry per problem found, already formatted for humans.
   */
  public readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}\n${problems.join('\n')}` : message);
    this.problems = problems;
  }
}

/**
 * Throw {@link ArgumentError} when `value` is absent.
 *
 * @returns The value, narrowed to exclude `null` and `undefined`.
 */
export function requireArgument<T>(value: T | null | undefined, paramName: string): T {
  if (value === null || value === undefined) {
    throw new ArgumentError(paramName);
  }
  return value;
}

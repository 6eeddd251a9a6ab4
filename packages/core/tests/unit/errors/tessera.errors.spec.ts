/**
 * @fileoverview Domain Error Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  ArgumentError,
  ConfigurationError,
  DomainValidationError,
  TesseraError,
  requireArgument,
} from '../../../src/domain/errors';

describe('ArgumentError', () => {
  it('should name the missing parameter', () => {
    const error = new ArgumentError('domainEvent');

    expect(error.message).toBe("Argument 'domainEvent' must not be null or undefined.");
    expect(error.paramName).toBe('domainEvent');
  });

  it('should accept a custom message', () => {
    expect(new ArgumentError('codeUnits', 'Too few').message).toBe('Too few');
  });

  it('should keep the error hierarchy', () => {
    const error = new ArgumentError('self');

    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toBeInstanceOf(TesseraError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ArgumentError');
  });
});

describe('DomainValidationError', () => {
  it('should carry details', () => {
    const error = new DomainValidationError('Street is required', { field: 'street' });

    expect(error.message).toBe('Street is required');
    expect(error.details).toEqual({ field: 'street' });
    expect(error.name).toBe('DomainValidationError');
  });

  it('should default details to an empty record', () => {
    expect(new DomainValidationError('Invalid').details).toEqual({});
  });
});

describe('ConfigurationError', () => {
  it('should list problems under the message', () => {
    const error = new ConfigurationError('Environment validation failed:', [
      '  A: missing',
      '  B: too short',
    ]);

    expect(error.message).toBe('Environment validation failed:\n  A: missing\n  B: too short');
    expect(error.problems).toEqual(['  A: missing', '  B: too short']);
  });

  it('should keep the message alone without problems', () => {
    const error = new ConfigurationError('At least one code unit');

    expect(error.message).toBe('At least one code unit');
    expect(error.problems).toEqual([]);
  });
});

describe('requireArgument', () => {
  it('should return present values unchanged', () => {
    const value = { id: 'u1' };

    expect(requireArgument(value, 'value')).toBe(value);
    expect(requireArgument(0, 'count')).toBe(0);
    expect(requireArgument('', 'name')).toBe('');
    expect(requireArgument(false, 'flag')).toBe(false);
  });

  it('should throw ArgumentError for null and undefined', () => {
    expect(() => requireArgument(null, 'self')).toThrow(ArgumentError);
    expect(() => requireArgument(undefined, 'self')).toThrow(
      "Argument 'self' must not be null or undefined.",
    );
  });
});

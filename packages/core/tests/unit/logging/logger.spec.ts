/**
 * @fileoverview Logger Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, afterEach } from 'vitest';

import {
  LogLevel,
  createChildLogger,
  createLogger,
  getLogger,
  setDefaultLogger,
} from '../../../src/infrastructure/logging';

describe('createLogger', () => {
  it('should apply the configured level', () => {
    const logger = createLogger({ level: LogLevel.DEBUG, serviceName: 'orders' });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(logger.isLevelEnabled('trace')).toBe(false);
  });

  it('should bind the service name and extra base fields', () => {
    const logger = createLogger({
      level: LogLevel.SILENT,
      serviceName: 'orders',
      base: { region: 'eu' },
    });

    expect(logger.bindings()).toEqual({ service: 'orders', region: 'eu' });
  });
});

describe('createChildLogger', () => {
  it('should add bindings to the parent', () => {
    const parent = createLogger({ level: LogLevel.SILENT, serviceName: 'orders' });

    const child = createChildLogger(parent, { component: 'event-mappers' });

    expect(child.bindings()).toEqual({ service: 'orders', component: 'event-mappers' });
    expect(child.level).toBe('silent');
  });
});

describe('default logger', () => {
  const original = getLogger();

  afterEach(() => {
    setDefaultLogger(original);
  });

  it('should be replaceable', () => {
    const replacement = createLogger({ level: LogLevel.WARN, serviceName: 'billing' });

    setDefaultLogger(replacement);

    expect(getLogger()).toBe(replacement);
  });
});

/**
 * @fileoverview Vitest Test Setup
 *
 * Global test configuration for @tessera/core.
 * This file is loaded before each test file runs.
 *
 * @license Apache-2.0
 */

import { afterEach, vi } from 'vitest';

import { createLogger, setDefaultLogger } from '../src/infrastructure/logging';

// ============================================================================
// Global Test Setup
// ============================================================================

// Keep test output free of library log lines
setDefaultLogger(createLogger({ level: 'silent', serviceName: 'tessera-test' }));

// ============================================================================
// Per-Test Cleanup
// ============================================================================

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Shared Vitest setup
 *
 * Keeps logger output quiet unless a test raises the level itself, and
 * undoes global stubs between tests.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeEach(() => {
  setLogLevel('error');
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

/**
 * Vitest Setup File
 * Global test configuration
 */

import { afterEach, vi } from 'vitest';

// Environment for tests
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

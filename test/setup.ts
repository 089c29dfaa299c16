/**
 * Vitest Global Test Setup
 *
 * Suppresses console output so the library's own log lines do not clutter
 * test output, and drops the shared stores after each file.
 */

import { beforeAll, afterAll, vi } from 'vitest';
import { resetSpanStores } from '../src/export/lifecycle.js';
import { resetTraceParams } from '../src/trace/trace-params.js';
import { resetConfig } from '../src/config.js';

const originalConsole = {
  log: console.log,
  error: console.error,
  warn: console.warn,
  info: console.info,
  debug: console.debug,
};

beforeAll(() => {
  console.log = vi.fn();
  console.error = vi.fn();
  console.warn = vi.fn();
  console.info = vi.fn();
  console.debug = vi.fn();
});

afterAll(() => {
  resetSpanStores();
  resetTraceParams();
  resetConfig();

  console.log = originalConsole.log;
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.info = originalConsole.info;
  console.debug = originalConsole.debug;
});

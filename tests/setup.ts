/**
 * Global test setup
 * Runs before every test file
 */

import { vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';

// Keep log files out of the project and quiet the logger
process.env.LOG_DIR = path.join(os.tmpdir(), 'groupkeeper-test-logs');
process.env.LOG_LEVEL = 'error';

// Suppress console output during tests
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

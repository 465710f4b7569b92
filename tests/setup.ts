/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.DATABASE_PATH = ':memory:';
process.env.ENCRYPTION_KEY = '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';
process.env.AUTOMATION_API_TOKEN = 'test-secret';
process.env.JOB_QUEUE_PROVIDER = 'memory';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.LEDGER_API_URL = 'http://ledger.test';
process.env.LEDGER_API_KEY = 'test-ledger-key';
delete process.env.EXCHANGE_RATE_API_KEY;

// Import mocks
import './mocks/anthropic.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // fetch is stubbed per test by the ledger and exchange-rate suites
    unstubGlobals: true,
    alias: {
      '@anthropic-ai/sdk': './tests/mocks/anthropic.ts',
    },
  },
});

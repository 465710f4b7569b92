/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. Both the HTTP
 * server (scheduler tick + automation routes) and the queue worker read
 * from this object.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read an env var restricted to a fixed set of values; unknown values fall back. */
function oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[key];
  return allowed.find((value) => value === raw) ?? defaultValue;
}

export const JOB_QUEUE_PROVIDERS = ['bullmq', 'memory'] as const;
export type JobQueueProvider = (typeof JOB_QUEUE_PROVIDERS)[number];

export const API_KEY_SOURCES = ['env', 'database'] as const;
export type ApiKeySource = (typeof API_KEY_SOURCES)[number];

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /** SQLite file shared with the configuration API; no default on purpose */
  databasePath: required('DATABASE_PATH'),

  /** 64-char hex AES-256 key for app passwords and encrypted settings */
  encryptionKey: required('ENCRYPTION_KEY'),

  /** Token expected in X-API-Key on the automation routes */
  automationApiToken: required('AUTOMATION_API_TOKEN'),

  queue: {
    provider: oneOf('JOB_QUEUE_PROVIDER', JOB_QUEUE_PROVIDERS, 'bullmq'),
    redisUrl: optional('REDIS_URL', 'redis://localhost:6379/0'),
    workerConcurrency: optionalInt('WORKER_CONCURRENCY', 2),
  },

  scheduler: {
    enabled: optionalBool('SCHEDULER_ENABLED', true),
    intervalMs: optionalInt('SCHEDULER_INTERVAL_MS', 300000),
  },

  extractor: {
    modelId: optional('EXTRACTOR_MODEL_ID', 'claude-haiku-4-5'),
    apiKeySource: oneOf('EXTRACTOR_API_KEY_SOURCE', API_KEY_SOURCES, 'env'),
    /** global_configuration key consulted when apiKeySource is 'database' */
    apiKeySetting: optional('EXTRACTOR_API_KEY_SETTING', 'ANTHROPIC_API_KEY'),
    anthropicApiKey: required('ANTHROPIC_API_KEY'),
  },

  ledger: {
    apiUrl: required('LEDGER_API_URL'),
    apiKey: required('LEDGER_API_KEY'),
    defaultCurrency: optional('LEDGER_DEFAULT_CURRENCY', 'INR'),
    defaultBankAccount: optional('LEDGER_DEFAULT_BANK_ACCOUNT', 'Assets:Bank'),
    defaultExpenseAccount: optional('LEDGER_DEFAULT_EXPENSE_ACCOUNT', 'Expenses:Uncategorized'),
    timeoutMs: optionalInt('LEDGER_TIMEOUT_MS', 15000),
  },

  exchangeRates: {
    apiKey: required('EXCHANGE_RATE_API_KEY'),
    ttlMinutes: optionalInt('EXCHANGE_RATE_TTL_MINUTES', 60),
    fallbackRate: optionalFloat('EXCHANGE_RATE_FALLBACK', 83),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.encryptionKey) {
    errors.push('ENCRYPTION_KEY is required');
  } else if (!/^[0-9a-fA-F]{64}$/.test(config.encryptionKey)) {
    errors.push('ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
  }

  if (!config.databasePath) errors.push('DATABASE_PATH is required');
  if (!config.ledger.apiUrl) errors.push('LEDGER_API_URL is required');
  if (!config.ledger.apiKey) errors.push('LEDGER_API_KEY is required');

  if (config.extractor.apiKeySource === 'env' && !config.extractor.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when EXTRACTOR_API_KEY_SOURCE=env');
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (config.scheduler.intervalMs < 10000) {
    errors.push(`SCHEDULER_INTERVAL_MS must be >= 10000, got ${config.scheduler.intervalMs}`);
  }
  if (config.queue.workerConcurrency < 1) {
    errors.push(`WORKER_CONCURRENCY must be >= 1, got ${config.queue.workerConcurrency}`);
  }
  if (config.exchangeRates.ttlMinutes < 1) {
    errors.push(`EXCHANGE_RATE_TTL_MINUTES must be >= 1, got ${config.exchangeRates.ttlMinutes}`);
  }
  if (!(config.exchangeRates.fallbackRate > 0)) {
    errors.push(`EXCHANGE_RATE_FALLBACK must be > 0, got ${config.exchangeRates.fallbackRate}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;

/**
 * @fileoverview Queue entry point for a per-user processing pass.
 *
 * Runs inside a worker with nothing inherited from the scheduler: it opens
 * its own database connection, wires the processor's collaborators from
 * configuration, and closes the connection whatever the outcome.
 */

import type Database from 'better-sqlite3';
import config from '../../config.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { openDatabase } from '../database.js';
import { createDecryptor, type Decryptor } from '../encryption/index.js';
import { SqliteEmailConfigStore } from '../email-config/index.js';
import {
  ExchangeRateCache,
  ExchangeRateService,
  LlmTransactionExtractor,
  createApiKeyProvider,
  type TransactionExtractor,
} from '../extractor/index.js';
import { SqliteGlobalConfigStore } from '../global-config/index.js';
import { HttpLedgerClient, type LedgerClient } from '../ledger/index.js';
import { createImapMailClient, type MailClientFactory } from '../mail/index.js';
import { SqliteProcessedMessageStore } from '../processed-messages/index.js';
import { EmailProcessor } from './processor.js';
import type { JobContext, ProcessingResult } from './types.js';

const logger = createLogger({ domain: 'email-processor' });

/** Collaborators a caller may supply instead of the configured defaults. */
export interface StandaloneOverrides {
  databasePath?: string;
  decrypt?: Decryptor;
  createMailClient?: MailClientFactory;
  extractor?: TransactionExtractor;
  ledger?: LedgerClient;
  /** Shared across jobs by the worker so rates survive between passes */
  exchangeRateCache?: ExchangeRateCache;
}

function buildDecryptor(overrides: StandaloneOverrides): Decryptor {
  if (overrides.decrypt) return overrides.decrypt;
  if (!config.encryptionKey) {
    throw new AppError('ENCRYPTION_KEY is not configured', 'CONFIG_MISSING');
  }
  return createDecryptor(config.encryptionKey);
}

function buildExtractor(db: Database.Database, decrypt: Decryptor, overrides: StandaloneOverrides): TransactionExtractor {
  if (overrides.extractor) return overrides.extractor;
  const apiKeys = createApiKeyProvider(config.extractor.apiKeySource, {
    envApiKey: config.extractor.anthropicApiKey,
    store: new SqliteGlobalConfigStore(db),
    settingKey: config.extractor.apiKeySetting,
    decrypt,
  });
  const exchangeRates = new ExchangeRateService({
    apiKey: config.exchangeRates.apiKey,
    fallbackRate: config.exchangeRates.fallbackRate,
    cache: overrides.exchangeRateCache ?? new ExchangeRateCache(config.exchangeRates.ttlMinutes * 60_000),
  });
  return new LlmTransactionExtractor({
    apiKeys,
    exchangeRates,
    modelId: config.extractor.modelId,
    defaultCurrency: config.ledger.defaultCurrency,
  });
}

function buildLedger(overrides: StandaloneOverrides): LedgerClient {
  if (overrides.ledger) return overrides.ledger;
  if (!config.ledger.apiUrl || !config.ledger.apiKey) {
    throw new AppError('LEDGER_API_URL and LEDGER_API_KEY must be configured', 'CONFIG_MISSING');
  }
  return new HttpLedgerClient({
    baseUrl: config.ledger.apiUrl,
    apiKey: config.ledger.apiKey,
    defaultBankAccount: config.ledger.defaultBankAccount,
    defaultExpenseAccount: config.ledger.defaultExpenseAccount,
    timeoutMs: config.ledger.timeoutMs,
  });
}

export async function processUserEmailsStandalone(
  userId: number,
  jobContext: JobContext | null,
  overrides: StandaloneOverrides = {}
): Promise<ProcessingResult> {
  const databasePath = overrides.databasePath ?? config.databasePath;
  if (!databasePath) {
    logger.error('standalone_missing_database_path', { userId });
    return { status: 'error', error: 'DATABASE_PATH is not configured' };
  }

  let db: Database.Database | null = null;
  try {
    db = openDatabase(databasePath);
    const decrypt = buildDecryptor(overrides);
    const processor = new EmailProcessor({
      configStore: new SqliteEmailConfigStore(db),
      decrypt,
      createMailClient: overrides.createMailClient ?? createImapMailClient,
      extractor: buildExtractor(db, decrypt, overrides),
      ledger: buildLedger(overrides),
      processedMessages: new SqliteProcessedMessageStore(db),
    });
    return await processor.processUserEmails(userId, jobContext);
  } catch (error) {
    logger.error('standalone_setup_failed', { userId, error: errorMessage(error) });
    return { status: 'error', error: errorMessage(error) };
  } finally {
    db?.close();
  }
}

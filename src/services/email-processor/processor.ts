/**
 * @fileoverview Per-user email processing pass.
 *
 * Loads the user's configuration, opens an IMAP session, and runs every
 * unread email since the last checkpoint through extraction and the ledger
 * API. When the stored samples name their senders, only mail from those
 * senders is fetched. Messages already posted are never posted again, even
 * if their `\Seen` flag was lost. Per-email failures are folded into the
 * result instead of aborting the batch, and the IMAP session is always
 * closed.
 */

import { createLogger, safeSnippet, type AppLogger } from '../../utils/observability/index.js';
import { errorDetails, errorMessage } from '../../utils/errors.js';
import type { Decryptor } from '../encryption/index.js';
import type { EmailConfigStore } from '../email-config/types.js';
import { UNKNOWN, type SampleEmail, type TransactionExtractor } from '../extractor/types.js';
import type { LedgerClient, TransactionCandidate } from '../ledger/types.js';
import type { IncomingEmail, MailClient, MailClientFactory } from '../mail/types.js';
import type { ProcessedMessageStore } from '../processed-messages/types.js';
import {
  SKIPPED_CONFIG_REASON,
  type BatchTally,
  type EmailOutcome,
  type JobContext,
  type ProcessingResult,
} from './types.js';

export interface EmailProcessorDeps {
  configStore: EmailConfigStore;
  decrypt: Decryptor;
  createMailClient: MailClientFactory;
  extractor: TransactionExtractor;
  ledger: LedgerClient;
  processedMessages: ProcessedMessageStore;
  logger?: AppLogger;
  now?: () => Date;
}

const EMPTY_TALLY: BatchTally = { processedCount: 0, errors: [] };

interface BatchInputs {
  samples: readonly SampleEmail[];
  /** Message ids posted by earlier passes */
  processed: ReadonlySet<string>;
}

/** Fold one email's outcome into the running tally without mutating it. */
export function foldOutcome(tally: BatchTally, outcome: EmailOutcome): BatchTally {
  switch (outcome.kind) {
    case 'posted':
      return {
        processedCount: tally.processedCount + 1,
        errors: outcome.markError ? [...tally.errors, outcome.markError] : tally.errors,
      };
    case 'failed':
      return { processedCount: tally.processedCount, errors: [...tally.errors, outcome.error] };
    case 'skipped':
      return tally;
  }
}

/**
 * Parse the stored few-shot samples. Anything that is not a JSON array of
 * objects with a string body degrades to fewer (or zero) samples.
 */
export function parseSampleEmails(raw: string | null, logger?: AppLogger): SampleEmail[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger?.warn('sample_emails_invalid_json', { error: errorMessage(error) });
    return [];
  }
  if (!Array.isArray(parsed)) {
    logger?.warn('sample_emails_not_array');
    return [];
  }

  const samples: SampleEmail[] = [];
  for (const item of parsed) {
    if (typeof item === 'string') {
      samples.push({ subject: '', body: item });
    } else if (typeof item === 'object' && item !== null && 'body' in item && typeof item.body === 'string') {
      const subject = 'subject' in item && typeof item.subject === 'string' ? item.subject : '';
      const sample: SampleEmail = { subject, body: item.body };
      if ('from' in item && typeof item.from === 'string') {
        sample.from = item.from;
      }
      samples.push(sample);
    }
  }
  return samples;
}

/**
 * Distinct lowercased sender addresses named by the samples. Accepts both
 * bare addresses and `Name <address>` forms.
 */
export function sampleSenders(samples: readonly SampleEmail[]): string[] {
  const senders = new Set<string>();
  for (const sample of samples) {
    if (!sample.from) continue;
    const address = (/<([^>]+)>/.exec(sample.from)?.[1] ?? sample.from).trim().toLowerCase();
    if (address) senders.add(address);
  }
  return [...senders];
}

export class EmailProcessor {
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: EmailProcessorDeps) {
    this.logger = deps.logger ?? createLogger({ domain: 'email-processor' });
    this.now = deps.now ?? (() => new Date());
  }

  async processUserEmails(userId: number, jobContext: JobContext | null): Promise<ProcessingResult> {
    if (!jobContext) {
      this.logger.error('processing_without_job_context', { userId });
      return { status: 'error', error: 'No job context found' };
    }
    const log = this.logger.child({ userId, jobId: jobContext.id });

    let mail: MailClient | null = null;
    try {
      const config = await this.deps.configStore.get(userId);
      if (!config || !config.isEnabled) {
        log.info('processing_skipped', { reason: SKIPPED_CONFIG_REASON });
        return { status: 'skipped', reason: SKIPPED_CONFIG_REASON };
      }

      const password = this.deps.decrypt(config.appPassword);
      if (!password) {
        log.error('app_password_decrypt_failed');
        return { status: 'error', error: 'Failed to decrypt app password' };
      }

      mail = this.deps.createMailClient({
        host: config.imapServer,
        port: config.imapPort,
        user: config.emailAddress,
        password,
      });
      await mail.connect();

      const samples = parseSampleEmails(config.sampleEmails, log);
      const senders = sampleSenders(samples);
      const emails = await mail.fetchUnreadSince(config.lastCheckTime, senders);
      log.info('processing_started', {
        emailCount: emails.length,
        since: config.lastCheckTime,
        senderCount: senders.length,
      });

      const processed = await this.deps.processedMessages.listProcessed(userId);
      const tally = await this.processBatch(mail, config.userId, emails, { samples, processed }, log);

      await this.deps.configStore.updateLastCheckTime(userId, this.now());

      log.info('processing_complete', {
        processedCount: tally.processedCount,
        errorCount: tally.errors.length,
      });
      return { status: 'success', processedCount: tally.processedCount, errors: [...tally.errors] };
    } catch (error) {
      log.error('processing_failed', errorDetails(error));
      return { status: 'error', error: errorMessage(error) };
    } finally {
      if (mail) {
        await this.disconnectQuietly(mail, log);
      }
    }
  }

  /** Sequential on purpose: one IMAP session, one email at a time. */
  private async processBatch(
    mail: MailClient,
    userId: number,
    emails: readonly IncomingEmail[],
    batch: BatchInputs,
    log: AppLogger
  ): Promise<BatchTally> {
    let tally = EMPTY_TALLY;
    for (const email of emails) {
      tally = foldOutcome(tally, await this.processEmail(mail, userId, email, batch, log));
    }
    return tally;
  }

  private async processEmail(
    mail: MailClient,
    userId: number,
    email: IncomingEmail,
    batch: BatchInputs,
    log: AppLogger
  ): Promise<EmailOutcome> {
    try {
      if (batch.processed.has(email.messageId)) {
        log.info('email_skipped', { emailId: email.id, reason: 'already_processed' });
        await this.markQuietly(mail, email, log);
        return { kind: 'skipped', emailId: email.id, reason: 'already_processed' };
      }

      const candidate = await this.extractCandidate(email, batch.samples, log);
      if (!candidate) {
        log.info('email_skipped', { emailId: email.id, reason: 'no_transaction' });
        return { kind: 'skipped', emailId: email.id, reason: 'no_transaction' };
      }
      if (candidate.amount === UNKNOWN) {
        log.info('email_skipped', { emailId: email.id, reason: 'unknown_amount', subject: safeSnippet(email.subject, 60) });
        return { kind: 'skipped', emailId: email.id, reason: 'unknown_amount' };
      }

      const posted = await this.deps.ledger.createTransaction(userId, candidate);
      if (!posted.success) {
        const error = `Failed to create transaction for email ${email.id}: ${posted.error ?? 'unknown error'}`;
        log.warn('email_post_failed', { emailId: email.id, error: posted.error });
        return { kind: 'failed', emailId: email.id, error };
      }

      await this.recordProcessed(userId, email, log);

      try {
        await mail.markAsProcessed(email.id);
      } catch (error) {
        log.warn('email_mark_failed', { emailId: email.id, error: errorMessage(error) });
        return {
          kind: 'posted',
          emailId: email.id,
          markError: `Error processing email ${email.id}: ${errorMessage(error)}`,
        };
      }
      log.info('email_processed', { emailId: email.id });
      return { kind: 'posted', emailId: email.id };
    } catch (error) {
      log.error('email_processing_error', { emailId: email.id, error: errorMessage(error) });
      return { kind: 'failed', emailId: email.id, error: `Error processing email ${email.id}: ${errorMessage(error)}` };
    }
  }

  /** Extractor exceptions mean "no transaction data" for this email. */
  private async extractCandidate(
    email: IncomingEmail,
    samples: readonly SampleEmail[],
    log: AppLogger
  ): Promise<TransactionCandidate | null> {
    try {
      const extracted = await this.deps.extractor.extract(email.body, samples);
      return {
        ...extracted,
        emailId: email.id,
        emailSubject: email.subject,
        emailFrom: email.from,
        emailDate: email.date ? email.date.toISOString() : null,
      };
    } catch (error) {
      log.warn('email_extraction_failed', { emailId: email.id, error: errorMessage(error) });
      return null;
    }
  }

  private async recordProcessed(userId: number, email: IncomingEmail, log: AppLogger): Promise<void> {
    try {
      await this.deps.processedMessages.markProcessed(userId, email.messageId, this.now());
    } catch (error) {
      log.warn('processed_message_record_failed', { emailId: email.id, error: errorMessage(error) });
    }
  }

  /** Re-applies `\Seen` to a message posted by an earlier pass. */
  private async markQuietly(mail: MailClient, email: IncomingEmail, log: AppLogger): Promise<void> {
    try {
      await mail.markAsProcessed(email.id);
    } catch (error) {
      log.warn('email_mark_failed', { emailId: email.id, error: errorMessage(error) });
    }
  }

  private async disconnectQuietly(mail: MailClient, log: AppLogger): Promise<void> {
    try {
      await mail.disconnect();
    } catch (error) {
      log.warn('imap_disconnect_failed', { error: errorMessage(error) });
    }
  }
}

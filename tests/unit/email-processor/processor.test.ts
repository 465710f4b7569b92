/**
 * Unit tests for the per-user processing pass, with in-process stand-ins
 * for IMAP, the extractor and the ledger API.
 */

import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import {
  EmailProcessor,
  foldOutcome,
  parseSampleEmails,
  sampleSenders,
} from '../../../src/services/email-processor/processor.js';
import { AppError } from '../../../src/utils/errors.js';
import type { BatchTally } from '../../../src/services/email-processor/types.js';
import { UNKNOWN, type ExtractedTransaction, type SampleEmail } from '../../../src/services/extractor/types.js';
import type { LedgerPostResult, TransactionCandidate } from '../../../src/services/ledger/types.js';
import type { MailConnectionSettings } from '../../../src/services/mail/types.js';
import {
  FakeMailClient,
  InMemoryEmailConfigStore,
  InMemoryProcessedMessageStore,
  createRecordingLogger,
  makeConfig,
  makeEmail,
  type FakeMailOptions,
} from '../../helpers/fakes.js';

const now = new Date('2025-01-15T10:00:00.000Z');
const lastCheckTime = new Date('2025-01-15T09:00:00.000Z');
const job = { id: 'email_process_42_1736935200', name: 'process_user_emails', attempt: 1 };

type ExtractFn = (body: string, samples: readonly SampleEmail[]) => Promise<ExtractedTransaction>;
type PostFn = (userId: number, candidate: TransactionCandidate) => Promise<LedgerPostResult>;

function transaction(overrides: Partial<ExtractedTransaction> = {}): ExtractedTransaction {
  return {
    amount: '250.00',
    date: '15-01-2025',
    transactionTime: '08:45',
    accountNumber: 'XX1234',
    recipient: 'corner.store@upi',
    currency: 'INR',
    ...overrides,
  };
}

describe('EmailProcessor', () => {
  let configStore: InMemoryEmailConfigStore;
  let mailOptions: FakeMailOptions;
  let mailClients: FakeMailClient[];
  let createMailClient: Mock<(settings: MailConnectionSettings) => FakeMailClient>;
  let extract: Mock<ExtractFn>;
  let createTransaction: Mock<PostFn>;
  let processedMessages: InMemoryProcessedMessageStore;
  let logger: ReturnType<typeof createRecordingLogger>;
  let processor: EmailProcessor;

  beforeEach(() => {
    configStore = new InMemoryEmailConfigStore();
    configStore.add(makeConfig({ userId: 42, lastCheckTime }));
    mailOptions = {};
    mailClients = [];
    createMailClient = vi.fn((settings: MailConnectionSettings) => {
      const client = new FakeMailClient(settings, mailOptions);
      mailClients.push(client);
      return client;
    });
    extract = vi.fn<ExtractFn>(async () => transaction());
    createTransaction = vi.fn<PostFn>(async () => ({ success: true }));
    processedMessages = new InMemoryProcessedMessageStore();
    logger = createRecordingLogger();

    processor = new EmailProcessor({
      configStore,
      decrypt: (value) => (value === 'enc:app-password' ? 'app-password' : null),
      createMailClient,
      extractor: { extract },
      ledger: { createTransaction },
      processedMessages,
      logger,
      now: () => now,
    });
  });

  function onlyMailClient(): FakeMailClient {
    expect(mailClients).toHaveLength(1);
    const [client] = mailClients;
    if (!client) throw new Error('no mail client was created');
    return client;
  }

  it('refuses to run without a job context', async () => {
    expect(await processor.processUserEmails(42, null)).toEqual({ status: 'error', error: 'No job context found' });
    expect(createMailClient).not.toHaveBeenCalled();
  });

  it('skips users without a configuration and opens no session', async () => {
    expect(await processor.processUserEmails(7, job)).toEqual({
      status: 'skipped',
      reason: 'configuration_not_found_or_disabled',
    });
    expect(createMailClient).not.toHaveBeenCalled();
  });

  it('skips disabled users and opens no session', async () => {
    configStore.add(makeConfig({ userId: 42, isEnabled: false }));

    expect(await processor.processUserEmails(42, job)).toEqual({
      status: 'skipped',
      reason: 'configuration_not_found_or_disabled',
    });
    expect(createMailClient).not.toHaveBeenCalled();
  });

  it('fails when the app password cannot be decrypted', async () => {
    configStore.add(makeConfig({ userId: 42, appPassword: 'garbage' }));

    expect(await processor.processUserEmails(42, job)).toEqual({
      status: 'error',
      error: 'Failed to decrypt app password',
    });
    expect(createMailClient).not.toHaveBeenCalled();
  });

  it('connects with the stored settings and fetches since the last check', async () => {
    await processor.processUserEmails(42, job);

    expect(createMailClient).toHaveBeenCalledWith({
      host: 'imap.example.com',
      port: 993,
      user: 'alice@example.com',
      password: 'app-password',
    });
    const client = onlyMailClient();
    expect(client.connectCalls).toBe(1);
    expect(client.fetchedSince).toEqual([lastCheckTime]);
    expect(client.fetchedSenders).toEqual([[]]);
  });

  it('fetches only mail from the senders named by the samples', async () => {
    configStore.add(
      makeConfig({
        userId: 42,
        lastCheckTime,
        sampleEmails: JSON.stringify([
          { from: 'Card Alerts <Alerts@Bank.example>', body: 'INR 10 debited' },
          { from: 'alerts@bank.example', body: 'INR 20 debited' },
          { from: 'upi@wallet.example', body: 'Rs 5 paid' },
          'Rs 7 spent',
        ]),
      })
    );

    await processor.processUserEmails(42, job);

    expect(onlyMailClient().fetchedSenders).toEqual([['alerts@bank.example', 'upi@wallet.example']]);
  });

  it('returns success with nothing processed for an empty inbox and advances the checkpoint', async () => {
    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'success', processedCount: 0, errors: [] });
    expect(configStore.lastCheckUpdates).toEqual([{ userId: 42, at: now }]);
    expect(onlyMailClient().disconnectCalls).toBe(1);
  });

  it('posts each extracted transaction with its email metadata', async () => {
    mailOptions.emails = [makeEmail('101', 'INR 250.00 debited')];

    await processor.processUserEmails(42, job);

    expect(extract).toHaveBeenCalledWith('INR 250.00 debited', []);
    expect(createTransaction).toHaveBeenCalledWith(42, {
      ...transaction(),
      emailId: '101',
      emailSubject: 'Transaction alert 101',
      emailFrom: 'alerts@bank.example',
      emailDate: '2025-01-15T09:00:00.000Z',
    });
    expect(onlyMailClient().marked).toEqual(['101']);
  });

  it('counts a posted email and records a failed post without marking it', async () => {
    mailOptions.emails = [makeEmail('101', 'first'), makeEmail('102', 'second')];
    createTransaction.mockImplementation(async (_userId, candidate) =>
      candidate.emailId === '102' ? { success: false, error: 'Ledger API returned 422: bad posting' } : { success: true }
    );

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({
      status: 'success',
      processedCount: 1,
      errors: ['Failed to create transaction for email 102: Ledger API returned 422: bad posting'],
    });
    expect(onlyMailClient().marked).toEqual(['101']);
    expect(configStore.lastCheckUpdates).toEqual([{ userId: 42, at: now }]);
  });

  it('neither posts, records nor marks an email with an unknown amount', async () => {
    mailOptions.emails = [makeEmail('101', 'Your statement is ready')];
    extract.mockResolvedValue(transaction({ amount: UNKNOWN }));

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({ status: 'success', processedCount: 0, errors: [] });
    expect(createTransaction).not.toHaveBeenCalled();
    expect(onlyMailClient().marked).toEqual([]);
  });

  it('treats an extractor failure as no transaction data', async () => {
    mailOptions.emails = [makeEmail('101', 'first'), makeEmail('102', 'second')];
    extract.mockRejectedValueOnce(new Error('model overloaded'));

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({ status: 'success', processedCount: 1, errors: [] });
    expect(onlyMailClient().marked).toEqual(['102']);
  });

  it('counts a posted email whose mark step fails and records the failure', async () => {
    mailOptions.emails = [makeEmail('101', 'first')];
    mailOptions.failMarkFor = ['101'];

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({
      status: 'success',
      processedCount: 1,
      errors: ['Error processing email 101: flag update rejected for 101'],
    });
  });

  it('does not post a message again when its seen flag could not be set', async () => {
    mailOptions.emails = [makeEmail('7', 'INR 250.00 debited')];
    mailOptions.failMarkFor = ['7'];

    const first = await processor.processUserEmails(42, job);
    const second = await processor.processUserEmails(42, job);

    expect(first).toEqual({
      status: 'success',
      processedCount: 1,
      errors: ['Error processing email 7: flag update rejected for 7'],
    });
    expect(second).toEqual({ status: 'success', processedCount: 0, errors: [] });
    expect(createTransaction).toHaveBeenCalledTimes(1);
    expect(processedMessages.idsFor(42)).toEqual(['<alert-7@bank.example>']);
  });

  it('skips messages posted by an earlier pass and marks them seen again', async () => {
    await processedMessages.markProcessed(42, '<alert-101@bank.example>', lastCheckTime);
    mailOptions.emails = [makeEmail('101', 'first'), makeEmail('102', 'second')];

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({ status: 'success', processedCount: 1, errors: [] });
    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith('second', []);
    expect(onlyMailClient().marked).toEqual(['101', '102']);
    expect(processedMessages.idsFor(42)).toEqual(['<alert-101@bank.example>', '<alert-102@bank.example>']);
  });

  it('does not record a message whose post failed', async () => {
    mailOptions.emails = [makeEmail('101', 'first')];
    createTransaction.mockResolvedValue({ success: false, error: 'Ledger API returned 500: down' });

    await processor.processUserEmails(42, job);

    expect(processedMessages.idsFor(42)).toEqual([]);
  });

  it('fails the pass when the processed message ids cannot be loaded', async () => {
    mailOptions.emails = [makeEmail('101', 'first')];
    processedMessages.listError = new Error('database is locked');

    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'error', error: 'database is locked' });
    expect(createTransaction).not.toHaveBeenCalled();
    expect(onlyMailClient().disconnectCalls).toBe(1);
    expect(configStore.lastCheckUpdates).toEqual([]);
  });

  it('disconnects once and reports an error when saving the checkpoint fails', async () => {
    mailOptions.emails = [makeEmail('101', 'first')];
    vi.spyOn(configStore, 'updateLastCheckTime').mockRejectedValue(new Error('db locked'));

    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'error', error: 'db locked' });
    expect(onlyMailClient().disconnectCalls).toBe(1);
    expect(processedMessages.idsFor(42)).toEqual(['<alert-101@bank.example>']);
  });

  it('keeps going and disconnects once when the ledger call throws', async () => {
    mailOptions.emails = [makeEmail('101', 'first'), makeEmail('102', 'second')];
    createTransaction.mockRejectedValueOnce(new Error('socket hang up'));

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({
      status: 'success',
      processedCount: 1,
      errors: ['Error processing email 101: socket hang up'],
    });
    const client = onlyMailClient();
    expect(client.marked).toEqual(['102']);
    expect(client.disconnectCalls).toBe(1);
  });

  it('reports a connection failure, disconnects once and keeps the checkpoint', async () => {
    mailOptions.connectError = new Error('authentication failed');

    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'error', error: 'authentication failed' });
    expect(onlyMailClient().disconnectCalls).toBe(1);
    expect(configStore.lastCheckUpdates).toEqual([]);
  });

  it('logs the code and context of an application error', async () => {
    mailOptions.connectError = new AppError('Failed to connect to IMAP server imap.example.com: timeout', 'MAIL_CONNECT_FAILED', true, {
      host: 'imap.example.com',
      port: 993,
    });

    const result = await processor.processUserEmails(42, job);

    expect(result).toEqual({ status: 'error', error: 'Failed to connect to IMAP server imap.example.com: timeout' });
    expect(logger.records).toContainEqual({
      level: 'error',
      event: 'processing_failed',
      data: {
        error: 'Failed to connect to IMAP server imap.example.com: timeout',
        code: 'MAIL_CONNECT_FAILED',
        recoverable: true,
        errorContext: { host: 'imap.example.com', port: 993 },
      },
    });
  });

  it('reports a fetch failure and still disconnects', async () => {
    mailOptions.fetchError = new Error('mailbox unavailable');

    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'error', error: 'mailbox unavailable' });
    expect(onlyMailClient().disconnectCalls).toBe(1);
  });

  it('does not let a disconnect failure change the result', async () => {
    mailOptions.emails = [makeEmail('101', 'first')];
    mailOptions.disconnectError = new Error('already closed');

    expect(await processor.processUserEmails(42, job)).toEqual({ status: 'success', processedCount: 1, errors: [] });
  });

  it('passes the stored samples to the extractor', async () => {
    configStore.add(
      makeConfig({
        userId: 42,
        lastCheckTime,
        sampleEmails: JSON.stringify([{ subject: 'Debit alert', body: 'INR 10 debited' }, 'Rs 5 spent']),
      })
    );
    mailOptions.emails = [makeEmail('101', 'first'), makeEmail('102', 'second')];

    await processor.processUserEmails(42, job);

    const samples = [
      { subject: 'Debit alert', body: 'INR 10 debited' },
      { subject: '', body: 'Rs 5 spent' },
    ];
    expect(extract).toHaveBeenNthCalledWith(1, 'first', samples);
    expect(extract).toHaveBeenNthCalledWith(2, 'second', samples);
  });
});

describe('parseSampleEmails', () => {
  it('returns no samples for empty, invalid or non-array input', () => {
    expect(parseSampleEmails(null)).toEqual([]);
    expect(parseSampleEmails('')).toEqual([]);
    expect(parseSampleEmails('{not json')).toEqual([]);
    expect(parseSampleEmails('{"body":"x"}')).toEqual([]);
  });

  it('keeps a string sender on object samples', () => {
    const raw = JSON.stringify([{ subject: 'Debit', body: 'INR 10', from: 'alerts@bank.example' }, { body: 'x', from: 5 }]);

    expect(parseSampleEmails(raw)).toEqual([
      { subject: 'Debit', body: 'INR 10', from: 'alerts@bank.example' },
      { subject: '', body: 'x' },
    ]);
  });

  it('keeps strings and objects with a string body and drops the rest', () => {
    const raw = JSON.stringify(['plain', { body: 'no subject' }, { subject: 3, body: 'bad subject' }, { subject: 'x' }, 7]);

    expect(parseSampleEmails(raw)).toEqual([
      { subject: '', body: 'plain' },
      { subject: '', body: 'no subject' },
      { subject: '', body: 'bad subject' },
    ]);
  });
});

describe('sampleSenders', () => {
  it('collects distinct lowercased addresses from bare and named senders', () => {
    expect(
      sampleSenders([
        { subject: '', body: 'a', from: 'Bank <Alerts@Bank.example>' },
        { subject: '', body: 'b', from: ' alerts@bank.example ' },
        { subject: '', body: 'c' },
        { subject: '', body: 'd', from: '' },
      ])
    ).toEqual(['alerts@bank.example']);
  });
});

describe('foldOutcome', () => {
  const start: BatchTally = { processedCount: 2, errors: ['earlier'] };

  it('counts posted emails and appends mark errors', () => {
    expect(foldOutcome(start, { kind: 'posted', emailId: '1' })).toEqual({ processedCount: 3, errors: ['earlier'] });
    expect(foldOutcome(start, { kind: 'posted', emailId: '1', markError: 'mark' })).toEqual({
      processedCount: 3,
      errors: ['earlier', 'mark'],
    });
  });

  it('appends failures and ignores skips', () => {
    expect(foldOutcome(start, { kind: 'failed', emailId: '1', error: 'e' })).toEqual({
      processedCount: 2,
      errors: ['earlier', 'e'],
    });
    expect(foldOutcome(start, { kind: 'skipped', emailId: '1', reason: 'unknown_amount' })).toBe(start);
  });

  it('leaves the input tally untouched', () => {
    foldOutcome(start, { kind: 'failed', emailId: '1', error: 'e' });
    expect(start).toEqual({ processedCount: 2, errors: ['earlier'] });
  });
});

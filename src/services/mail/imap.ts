/**
 * @fileoverview IMAP mail client built on imapflow + mailparser.
 *
 * Holds an INBOX lock for the lifetime of the session so UID-based
 * search, fetch and flag updates all target the same mailbox.
 */

import { ImapFlow, type MailboxLockObject, type SearchObject } from 'imapflow';
import { simpleParser } from 'mailparser';
import { AppError, errorMessage } from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { IncomingEmail, MailClient, MailConnectionSettings } from './types.js';

const MAILBOX = 'INBOX';

/** IMAP search for unread mail, optionally narrowed to a set of senders. */
export function buildUnreadQuery(since: Date | null, senders: readonly string[]): SearchObject {
  const query: SearchObject = since ? { seen: false, since } : { seen: false };
  if (senders.length === 1) {
    query.from = senders[0];
  } else if (senders.length > 1) {
    query.or = senders.map((from) => ({ from }));
  }
  return query;
}

export class ImapMailClient implements MailClient {
  private client: ImapFlow | null = null;
  private lock: MailboxLockObject | null = null;
  private readonly logger: AppLogger;

  constructor(
    private readonly settings: MailConnectionSettings,
    logger?: AppLogger
  ) {
    this.logger = logger ?? createLogger({ domain: 'imap' });
  }

  async connect(): Promise<void> {
    const client = new ImapFlow({
      host: this.settings.host,
      port: this.settings.port,
      secure: this.settings.port === 993,
      logger: false,
      auth: {
        user: this.settings.user,
        pass: this.settings.password,
      },
    });

    try {
      await client.connect();
      this.client = client;
      this.lock = await client.getMailboxLock(MAILBOX);
    } catch (error) {
      throw new AppError(
        `Failed to connect to IMAP server ${this.settings.host}: ${errorMessage(error)}`,
        'MAIL_CONNECT_FAILED',
        true,
        { host: this.settings.host, port: this.settings.port }
      );
    }
    this.logger.info('imap_connected', { host: this.settings.host, emailAddress: this.settings.user });
  }

  async fetchUnreadSince(since: Date | null, senders: readonly string[] = []): Promise<IncomingEmail[]> {
    const client = this.requireClient();
    const found = await client.search(buildUnreadQuery(since, senders), { uid: true });
    const uids = Array.isArray(found) ? found : [];
    if (uids.length === 0) {
      return [];
    }

    const emails: IncomingEmail[] = [];
    for await (const message of client.fetch(uids, { uid: true, envelope: true, source: true }, { uid: true })) {
      if (!message.source) {
        this.logger.warn('imap_message_without_source', { uid: message.uid });
        continue;
      }
      const parsed = await simpleParser(message.source);
      emails.push({
        id: String(message.uid),
        messageId: parsed.messageId || message.envelope?.messageId || `uid:${message.uid}`,
        subject: parsed.subject ?? message.envelope?.subject ?? '',
        from: parsed.from?.text ?? message.envelope?.from?.[0]?.address ?? '',
        date: parsed.date ?? message.envelope?.date ?? null,
        body: parsed.text?.trim() ?? '',
      });
    }

    this.logger.info('imap_fetched', {
      count: emails.length,
      since: since?.toISOString() ?? null,
      senderCount: senders.length,
    });
    return emails;
  }

  async markAsProcessed(id: string): Promise<void> {
    await this.requireClient().messageFlagsAdd(id, ['\\Seen'], { uid: true });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    const lock = this.lock;
    this.client = null;
    this.lock = null;
    if (!client) return;

    try {
      lock?.release();
      await client.logout();
    } catch (error) {
      this.logger.warn('imap_logout_failed', { error: errorMessage(error) });
      client.close();
    }
  }

  private requireClient(): ImapFlow {
    if (!this.client) {
      throw new Error('IMAP client is not connected');
    }
    return this.client;
  }
}

export function createImapMailClient(settings: MailConnectionSettings): MailClient {
  return new ImapMailClient(settings);
}

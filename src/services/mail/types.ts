/**
 * @fileoverview Mail client contract consumed by the email processor.
 */

export interface IncomingEmail {
  /** Mailbox-scoped id (IMAP UID), used to mark the message processed */
  id: string;
  /** RFC 5322 Message-ID, or `uid:<uid>` when the message carries none */
  messageId: string;
  subject: string;
  from: string;
  date: Date | null;
  /** Plain-text body; for HTML-only messages, mailparser's text rendering */
  body: string;
}

export interface MailConnectionSettings {
  host: string;
  port: number;
  user: string;
  password: string;
}

export interface MailClient {
  connect(): Promise<void>;
  /**
   * Unread messages received on or after `since`; null means no lower bound.
   * A non-empty `senders` list restricts the search to those From addresses.
   */
  fetchUnreadSince(since: Date | null, senders?: readonly string[]): Promise<IncomingEmail[]>;
  markAsProcessed(id: string): Promise<void>;
  /** Idempotent; safe to call when connect() failed. */
  disconnect(): Promise<void>;
}

export type MailClientFactory = (settings: MailConnectionSettings) => MailClient;

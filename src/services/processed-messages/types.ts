/**
 * @fileoverview Ledger of mail messages already posted, per user.
 *
 * Guards against posting the same notification twice when the IMAP
 * `\Seen` update fails after a successful post.
 */

export interface ProcessedMessageStore {
  /** Message ids already posted for this user. */
  listProcessed(userId: number): Promise<Set<string>>;
  /** Recording an id twice is a no-op. */
  markProcessed(userId: number, messageId: string, at: Date): Promise<void>;
}

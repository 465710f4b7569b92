/**
 * @fileoverview Per-user email automation configuration.
 *
 * Rows are created by the configuration API; the scheduler and the
 * processor read them, and the processor advances `lastCheckTime`.
 */

/** One automation configuration per user. */
export interface EmailConfiguration {
  userId: number;
  isEnabled: boolean;
  /** 'hourly' | 'daily' in practice; anything else polls hourly. Null is invalid. */
  pollingInterval: string | null;
  /** Null until the first completed processing pass */
  lastCheckTime: Date | null;
  imapServer: string;
  imapPort: number;
  emailAddress: string;
  /** Encrypted at rest; see services/encryption */
  appPassword: string;
  /** JSON array of `{ subject, body }` few-shot examples */
  sampleEmails: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type EmailConfigurationInput = Omit<EmailConfiguration, 'userId' | 'createdAt' | 'updatedAt' | 'lastCheckTime'> & {
  lastCheckTime?: Date | null;
};

export interface EmailConfigStore {
  get(userId: number): Promise<EmailConfiguration | null>;
  listEnabled(): Promise<EmailConfiguration[]>;
  upsert(userId: number, input: EmailConfigurationInput): Promise<EmailConfiguration>;
  /** The only field automation itself writes. */
  updateLastCheckTime(userId: number, at: Date): Promise<void>;
  delete(userId: number): Promise<void>;
}

/**
 * @fileoverview SQLite-backed email configuration store.
 *
 * Timestamps are stored as epoch milliseconds. The app password column
 * holds ciphertext only; this store never encrypts or decrypts.
 */

import type Database from 'better-sqlite3';
import type { EmailConfigStore, EmailConfiguration, EmailConfigurationInput } from './types.js';

interface EmailConfigRow {
  user_id: number;
  is_enabled: number;
  polling_interval: string | null;
  last_check_time: number | null;
  imap_server: string;
  imap_port: number;
  email_address: string;
  app_password: string;
  sample_emails: string | null;
  created_at: number;
  updated_at: number;
}

function rowToConfig(row: EmailConfigRow): EmailConfiguration {
  return {
    userId: row.user_id,
    isEnabled: row.is_enabled === 1,
    pollingInterval: row.polling_interval,
    lastCheckTime: row.last_check_time === null ? null : new Date(row.last_check_time),
    imapServer: row.imap_server,
    imapPort: row.imap_port,
    emailAddress: row.email_address,
    appPassword: row.app_password,
    sampleEmails: row.sample_emails,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SqliteEmailConfigStore implements EmailConfigStore {
  constructor(private readonly db: Database.Database) {
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_email_configurations (
        user_id INTEGER PRIMARY KEY,
        is_enabled INTEGER NOT NULL DEFAULT 0,
        polling_interval TEXT DEFAULT 'hourly',
        last_check_time INTEGER,
        imap_server TEXT NOT NULL,
        imap_port INTEGER NOT NULL DEFAULT 993,
        email_address TEXT NOT NULL,
        app_password TEXT NOT NULL,
        sample_emails TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_email_config_enabled
        ON user_email_configurations(is_enabled);
    `);
  }

  async get(userId: number): Promise<EmailConfiguration | null> {
    const row = this.db
      .prepare<[number], EmailConfigRow>('SELECT * FROM user_email_configurations WHERE user_id = ?')
      .get(userId);
    return row ? rowToConfig(row) : null;
  }

  async listEnabled(): Promise<EmailConfiguration[]> {
    return this.db
      .prepare<[], EmailConfigRow>(
        'SELECT * FROM user_email_configurations WHERE is_enabled = 1 ORDER BY user_id'
      )
      .all()
      .map(rowToConfig);
  }

  async upsert(userId: number, input: EmailConfigurationInput): Promise<EmailConfiguration> {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO user_email_configurations (
           user_id, is_enabled, polling_interval, last_check_time, imap_server, imap_port,
           email_address, app_password, sample_emails, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (user_id) DO UPDATE SET
           is_enabled = excluded.is_enabled,
           polling_interval = excluded.polling_interval,
           last_check_time = COALESCE(excluded.last_check_time, user_email_configurations.last_check_time),
           imap_server = excluded.imap_server,
           imap_port = excluded.imap_port,
           email_address = excluded.email_address,
           app_password = excluded.app_password,
           sample_emails = excluded.sample_emails,
           updated_at = excluded.updated_at`
      )
      .run(
        userId,
        input.isEnabled ? 1 : 0,
        input.pollingInterval,
        input.lastCheckTime ? input.lastCheckTime.getTime() : null,
        input.imapServer,
        input.imapPort,
        input.emailAddress,
        input.appPassword,
        input.sampleEmails,
        now,
        now
      );

    const saved = await this.get(userId);
    if (!saved) {
      throw new Error(`Email configuration for user ${userId} was not persisted`);
    }
    return saved;
  }

  async updateLastCheckTime(userId: number, at: Date): Promise<void> {
    this.db
      .prepare('UPDATE user_email_configurations SET last_check_time = ?, updated_at = ? WHERE user_id = ?')
      .run(at.getTime(), Date.now(), userId);
  }

  async delete(userId: number): Promise<void> {
    this.db.prepare('DELETE FROM user_email_configurations WHERE user_id = ?').run(userId);
  }
}

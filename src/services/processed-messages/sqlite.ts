/**
 * @fileoverview SQLite-backed processed message ledger.
 */

import type Database from 'better-sqlite3';
import type { ProcessedMessageStore } from './types.js';

export class SqliteProcessedMessageStore implements ProcessedMessageStore {
  constructor(private readonly db: Database.Database) {
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS processed_messages (
        user_id INTEGER NOT NULL,
        message_id TEXT NOT NULL,
        processed_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, message_id)
      );
    `);
  }

  async listProcessed(userId: number): Promise<Set<string>> {
    const rows = this.db
      .prepare<[number], { message_id: string }>('SELECT message_id FROM processed_messages WHERE user_id = ?')
      .all(userId);
    return new Set(rows.map((row) => row.message_id));
  }

  async markProcessed(userId: number, messageId: string, at: Date): Promise<void> {
    this.db
      .prepare('INSERT OR IGNORE INTO processed_messages (user_id, message_id, processed_at) VALUES (?, ?, ?)')
      .run(userId, messageId, at.getTime());
  }
}

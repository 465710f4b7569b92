/**
 * @fileoverview Process-wide settings shared with the configuration API,
 * e.g. the extractor's API key when it is managed from the admin UI.
 */

import type Database from 'better-sqlite3';
import type { GlobalConfigStore, GlobalSetting } from './types.js';

interface GlobalSettingRow {
  key: string;
  value: string;
  is_encrypted: number;
}

export class SqliteGlobalConfigStore implements GlobalConfigStore {
  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS global_configuration (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        is_encrypted INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  async get(key: string): Promise<GlobalSetting | null> {
    const row = this.db
      .prepare<[string], GlobalSettingRow>(
        'SELECT key, value, is_encrypted FROM global_configuration WHERE key = ?'
      )
      .get(key);
    if (!row) return null;
    return { key: row.key, value: row.value, isEncrypted: row.is_encrypted === 1 };
  }

  async set(key: string, value: string, isEncrypted: boolean): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO global_configuration (key, value, is_encrypted, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (key) DO UPDATE SET
           value = excluded.value,
           is_encrypted = excluded.is_encrypted,
           updated_at = excluded.updated_at`
      )
      .run(key, value, isEncrypted ? 1 : 0, Date.now());
  }
}

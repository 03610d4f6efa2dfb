/**
 * SQLite connection setup for the metadata store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { schema } from './schema.js';

export type MetadataDatabase = BetterSQLite3Database<typeof schema>;

export interface OpenedDatabase {
  db: MetadataDatabase;
  close(): void;
}

/** In-memory database, for tests and dry runs */
export const IN_MEMORY = ':memory:';

// Kept in sync with ./schema.ts; applied idempotently on every open.
const BOOTSTRAP_DDL = `
  CREATE TABLE IF NOT EXISTS snapshots (
    snapshot_id TEXT PRIMARY KEY NOT NULL,
    message TEXT,
    timestamp INTEGER NOT NULL,
    author TEXT NOT NULL,
    tags TEXT NOT NULL,
    parent_snapshot TEXT,
    stats TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS file_changes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    snapshot_id TEXT NOT NULL REFERENCES snapshots (snapshot_id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    path TEXT NOT NULL,
    change_type TEXT NOT NULL,
    size_bytes INTEGER,
    checksum TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp ON snapshots (timestamp DESC);
  CREATE INDEX IF NOT EXISTS idx_file_changes_snapshot ON file_changes (snapshot_id);
`;

/**
 * Open (creating if needed) the metadata database
 */
export function openMetadataDatabase(filename: string): OpenedDatabase {
  if (filename !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const sqlite = new Database(filename);
  sqlite.pragma('foreign_keys = ON');
  if (filename !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.exec(BOOTSTRAP_DDL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

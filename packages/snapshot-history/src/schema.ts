import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { FileChangeType, SnapshotStats } from '@snaptrail/snapshot-contracts';

/**
 * One row per engine snapshot
 */
export const snapshots = sqliteTable(
  'snapshots',
  {
    snapshotId: text('snapshot_id').primaryKey().notNull(),
    message: text('message'),
    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
    author: text('author').notNull(),
    tags: text('tags', { mode: 'json' }).$type<string[]>().notNull(),
    parentSnapshot: text('parent_snapshot'),
    stats: text('stats', { mode: 'json' }).$type<SnapshotStats>().notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('idx_snapshots_timestamp').on(table.timestamp)]
);

/**
 * File-level deltas, owned by a snapshot row (cascade on delete)
 */
export const fileChanges = sqliteTable(
  'file_changes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    snapshotId: text('snapshot_id')
      .notNull()
      .references(() => snapshots.snapshotId, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    path: text('path').notNull(),
    changeType: text('change_type').$type<FileChangeType>().notNull(),
    sizeBytes: integer('size_bytes'),
    checksum: text('checksum'),
  },
  (table) => [index('idx_file_changes_snapshot').on(table.snapshotId)]
);

export const schema = { snapshots, fileChanges };

export type SnapshotRow = typeof snapshots.$inferSelect;
export type NewSnapshotRow = typeof snapshots.$inferInsert;
export type FileChangeRow = typeof fileChanges.$inferSelect;
export type NewFileChangeRow = typeof fileChanges.$inferInsert;

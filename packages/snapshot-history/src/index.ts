/**
 * Snapshot metadata history
 *
 * Provides: SQLite-backed metadata store, lineage records, metadata-level diff.
 */

export { MetadataStore } from './metadata-store.js';
export type { MetadataStoreOptions, RecentQuery, MetadataStats } from './metadata-store.js';
export { openMetadataDatabase, IN_MEMORY } from './database.js';
export type { MetadataDatabase, OpenedDatabase } from './database.js';
export { snapshots, fileChanges, schema } from './schema.js';
export type { SnapshotRow, NewSnapshotRow, FileChangeRow, NewFileChangeRow } from './schema.js';
export { diffFileChanges } from './change-diff.js';

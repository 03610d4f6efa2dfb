/**
 * Metadata store - durable record of snapshot metadata and per-file changes
 */

import { and, asc, desc, eq, inArray, lt, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import {
  METADATA_DEFAULTS,
  StorageError,
  noopLogger,
  toError,
  toErrorMessage,
} from '@snaptrail/snapshot-contracts';
import type { FileChange, ILogger, SnapshotMetadata } from '@snaptrail/snapshot-contracts';
import { openMetadataDatabase } from './database.js';
import type { MetadataDatabase, OpenedDatabase } from './database.js';
import { fileChanges, snapshots } from './schema.js';
import type { FileChangeRow, NewFileChangeRow, SnapshotRow } from './schema.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Rows per INSERT; keeps bound parameters well under SQLite's variable limit */
const FILE_CHANGE_BATCH_SIZE = 500;

export interface MetadataStoreOptions {
  logger?: ILogger;
  /** Clock used by cleanup(); epoch milliseconds */
  now?: () => number;
}

export interface RecentQuery {
  limit?: number;
  /** Exact author match */
  author?: string;
  /** Every tag must be present on the record (AND) */
  tags?: string[];
}

export interface MetadataStats {
  totalSnapshots: number;
  totalFileChanges: number;
  authors: Array<{ author: string; count: number }>;
}

/**
 * Metadata Store
 *
 * A snapshot row and its file-change rows form one aggregate: every write
 * replaces the whole aggregate inside a single SQLite transaction, and the
 * connection is synchronous, so no caller can observe a partial record.
 *
 * Writes propagate StorageError. Reads degrade to null / [] with a warning.
 */
export class MetadataStore {
  private readonly db: MetadataDatabase;
  private readonly connection: OpenedDatabase;
  private readonly logger: ILogger;
  private readonly now: () => number;
  private closed = false;

  constructor(filename: string, options: MetadataStoreOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;

    try {
      this.connection = openMetadataDatabase(filename);
    } catch (error) {
      throw new StorageError(`Failed to open metadata database at ${filename}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    this.db = this.connection.db;
  }

  /**
   * Upsert a snapshot record together with its file changes
   */
  async save(metadata: SnapshotMetadata): Promise<void> {
    const row = {
      snapshotId: metadata.snapshotId,
      message: metadata.message ?? null,
      timestamp: metadata.timestamp,
      author: metadata.author,
      tags: [...metadata.tags],
      parentSnapshot: metadata.parentSnapshot ?? null,
      stats: { ...metadata.stats },
      createdAt: new Date(this.now()),
    };
    const changeRows: NewFileChangeRow[] = metadata.fileChanges.map((change, position) => ({
      snapshotId: metadata.snapshotId,
      position,
      path: change.path,
      changeType: change.changeType,
      sizeBytes: change.sizeBytes ?? null,
      checksum: change.checksum ?? null,
    }));

    try {
      this.db.transaction((tx) => {
        tx.insert(snapshots)
          .values(row)
          .onConflictDoUpdate({
            target: snapshots.snapshotId,
            set: {
              message: row.message,
              timestamp: row.timestamp,
              author: row.author,
              tags: row.tags,
              parentSnapshot: row.parentSnapshot,
              stats: row.stats,
            },
          })
          .run();

        tx.delete(fileChanges).where(eq(fileChanges.snapshotId, metadata.snapshotId)).run();

        for (let start = 0; start < changeRows.length; start += FILE_CHANGE_BATCH_SIZE) {
          tx.insert(fileChanges)
            .values(changeRows.slice(start, start + FILE_CHANGE_BATCH_SIZE))
            .run();
        }
      });
    } catch (error) {
      this.logger.error(`Failed to save metadata for snapshot ${metadata.snapshotId}`, toError(error));
      throw new StorageError(
        `Failed to save metadata for snapshot ${metadata.snapshotId}: ${toErrorMessage(error)}`,
        { cause: error, details: { snapshotId: metadata.snapshotId } }
      );
    }

    this.logger.debug('Saved snapshot metadata', {
      snapshotId: metadata.snapshotId,
      fileChanges: changeRows.length,
    });
  }

  /**
   * Load one record by snapshot ID
   */
  async get(snapshotId: string): Promise<SnapshotMetadata | null> {
    try {
      const row = this.db.select().from(snapshots).where(eq(snapshots.snapshotId, snapshotId)).get();
      if (!row) {
        return null;
      }
      return this.hydrate([row])[0] ?? null;
    } catch (error) {
      this.logger.warn('Failed to read snapshot metadata', {
        snapshotId,
        error: toErrorMessage(error),
      });
      return null;
    }
  }

  /**
   * Whether a record exists for the snapshot
   */
  async has(snapshotId: string): Promise<boolean> {
    try {
      const row = this.db
        .select({ snapshotId: snapshots.snapshotId })
        .from(snapshots)
        .where(eq(snapshots.snapshotId, snapshotId))
        .get();
      return row !== undefined;
    } catch (error) {
      this.logger.warn('Failed to check snapshot metadata', {
        snapshotId,
        error: toErrorMessage(error),
      });
      return false;
    }
  }

  /**
   * Most recent records first, optionally filtered by author and tags
   */
  async getRecent(query: RecentQuery = {}): Promise<SnapshotMetadata[]> {
    const limit = query.limit ?? METADATA_DEFAULTS.recentLimit;
    const conditions: SQL[] = [];

    if (query.author) {
      conditions.push(eq(snapshots.author, query.author));
    }
    for (const tag of query.tags ?? []) {
      conditions.push(
        sql`exists (select 1 from json_each(${snapshots.tags}) where json_each.value = ${tag})`
      );
    }

    try {
      const rows = this.db
        .select()
        .from(snapshots)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(snapshots.timestamp), desc(snapshots.snapshotId))
        .limit(limit)
        .all();
      return this.hydrate(rows);
    } catch (error) {
      this.logger.warn('Failed to read recent snapshots', { error: toErrorMessage(error) });
      return [];
    }
  }

  /**
   * Case-sensitive substring search over message, author and tags
   */
  async search(query: string, limit: number = METADATA_DEFAULTS.searchLimit): Promise<SnapshotMetadata[]> {
    try {
      const rows = this.db
        .select()
        .from(snapshots)
        .where(
          or(
            sql`instr(${snapshots.message}, ${query}) > 0`,
            sql`instr(${snapshots.author}, ${query}) > 0`,
            sql`exists (select 1 from json_each(${snapshots.tags}) where instr(json_each.value, ${query}) > 0)`
          )
        )
        .orderBy(desc(snapshots.timestamp), desc(snapshots.snapshotId))
        .limit(limit)
        .all();
      return this.hydrate(rows);
    } catch (error) {
      this.logger.warn('Failed to search snapshots', { query, error: toErrorMessage(error) });
      return [];
    }
  }

  /**
   * Delete a record and its file changes.
   * Returns whether a record existed.
   */
  async delete(snapshotId: string): Promise<boolean> {
    try {
      const result = this.db.delete(snapshots).where(eq(snapshots.snapshotId, snapshotId)).run();
      const deleted = result.changes > 0;
      if (deleted) {
        this.logger.debug('Deleted snapshot metadata', { snapshotId });
      }
      return deleted;
    } catch (error) {
      throw new StorageError(`Failed to delete metadata for snapshot ${snapshotId}: ${toErrorMessage(error)}`, {
        cause: error,
        details: { snapshotId },
      });
    }
  }

  /**
   * Remove records older than `retainDays`. Returns the number removed.
   */
  async cleanup(retainDays: number = METADATA_DEFAULTS.retainDays): Promise<number> {
    const cutoff = new Date(this.now() - retainDays * DAY_MS);

    try {
      const result = this.db.delete(snapshots).where(lt(snapshots.timestamp, cutoff)).run();
      if (result.changes > 0) {
        this.logger.info(`Cleaned up ${result.changes} old snapshot metadata entries`, {
          cutoff: cutoff.toISOString(),
        });
      }
      return result.changes;
    } catch (error) {
      throw new StorageError(`Failed to clean up metadata: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * All tracked snapshot IDs, newest first
   */
  async listIds(): Promise<string[]> {
    try {
      return this.db
        .select({ snapshotId: snapshots.snapshotId })
        .from(snapshots)
        .orderBy(desc(snapshots.timestamp), desc(snapshots.snapshotId))
        .all()
        .map((row) => row.snapshotId);
    } catch (error) {
      this.logger.warn('Failed to list snapshot ids', { error: toErrorMessage(error) });
      return [];
    }
  }

  /**
   * Aggregate counters for status output
   */
  async getStats(): Promise<MetadataStats> {
    try {
      const totalSnapshots = this.db.select({ count: sql<number>`count(*)` }).from(snapshots).get()?.count ?? 0;
      const totalFileChanges =
        this.db.select({ count: sql<number>`count(*)` }).from(fileChanges).get()?.count ?? 0;
      const authors = this.db
        .select({ author: snapshots.author, count: sql<number>`count(*)` })
        .from(snapshots)
        .groupBy(snapshots.author)
        .orderBy(desc(sql`count(*)`), asc(snapshots.author))
        .all();

      return { totalSnapshots, totalFileChanges, authors };
    } catch (error) {
      this.logger.warn('Failed to read metadata stats', { error: toErrorMessage(error) });
      return { totalSnapshots: 0, totalFileChanges: 0, authors: [] };
    }
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.connection.close();
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Attach file changes to snapshot rows (one query for the whole page)
   */
  private hydrate(rows: SnapshotRow[]): SnapshotMetadata[] {
    if (rows.length === 0) {
      return [];
    }

    const changeRows = this.db
      .select()
      .from(fileChanges)
      .where(
        inArray(
          fileChanges.snapshotId,
          rows.map((row) => row.snapshotId)
        )
      )
      .orderBy(asc(fileChanges.snapshotId), asc(fileChanges.position))
      .all();

    const bySnapshot = new Map<string, FileChange[]>();
    for (const changeRow of changeRows) {
      const list = bySnapshot.get(changeRow.snapshotId) ?? [];
      list.push(toFileChange(changeRow));
      bySnapshot.set(changeRow.snapshotId, list);
    }

    return rows.map((row) => toMetadata(row, bySnapshot.get(row.snapshotId) ?? []));
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Row Mapping
// ═══════════════════════════════════════════════════════════════════════

function toFileChange(row: FileChangeRow): FileChange {
  const change: FileChange = { path: row.path, changeType: row.changeType };
  if (row.sizeBytes !== null) {
    change.sizeBytes = row.sizeBytes;
  }
  if (row.checksum !== null) {
    change.checksum = row.checksum;
  }
  return change;
}

function toMetadata(row: SnapshotRow, changes: FileChange[]): SnapshotMetadata {
  const metadata: SnapshotMetadata = {
    snapshotId: row.snapshotId,
    timestamp: row.timestamp,
    author: row.author,
    tags: row.tags,
    stats: row.stats,
    fileChanges: changes,
  };
  if (row.message !== null) {
    metadata.message = row.message;
  }
  if (row.parentSnapshot !== null) {
    metadata.parentSnapshot = row.parentSnapshot;
  }
  return metadata;
}

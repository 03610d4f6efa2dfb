/**
 * Snapshot lifecycle types
 */

/**
 * Change classification for a single path between two snapshots
 */
export type FileChangeType = 'added' | 'modified' | 'deleted';

/**
 * File-level delta recorded with a snapshot
 */
export interface FileChange {
  /** Path as reported by the engine (repository-relative) */
  path: string;

  changeType: FileChangeType;

  sizeBytes?: number;

  /** Content hash, when the engine reports one */
  checksum?: string;
}

/**
 * Named counters captured when a snapshot is created.
 *
 * Well-known keys: filesNew, filesChanged, filesUnmodified, dirsNew,
 * dirsChanged, dirsUnmodified, dataAdded, totalFilesProcessed,
 * totalBytesProcessed, durationSeconds.
 */
export type SnapshotStats = Record<string, number>;

/**
 * Metadata record for one engine snapshot
 */
export interface SnapshotMetadata {
  /** Engine identifier (immutable, unique) */
  snapshotId: string;

  message?: string;

  /** Creation instant */
  timestamp: Date;

  /** Identity of whoever created the snapshot */
  author: string;

  /** Ordered tags; may carry key:value pairs such as `message:<text>` */
  tags: string[];

  /** Snapshot that immediately preceded this one in the engine listing */
  parentSnapshot?: string;

  stats: SnapshotStats;

  fileChanges: FileChange[];
}

/**
 * Bucket counts for forgetting old snapshots.
 * Supplied per evaluation, never persisted.
 */
export interface RetentionPolicy {
  keepLast: number;
  keepHourly: number;
  keepDaily: number;
  keepWeekly: number;
  keepMonthly: number;
  keepYearly: number;
}

/**
 * Raw filesystem event kinds accepted by the change coalescer
 */
export type ChangeEventType = 'created' | 'modified' | 'deleted' | 'moved';

/**
 * Entry of the pending change set (last write wins per path)
 */
export interface PendingChange {
  path: string;
  eventType: ChangeEventType;
  /** Epoch milliseconds */
  timestamp: number;
}

/**
 * Change monitor tuning
 */
export interface MonitorConfig {
  /** Pending change count that triggers a snapshot */
  autoSnapshotThreshold: number;

  /** Max wall-clock gap between auto snapshots (ms) */
  autoSnapshotIntervalMs: number;

  /** Quiet period required after the last event (ms) */
  debounceMs: number;

  /** Glob patterns whose matches are never recorded */
  ignorePatterns: string[];

  /** Evaluation loop period (ms) */
  tickMs: number;
}

/**
 * Why the coalescer decided to snapshot
 */
export type TriggerReason = 'threshold' | 'initial' | 'interval' | 'manual';

/**
 * Backup engine contract.
 *
 * The engine owns chunking, deduplication, encryption and storage. Everything
 * in snaptrail talks to it through this interface only.
 */

import type { SnapshotStats } from './types.js';

/**
 * Snapshot as listed by the engine
 */
export interface EngineSnapshot {
  /** Full identifier */
  id: string;
  /** Abbreviated identifier, when the engine has one */
  shortId?: string;
  time: Date;
  tags: string[];
  paths: string[];
  hostname?: string;
  username?: string;
  /** Parent as recorded by the engine itself (not snaptrail lineage) */
  parent?: string;
}

export interface CreateSnapshotRequest {
  paths: string[];
  tags: string[];
  excludes: string[];
  includes: string[];
  /** Receives engine progress payloads while the backup runs */
  onProgress?: (progress: BackupProgress) => void;
}

export interface CreateSnapshotResult {
  snapshotId: string;
  stats: SnapshotStats;
}

/**
 * Progress payload streamed during a backup
 */
export interface BackupProgress {
  percentDone: number;
  filesDone: number;
  totalFiles: number;
  bytesDone: number;
  totalBytes: number;
  currentFiles: string[];
}

export interface RestoreRequest {
  /** Only restore these paths */
  paths?: string[];
  include?: string[];
  exclude?: string[];
  verify?: boolean;
}

export interface SnapshotDiffResult {
  added: string[];
  removed: string[];
  modified: string[];
}

/**
 * Policy parameters in engine terms (only buckets that are set)
 */
export interface EngineRetentionArgs {
  last?: number;
  hourly?: number;
  daily?: number;
  weekly?: number;
  monthly?: number;
  yearly?: number;
}

export interface ForgetOptions {
  dryRun: boolean;
  prune?: boolean;
}

export interface RepositoryStats {
  totalSize: number;
  totalFileCount: number;
  snapshotsCount?: number;
}

export interface BackupEngine {
  /** Repository location (for status output) */
  readonly repository: string;

  /** Initialize the repository if it does not exist yet */
  ensureRepository(): Promise<void>;

  createSnapshot(request: CreateSnapshotRequest): Promise<CreateSnapshotResult>;

  restoreSnapshot(snapshotId: string, target: string, request?: RestoreRequest): Promise<void>;

  /** Ordered oldest -> newest */
  listSnapshots(): Promise<EngineSnapshot[]>;

  diffSnapshots(from: string, to: string): Promise<SnapshotDiffResult>;

  /** Returns the identifiers removed (or that would be removed, on dry run) */
  forgetByPolicy(args: EngineRetentionArgs, options: ForgetOptions): Promise<string[]>;

  /** Forget explicit snapshots; returns the identifiers removed */
  forgetSnapshots(snapshotIds: string[], options: ForgetOptions): Promise<string[]>;

  repoStats(): Promise<RepositoryStats>;

  checkHealth(): Promise<boolean>;

  /** Newest snapshot carrying `tag`, if any */
  resolveKnownTag(tag: string): Promise<string | undefined>;
}

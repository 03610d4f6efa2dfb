/**
 * Backup Orchestrator - the foreground API over engine, metadata and retention
 */

import * as fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import * as os from 'node:os';
import {
  MESSAGE_TAG_PREFIX,
  METADATA_DEFAULTS,
  SnapshotRefError,
  StorageError,
  ValidationError,
  noopLogger,
  toError,
  toErrorMessage,
} from '@snaptrail/snapshot-contracts';
import type {
  BackupEngine,
  BackupProgress,
  EngineSnapshot,
  FileChange,
  ILogger,
  RetentionPolicy,
  SnapshotMetadata,
  SnapshotStats,
} from '@snaptrail/snapshot-contracts';
import { diffFileChanges } from '@snaptrail/snapshot-history';
import type { MetadataStore, RecentQuery } from '@snaptrail/snapshot-history';
import { looksLikeSnapshotId, normalizeSnapshotId, resolveSnapshotRef } from './ref-resolver.js';
import { RetentionEngine } from './retention.js';
import { SerialQueue } from './utils/serial-queue.js';

// ═══════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════

export interface OrchestratorConfig {
  sourcePaths: string[];
  exclude: string[];
  include: string[];
  retention: RetentionPolicy;
  /** Age limit used by cleanupMetadata() */
  retainDays?: number;
}

export interface BackupOrchestratorOptions {
  engine: BackupEngine;
  store: MetadataStore;
  config: OrchestratorConfig;
  logger?: ILogger;
  /** Recorded as the author of new snapshots; default: OS user name */
  author?: string;
  /** Epoch milliseconds */
  clock?: () => number;
}

export interface SnapshotOptions {
  message?: string;
  tags?: string[];
  /** Check that every source path exists and is readable first (default true) */
  validateSources?: boolean;
  onProgress?: (progress: BackupProgress) => void;
}

export interface SnapshotResult {
  snapshotId: string;
  stats: SnapshotStats;
  parentSnapshot?: string;
  fileChanges: FileChange[];
}

export interface RestoreOptions {
  /** Only restore these paths */
  paths?: string[];
  include?: string[];
  exclude?: string[];
  /** Default true */
  verify?: boolean;
  /** Allow restoring into a non-empty directory */
  overwrite?: boolean;
}

export interface ForgetRequest {
  /** Explicit refs; without them the retention policy decides */
  refs?: string[];
  dryRun?: boolean;
}

export interface ForgetResult {
  dryRun: boolean;
  removed: string[];
}

/**
 * Anything that can report the number of pending (unsnapshotted) changes
 */
export interface PendingChangeSource {
  readonly pendingCount: number;
}

export interface RecentSnapshotSummary {
  id: string;
  message?: string;
  timestamp: Date;
  author: string;
}

export interface BackupStatus {
  repository: string;
  healthy: boolean;
  totalSnapshots: number;
  repositorySize: number;
  lastSnapshotTime?: Date;
  pendingChanges: number;
  /** Where pendingChanges came from */
  pendingSource: 'monitor' | 'engine-diff';
  sourcePaths: string[];
  recentSnapshots: RecentSnapshotSummary[];
}

function defaultAuthor(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env['USER'] ?? process.env['USERNAME'] ?? 'unknown';
  }
}

function splitMessageTag(tags: string[]): { message?: string; tags: string[] } {
  const rest: string[] = [];
  let message: string | undefined;
  for (const tag of tags) {
    if (tag.startsWith(MESSAGE_TAG_PREFIX)) {
      message ??= tag.slice(MESSAGE_TAG_PREFIX.length);
    } else {
      rest.push(tag);
    }
  }
  return message === undefined ? { tags: rest } : { message, tags: rest };
}

/** Length of a full restic id; metadata is keyed by it */
const FULL_ID_LENGTH = 64;

function isSameSnapshot(entry: EngineSnapshot, snapshotId: string): boolean {
  return entry.id === snapshotId || entry.shortId === snapshotId || entry.id.startsWith(snapshotId);
}

// ═══════════════════════════════════════════════════════════════════════
// BackupOrchestrator
// ═══════════════════════════════════════════════════════════════════════

/**
 * Backup Orchestrator
 *
 * Snapshot, forget and rescan go through one serial queue, so at most one
 * repository-mutating engine call is in flight per orchestrator.
 */
export class BackupOrchestrator {
  private readonly engine: BackupEngine;
  private readonly store: MetadataStore;
  private readonly config: OrchestratorConfig;
  private readonly logger: ILogger;
  private readonly author: string;
  private readonly clock: () => number;
  private readonly queue = new SerialQueue();
  readonly retention: RetentionEngine;
  private pendingSource?: PendingChangeSource;

  constructor(options: BackupOrchestratorOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    this.author = options.author ?? defaultAuthor();
    this.clock = options.clock ?? Date.now;
    this.retention = new RetentionEngine(this.engine, this.store, this.logger);
  }

  /**
   * Create a snapshot of the configured sources and record its metadata
   */
  async snapshot(options: SnapshotOptions = {}): Promise<SnapshotResult> {
    if (options.validateSources ?? true) {
      await this.validateSources();
    }
    return this.queue.run(() => this.createSnapshot(options));
  }

  /**
   * Recent snapshot records, newest first
   */
  async log(query: RecentQuery = {}): Promise<SnapshotMetadata[]> {
    this.logger.debug(`Retrieving ${query.limit ?? METADATA_DEFAULTS.recentLimit} recent snapshots`);
    return this.store.getRecent(query);
  }

  /**
   * Metadata of the snapshot `ref` points to; null when it has none
   */
  async show(ref = 'latest'): Promise<SnapshotMetadata | null> {
    const snapshotId = await this.resolveFullId(ref);
    return this.store.get(snapshotId);
  }

  /**
   * Metadata-level diff between two refs
   */
  async diff(ref1 = 'HEAD~1', ref2 = 'HEAD'): Promise<FileChange[]> {
    const [from, to] = await Promise.all([this.showIfExists(ref1), this.showIfExists(ref2)]);
    if (!from || !to) {
      this.logger.warn('One or both snapshots not found', { ref1, ref2 });
      return [];
    }
    return diffFileChanges(from.fileChanges, to.fileChanges);
  }

  async search(query: string, limit: number = METADATA_DEFAULTS.searchLimit): Promise<SnapshotMetadata[]> {
    return this.store.search(query, limit);
  }

  /**
   * Restore `ref` into `target`.
   * A non-empty target is refused unless overwrite is set.
   */
  async restore(ref: string, target: string, options: RestoreOptions = {}): Promise<{ snapshotId: string; target: string }> {
    await this.checkRestoreTarget(target, options.overwrite ?? false);

    const snapshotId = await resolveSnapshotRef(this.engine, ref);
    await fs.mkdir(target, { recursive: true });
    this.logger.info(`Restoring snapshot ${snapshotId} to ${target}`);

    await this.engine.restoreSnapshot(snapshotId, target, {
      paths: options.paths,
      include: options.include,
      exclude: options.exclude,
      verify: options.verify ?? true,
    });

    this.logger.info(`Successfully restored snapshot ${snapshotId}`);
    return { snapshotId, target };
  }

  /**
   * Forget explicit refs, or apply the retention policy when none are given
   */
  async forget(request: ForgetRequest = {}): Promise<ForgetResult> {
    const dryRun = request.dryRun ?? false;
    const refs = request.refs ?? [];

    return this.queue.run(async () => {
      if (refs.length === 0) {
        const result = await this.retention.apply(this.config.retention, { dryRun });
        return { dryRun, removed: result.removed };
      }

      const ids: string[] = [];
      for (const ref of refs) {
        const snapshotId = await this.resolveFullId(ref);
        if (!ids.includes(snapshotId)) {
          ids.push(snapshotId);
        }
      }
      if (dryRun) {
        return { dryRun, removed: ids };
      }

      const removed = await this.engine.forgetSnapshots(ids, { dryRun: false, prune: true });
      for (const snapshotId of removed) {
        try {
          await this.store.delete(snapshotId);
        } catch (error) {
          this.logger.warn('Snapshot forgotten but metadata delete failed', {
            snapshotId,
            error: toErrorMessage(error),
          });
        }
      }
      this.logger.info(`Forgot ${removed.length} snapshots`);
      return { dryRun, removed };
    });
  }

  /**
   * Repository overview for status output
   */
  async status(): Promise<BackupStatus> {
    const listing = await this.settle(this.engine.listSnapshots(), [], 'list snapshots');
    const [healthy, stats, recent] = await Promise.all([
      this.engine.checkHealth(),
      this.settle(this.engine.repoStats(), { totalSize: 0, totalFileCount: 0 }, 'read repository stats'),
      this.store.getRecent({ limit: 5 }),
    ]);

    let pendingChanges: number;
    let pendingSource: BackupStatus['pendingSource'];
    if (this.pendingSource) {
      pendingChanges = this.pendingSource.pendingCount;
      pendingSource = 'monitor';
    } else {
      pendingChanges = (await this.detectChanges(listing)).length;
      pendingSource = 'engine-diff';
    }

    const status: BackupStatus = {
      repository: this.engine.repository,
      healthy,
      totalSnapshots: listing.length,
      repositorySize: stats.totalSize,
      pendingChanges,
      pendingSource,
      sourcePaths: [...this.config.sourcePaths],
      recentSnapshots: recent.map((record) => {
        const summary: RecentSnapshotSummary = {
          id: record.snapshotId.slice(0, 8),
          timestamp: record.timestamp,
          author: record.author,
        };
        if (record.message !== undefined) {
          summary.message = record.message;
        }
        return summary;
      }),
    };
    const last = recent[0];
    if (last) {
      status.lastSnapshotTime = last.timestamp;
    }
    return status;
  }

  /**
   * Recreate metadata for engine snapshots that have none (e.g. after a failed save).
   * Returns the recovered ids, oldest first.
   */
  async rescan(): Promise<string[]> {
    return this.queue.run(async () => {
      const listing = await this.engine.listSnapshots();
      const known = new Set(await this.store.listIds());
      const recovered: string[] = [];

      for (const [index, entry] of listing.entries()) {
        if (known.has(entry.id)) {
          continue;
        }
        const { message, tags } = splitMessageTag(entry.tags);
        const metadata: SnapshotMetadata = {
          snapshotId: entry.id,
          timestamp: entry.time,
          author: entry.username ?? this.author,
          tags,
          stats: {},
          fileChanges: [],
        };
        if (message !== undefined) {
          metadata.message = message;
        }
        const parent = listing[index - 1];
        if (parent) {
          metadata.parentSnapshot = parent.id;
        }

        await this.store.save(metadata);
        recovered.push(entry.id);
      }

      if (recovered.length > 0) {
        this.logger.info(`Recovered metadata for ${recovered.length} snapshots`);
      }
      return recovered;
    });
  }

  /**
   * Drop metadata of snapshots the engine no longer has
   */
  async reconcile(): Promise<string[]> {
    return this.queue.run(() => this.retention.reconcile());
  }

  async cleanupMetadata(): Promise<number> {
    return this.store.cleanup(this.config.retainDays ?? METADATA_DEFAULTS.retainDays);
  }

  /**
   * Use a monitor's pending count in status(); pass undefined to detach
   */
  attachMonitor(source: PendingChangeSource | undefined): void {
    this.pendingSource = source;
  }

  /**
   * Time of the newest recorded auto snapshot (seed for the change coalescer)
   */
  async lastAutoSnapshotTime(): Promise<Date | undefined> {
    const [latest] = await this.store.getRecent({ limit: 1, tags: ['auto'] });
    return latest?.timestamp;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  private async createSnapshot(options: SnapshotOptions): Promise<SnapshotResult> {
    const started = this.clock();
    const tags = [...(options.tags ?? [])];
    const engineTags = options.message ? [...tags, `${MESSAGE_TAG_PREFIX}${options.message}`] : tags;

    this.logger.info(`Creating snapshot for ${this.config.sourcePaths.length} paths`);
    let created: { snapshotId: string; stats: SnapshotStats };
    try {
      created = await this.engine.createSnapshot({
        paths: this.config.sourcePaths,
        tags: engineTags,
        excludes: this.config.exclude,
        includes: this.config.include,
        onProgress: options.onProgress,
      });
    } catch (error) {
      this.logger.error('Snapshot creation failed', toError(error));
      throw error;
    }
    const { snapshotId } = created;

    const listing = await this.settle(this.engine.listSnapshots(), [], 'list snapshots');
    const parentSnapshot = this.findParent(listing, snapshotId);
    const fileChanges = await this.detectChanges(listing);

    const finished = this.clock();
    const durationSeconds = (finished - started) / 1000;
    const stats: SnapshotStats = { ...created.stats, durationSeconds };
    const metadata: SnapshotMetadata = {
      snapshotId,
      timestamp: new Date(finished),
      author: this.author,
      tags,
      stats,
      fileChanges,
    };
    if (options.message) {
      metadata.message = options.message;
    }
    if (parentSnapshot) {
      metadata.parentSnapshot = parentSnapshot;
    }

    try {
      await this.store.save(metadata);
    } catch (error) {
      throw new StorageError(
        `Snapshot ${snapshotId} was created but its metadata could not be saved; run rescan to recover it`,
        { cause: error, details: { snapshotId, orphaned: true } }
      );
    }

    this.logger.info(`Snapshot ${snapshotId} created successfully in ${durationSeconds.toFixed(2)}s`, {
      fileChanges: fileChanges.length,
    });

    const result: SnapshotResult = { snapshotId, stats, fileChanges };
    if (parentSnapshot) {
      result.parentSnapshot = parentSnapshot;
    }
    return result;
  }

  /**
   * The entry listed immediately before the new snapshot
   */
  private findParent(listing: EngineSnapshot[], snapshotId: string): string | undefined {
    const index = listing.findIndex((entry) => isSameSnapshot(entry, snapshotId));
    if (index > 0) {
      return listing[index - 1]?.id;
    }
    if (index === 0) {
      return undefined;
    }
    // not listed (yet): the newest other entry is the best guess
    const newest = listing[listing.length - 1];
    return newest && !isSameSnapshot(newest, snapshotId) ? newest.id : undefined;
  }

  /**
   * Changes between the two most recent snapshots of the listing
   */
  private async detectChanges(listing: EngineSnapshot[]): Promise<FileChange[]> {
    if (listing.length < 2) {
      this.logger.debug('Fewer than two snapshots - skipping change detection');
      return [];
    }
    const previous = listing[listing.length - 2];
    const latest = listing[listing.length - 1];
    if (!previous || !latest) {
      return [];
    }

    try {
      const diff = await this.engine.diffSnapshots(previous.id, latest.id);
      this.logger.debug(
        `Change detection: ${diff.added.length} added, ${diff.removed.length} removed, ${diff.modified.length} modified`
      );
      return [
        ...diff.added.map((p): FileChange => ({ path: p, changeType: 'added' })),
        ...diff.removed.map((p): FileChange => ({ path: p, changeType: 'deleted' })),
        ...diff.modified.map((p): FileChange => ({ path: p, changeType: 'modified' })),
      ];
    } catch (error) {
      this.logger.warn('Change detection failed', { error: toErrorMessage(error) });
      return [];
    }
  }

  private async validateSources(): Promise<void> {
    for (const sourcePath of this.config.sourcePaths) {
      try {
        await fs.access(sourcePath, fsConstants.F_OK);
      } catch (error) {
        throw new ValidationError(`Source path does not exist: ${sourcePath}`, {
          cause: error,
          details: { path: sourcePath },
        });
      }
      try {
        await fs.access(sourcePath, fsConstants.R_OK);
      } catch (error) {
        throw new ValidationError(`Cannot read source path: ${sourcePath}`, {
          cause: error,
          details: { path: sourcePath },
        });
      }
    }
  }

  /**
   * Resolve `ref` to the id the metadata store is keyed by.
   * Abbreviated ids are expanded through the engine listing.
   */
  private async resolveFullId(ref: string): Promise<string> {
    const snapshotId = await resolveSnapshotRef(this.engine, ref);
    if (!looksLikeSnapshotId(snapshotId) || snapshotId.length === FULL_ID_LENGTH) {
      return snapshotId;
    }
    return normalizeSnapshotId(snapshotId, await this.engine.listSnapshots());
  }

  /**
   * Existing targets must be empty directories unless overwrite is set
   */
  private async checkRestoreTarget(target: string, overwrite: boolean): Promise<void> {
    let entries: string[] | undefined;
    try {
      entries = await fs.readdir(target);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw new ValidationError(`Restore target is not a usable directory: ${target}`, {
          cause: error,
          details: { target },
        });
      }
    }

    if (entries && entries.length > 0 && !overwrite) {
      throw new ValidationError(`Target directory ${target} is not empty. Use overwrite to force.`, {
        details: { target },
      });
    }
  }

  private async showIfExists(ref: string): Promise<SnapshotMetadata | null> {
    try {
      return await this.show(ref);
    } catch (error) {
      if (error instanceof SnapshotRefError && error.reason === 'not-found') {
        return null;
      }
      throw error;
    }
  }

  private async settle<T>(promise: Promise<T>, fallback: T, what: string): Promise<T> {
    try {
      return await promise;
    } catch (error) {
      this.logger.warn(`Failed to ${what}`, { error: toErrorMessage(error) });
      return fallback;
    }
  }
}

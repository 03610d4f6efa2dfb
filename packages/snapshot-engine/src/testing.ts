/**
 * In-process BackupEngine for tests and dry runs.
 *
 * Keeps a mutable working tree (path -> content) and captures a copy of it
 * on every createSnapshot(). Retention follows restic's bucket rules on UTC
 * calendar boundaries.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { EngineError } from '@snaptrail/snapshot-contracts';
import type {
  BackupEngine,
  CreateSnapshotRequest,
  CreateSnapshotResult,
  EngineRetentionArgs,
  EngineSnapshot,
  ForgetOptions,
  RepositoryStats,
  RestoreRequest,
  SnapshotDiffResult,
} from '@snaptrail/snapshot-contracts';

export type EngineOperation =
  | 'createSnapshot'
  | 'restoreSnapshot'
  | 'listSnapshots'
  | 'diffSnapshots'
  | 'forgetByPolicy'
  | 'forgetSnapshots'
  | 'repoStats'
  | 'resolveKnownTag';

export interface InMemoryBackupEngineOptions {
  repository?: string;
  /** Clock for snapshot times; epoch milliseconds */
  now?: () => number;
}

export interface RecordedRestore {
  snapshotId: string;
  target: string;
  request: RestoreRequest;
}

interface StoredSnapshot {
  snapshot: EngineSnapshot;
  files: Map<string, string>;
  sequence: number;
}

type BucketKey = (time: Date) => string;

const pad = (value: number): string => String(value).padStart(2, '0');

function isoWeek(time: Date): string {
  const day = new Date(Date.UTC(time.getUTCFullYear(), time.getUTCMonth(), time.getUTCDate()));
  const weekday = day.getUTCDay() || 7;
  day.setUTCDate(day.getUTCDate() + 4 - weekday);
  const yearStart = Date.UTC(day.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((day.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return `${day.getUTCFullYear()}-W${pad(week)}`;
}

const BUCKETS: Array<[Exclude<keyof EngineRetentionArgs, 'last'>, BucketKey]> = [
  ['hourly', (t) => `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}T${pad(t.getUTCHours())}`],
  ['daily', (t) => `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}`],
  ['weekly', isoWeek],
  ['monthly', (t) => `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}`],
  ['yearly', (t) => String(t.getUTCFullYear())],
];

function matchesPrefix(filePath: string, prefixes: string[]): boolean {
  return prefixes.some((prefix) => {
    const normalized = prefix.replace(/^\/+|\/+$/g, '');
    return filePath === normalized || filePath.startsWith(`${normalized}/`);
  });
}

/**
 * In-Memory Backup Engine
 */
export class InMemoryBackupEngine implements BackupEngine {
  readonly repository: string;
  /** Value returned by checkHealth() */
  healthy = true;
  initialized = false;
  readonly restores: RecordedRestore[] = [];
  lastCreateRequest?: CreateSnapshotRequest;

  private readonly now: () => number;
  private readonly workingTree = new Map<string, string>();
  private stored: StoredSnapshot[] = [];
  private readonly failures = new Map<EngineOperation, Error[]>();
  private sequence = 0;

  constructor(options: InMemoryBackupEngineOptions = {}) {
    this.repository = options.repository ?? 'memory://snaptrail-test';
    this.now = options.now ?? Date.now;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Test controls
  // ═══════════════════════════════════════════════════════════════════════

  writeFile(filePath: string, content: string): void {
    this.workingTree.set(filePath, content);
  }

  removeFile(filePath: string): void {
    this.workingTree.delete(filePath);
  }

  /**
   * Make the next call of `operation` reject with `error`
   */
  failNext(operation: EngineOperation, error: Error = new EngineError(`Injected ${operation} failure`)): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push(error);
    this.failures.set(operation, queue);
  }

  get snapshotCount(): number {
    return this.stored.length;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BackupEngine
  // ═══════════════════════════════════════════════════════════════════════

  async ensureRepository(): Promise<void> {
    this.initialized = true;
  }

  async createSnapshot(request: CreateSnapshotRequest): Promise<CreateSnapshotResult> {
    this.throwIfFailing('createSnapshot');
    this.lastCreateRequest = request;

    this.sequence += 1;
    const id = crypto.createHash('sha256').update(`${this.repository}#${this.sequence}`).digest('hex');
    const files = new Map(this.workingTree);
    const previous = this.stored[this.stored.length - 1]?.files ?? new Map<string, string>();

    let filesNew = 0;
    let filesChanged = 0;
    let dataAdded = 0;
    let totalBytes = 0;
    for (const [filePath, content] of files) {
      const size = Buffer.byteLength(content);
      totalBytes += size;
      const before = previous.get(filePath);
      if (before === undefined) {
        filesNew += 1;
        dataAdded += size;
      } else if (before !== content) {
        filesChanged += 1;
        dataAdded += size;
      }
    }

    this.stored.push({
      snapshot: {
        id,
        shortId: id.slice(0, 8),
        time: new Date(this.now()),
        tags: [...request.tags],
        paths: [...request.paths],
      },
      files,
      sequence: this.sequence,
    });

    request.onProgress?.({
      percentDone: 1,
      filesDone: files.size,
      totalFiles: files.size,
      bytesDone: totalBytes,
      totalBytes,
      currentFiles: [],
    });

    return {
      snapshotId: id,
      stats: {
        filesNew,
        filesChanged,
        filesUnmodified: files.size - filesNew - filesChanged,
        dirsNew: 0,
        dirsChanged: 0,
        dirsUnmodified: 0,
        dataAdded,
        totalFilesProcessed: files.size,
        totalBytesProcessed: totalBytes,
        durationSeconds: 0,
      },
    };
  }

  async restoreSnapshot(snapshotId: string, target: string, request: RestoreRequest = {}): Promise<void> {
    this.throwIfFailing('restoreSnapshot');
    const stored = this.find(snapshotId);
    const selected = [...(request.paths ?? []), ...(request.include ?? [])];
    const excluded = request.exclude ?? [];

    for (const [filePath, content] of stored.files) {
      if (selected.length > 0 && !matchesPrefix(filePath, selected)) {
        continue;
      }
      if (matchesPrefix(filePath, excluded)) {
        continue;
      }
      const destination = path.join(target, filePath);
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, content, 'utf-8');
    }

    this.restores.push({ snapshotId: stored.snapshot.id, target, request });
  }

  async listSnapshots(): Promise<EngineSnapshot[]> {
    this.throwIfFailing('listSnapshots');
    return this.ordered().map((entry) => ({
      ...entry.snapshot,
      tags: [...entry.snapshot.tags],
      paths: [...entry.snapshot.paths],
    }));
  }

  async diffSnapshots(from: string, to: string): Promise<SnapshotDiffResult> {
    this.throwIfFailing('diffSnapshots');
    const before = this.find(from).files;
    const after = this.find(to).files;
    const diff: SnapshotDiffResult = { added: [], removed: [], modified: [] };

    for (const [filePath, content] of after) {
      const previous = before.get(filePath);
      if (previous === undefined) {
        diff.added.push(filePath);
      } else if (previous !== content) {
        diff.modified.push(filePath);
      }
    }
    for (const filePath of before.keys()) {
      if (!after.has(filePath)) {
        diff.removed.push(filePath);
      }
    }

    diff.added.sort();
    diff.removed.sort();
    diff.modified.sort();
    return diff;
  }

  async forgetByPolicy(args: EngineRetentionArgs, options: ForgetOptions): Promise<string[]> {
    this.throwIfFailing('forgetByPolicy');
    const newestFirst = this.ordered().reverse();
    const keep = new Set<string>();

    let remainingLast = args.last ?? 0;
    for (const entry of newestFirst) {
      if (remainingLast <= 0) {
        break;
      }
      keep.add(entry.snapshot.id);
      remainingLast -= 1;
    }

    for (const [bucket, keyOf] of BUCKETS) {
      let remaining = args[bucket] ?? 0;
      let lastKey: string | undefined;
      for (const entry of newestFirst) {
        if (remaining <= 0) {
          break;
        }
        const key = keyOf(entry.snapshot.time);
        if (key !== lastKey) {
          keep.add(entry.snapshot.id);
          lastKey = key;
          remaining -= 1;
        }
      }
    }

    const removed = this.ordered()
      .filter((entry) => !keep.has(entry.snapshot.id))
      .map((entry) => entry.snapshot.id);

    if (!options.dryRun) {
      this.stored = this.stored.filter((entry) => keep.has(entry.snapshot.id));
    }
    return removed;
  }

  async forgetSnapshots(snapshotIds: string[], options: ForgetOptions): Promise<string[]> {
    this.throwIfFailing('forgetSnapshots');
    const targets = snapshotIds.map((id) => this.find(id).snapshot.id);

    if (!options.dryRun) {
      const doomed = new Set(targets);
      this.stored = this.stored.filter((entry) => !doomed.has(entry.snapshot.id));
    }
    return targets;
  }

  async repoStats(): Promise<RepositoryStats> {
    this.throwIfFailing('repoStats');
    const blobs = new Set<string>();
    let totalFileCount = 0;
    for (const entry of this.stored) {
      totalFileCount += entry.files.size;
      for (const content of entry.files.values()) {
        blobs.add(content);
      }
    }

    let totalSize = 0;
    for (const blob of blobs) {
      totalSize += Buffer.byteLength(blob);
    }
    return { totalSize, totalFileCount, snapshotsCount: this.stored.length };
  }

  async checkHealth(): Promise<boolean> {
    return this.healthy;
  }

  async resolveKnownTag(tag: string): Promise<string | undefined> {
    this.throwIfFailing('resolveKnownTag');
    const tagged = this.ordered().filter((entry) => entry.snapshot.tags.includes(tag));
    return tagged[tagged.length - 1]?.snapshot.id;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  private ordered(): StoredSnapshot[] {
    return [...this.stored].sort(
      (a, b) => a.snapshot.time.getTime() - b.snapshot.time.getTime() || a.sequence - b.sequence
    );
  }

  private find(ref: string): StoredSnapshot {
    const found = this.stored.find((entry) => entry.snapshot.id === ref || entry.snapshot.shortId === ref);
    if (!found) {
      throw new EngineError(`Snapshot ${ref} not found`, { details: { snapshotId: ref } });
    }
    return found;
  }

  private throwIfFailing(operation: EngineOperation): void {
    const error = this.failures.get(operation)?.shift();
    if (error) {
      throw error;
    }
  }
}

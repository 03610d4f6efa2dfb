/**
 * Change Coalescer - folds bursts of filesystem events into snapshot requests
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import ignore from 'ignore';
import {
  DEFAULT_MONITOR_CONFIG,
  InvalidStateError,
  noopLogger,
  toError,
} from '@snaptrail/snapshot-contracts';
import type {
  ChangeEventType,
  ILogger,
  MonitorConfig,
  PendingChange,
  TriggerReason,
} from '@snaptrail/snapshot-contracts';

export interface SnapshotSinkRequest {
  message: string;
  tags: string[];
  validateSources: boolean;
}

/**
 * Whatever actually takes the snapshot (normally BackupOrchestrator.snapshot)
 */
export type SnapshotSink = (request: SnapshotSinkRequest) => Promise<{ snapshotId: string }>;

export type CoalescerState = 'idle' | 'accumulating' | 'evaluating';

export type EvaluationOutcome =
  | { outcome: 'idle' }
  | { outcome: 'busy' }
  | { outcome: 'debouncing'; remainingMs: number }
  | { outcome: 'no-trigger' }
  | { outcome: 'snapshot'; reason: TriggerReason; snapshotId: string; changeCount: number }
  | { outcome: 'failed'; reason: TriggerReason; error: Error };

export interface CoalescerStatus {
  state: CoalescerState;
  pendingChanges: number;
  lastChangeTime?: Date;
  lastAutoSnapshotTime?: Date;
  config: Pick<MonitorConfig, 'autoSnapshotThreshold' | 'autoSnapshotIntervalMs' | 'debounceMs'>;
}

export interface ChangeCoalescerOptions {
  sink: SnapshotSink;
  config?: Partial<MonitorConfig>;
  /** Watched roots; ignore patterns are matched relative to these */
  roots?: string[];
  /** Epoch milliseconds */
  clock?: () => number;
  logger?: ILogger;
  /** Seed for restarts, so a fresh process does not fire an "initial" snapshot */
  lastAutoSnapshotTime?: Date;
}

interface PendingEntry {
  eventType: ChangeEventType;
  timestamp: number;
  sequence: number;
}

const SUMMARY_PARTS: Array<[ChangeEventType, string]> = [
  ['created', 'added'],
  ['modified', 'modified'],
  ['deleted', 'deleted'],
  ['moved', 'moved'],
];

/**
 * Change Coalescer
 *
 * Idle -> Accumulating on the first recorded change. Each evaluate() call
 * waits out the debounce window, then checks threshold, initial and interval
 * triggers in that order. Only entries recorded before the trigger are cleared
 * after a successful snapshot; a failed one leaves everything pending.
 *
 * Events:
 * - 'change:recorded' (PendingChange)
 * - 'snapshot:created' ({ snapshotId, reason, changeCount })
 * - 'snapshot:failed' ({ reason, error })
 */
export class ChangeCoalescer extends EventEmitter {
  private readonly config: MonitorConfig;
  private readonly sink: SnapshotSink;
  private readonly roots: string[];
  private readonly clock: () => number;
  private readonly logger: ILogger;
  private readonly matcher: ReturnType<typeof ignore>;

  private readonly pending = new Map<string, PendingEntry>();
  private sequence = 0;
  private lastChangeTime?: number;
  private lastAutoSnapshotTime?: number;
  private evaluating = false;

  constructor(options: ChangeCoalescerOptions) {
    super();
    this.config = { ...DEFAULT_MONITOR_CONFIG, ...options.config };
    this.sink = options.sink;
    this.roots = (options.roots ?? []).map((root) => path.resolve(root));
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? noopLogger;
    this.matcher = ignore().add(this.config.ignorePatterns);
    this.lastAutoSnapshotTime = options.lastAutoSnapshotTime?.getTime();
  }

  get state(): CoalescerState {
    if (this.evaluating) {
      return 'evaluating';
    }
    return this.pending.size > 0 ? 'accumulating' : 'idle';
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Record one filesystem event. Returns false when the path is ignored.
   */
  recordChange(filePath: string, eventType: ChangeEventType): boolean {
    if (this.isIgnored(filePath)) {
      this.logger.debug(`Ignoring ${eventType} event for ${filePath}`);
      return false;
    }

    const now = this.clock();
    this.sequence += 1;
    this.pending.set(filePath, { eventType, timestamp: now, sequence: this.sequence });
    this.lastChangeTime = now;

    const change: PendingChange = { path: filePath, eventType, timestamp: now };
    this.emit('change:recorded', change);
    return true;
  }

  /**
   * Whether ignore patterns exclude the path (gitignore rules, plus a plain basename match)
   */
  isIgnored(filePath: string): boolean {
    const base = path.basename(filePath);
    if (base.length > 0 && this.matcher.ignores(base)) {
      return true;
    }
    const relative = this.relativeToRoot(filePath);
    return relative !== undefined && this.matcher.ignores(relative);
  }

  /**
   * One pass of the trigger state machine
   */
  async evaluate(): Promise<EvaluationOutcome> {
    if (this.pending.size === 0 || this.lastChangeTime === undefined) {
      return { outcome: 'idle' };
    }
    if (this.evaluating) {
      return { outcome: 'busy' };
    }

    const now = this.clock();
    const quietFor = now - this.lastChangeTime;
    if (quietFor < this.config.debounceMs) {
      return { outcome: 'debouncing', remainingMs: this.config.debounceMs - quietFor };
    }

    const reason = this.pickTrigger(now);
    if (!reason) {
      return { outcome: 'no-trigger' };
    }

    const message = `Auto snapshot: ${this.summarize()} (${this.describeReason(reason, now)})`;
    this.logger.info(`Creating auto snapshot: ${message}`);
    return this.takeSnapshot(reason, message, ['auto', 'monitor']);
  }

  /**
   * Snapshot now, regardless of debounce and thresholds
   */
  async forceSnapshot(message?: string): Promise<string> {
    if (this.pending.size === 0) {
      throw new InvalidStateError('No pending changes to snapshot');
    }

    const result = await this.takeSnapshot(
      'manual',
      message ?? `Manual snapshot: ${this.summarize()}`,
      ['manual', 'monitor']
    );
    if (result.outcome === 'failed') {
      throw result.error;
    }
    if (result.outcome !== 'snapshot') {
      throw new InvalidStateError('A snapshot is already in progress');
    }
    return result.snapshotId;
  }

  /**
   * e.g. "3 added, 1 deleted"
   */
  summarize(): string {
    if (this.pending.size === 0) {
      return 'no changes';
    }

    const counts = new Map<ChangeEventType, number>();
    for (const entry of this.pending.values()) {
      counts.set(entry.eventType, (counts.get(entry.eventType) ?? 0) + 1);
    }

    const parts = SUMMARY_PARTS.filter(([type]) => (counts.get(type) ?? 0) > 0).map(
      ([type, label]) => `${counts.get(type)} ${label}`
    );
    return parts.length > 0 ? parts.join(', ') : `${this.pending.size} changes`;
  }

  getPendingChanges(): PendingChange[] {
    return [...this.pending].map(([filePath, entry]) => ({
      path: filePath,
      eventType: entry.eventType,
      timestamp: entry.timestamp,
    }));
  }

  clearPendingChanges(): void {
    this.pending.clear();
    this.lastChangeTime = undefined;
  }

  /**
   * Adopt a previous auto snapshot time if it is newer than the one we know
   */
  seedLastAutoSnapshot(time: Date): void {
    const value = time.getTime();
    if (this.lastAutoSnapshotTime === undefined || value > this.lastAutoSnapshotTime) {
      this.lastAutoSnapshotTime = value;
    }
  }

  getStatus(): CoalescerStatus {
    const status: CoalescerStatus = {
      state: this.state,
      pendingChanges: this.pending.size,
      config: {
        autoSnapshotThreshold: this.config.autoSnapshotThreshold,
        autoSnapshotIntervalMs: this.config.autoSnapshotIntervalMs,
        debounceMs: this.config.debounceMs,
      },
    };
    if (this.lastChangeTime !== undefined) {
      status.lastChangeTime = new Date(this.lastChangeTime);
    }
    if (this.lastAutoSnapshotTime !== undefined) {
      status.lastAutoSnapshotTime = new Date(this.lastAutoSnapshotTime);
    }
    return status;
  }

  get tickMs(): number {
    return this.config.tickMs;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  private pickTrigger(now: number): TriggerReason | undefined {
    if (this.pending.size >= this.config.autoSnapshotThreshold) {
      return 'threshold';
    }
    if (this.lastAutoSnapshotTime === undefined) {
      return 'initial';
    }
    if (now - this.lastAutoSnapshotTime >= this.config.autoSnapshotIntervalMs) {
      return 'interval';
    }
    return undefined;
  }

  private describeReason(reason: TriggerReason, now: number): string {
    switch (reason) {
      case 'threshold':
        return `change threshold (${this.pending.size} changes)`;
      case 'initial':
        return 'initial auto snapshot';
      case 'interval':
        return `time interval (${Math.round((now - (this.lastAutoSnapshotTime ?? now)) / 1000)}s)`;
      case 'manual':
        return 'manual';
    }
  }

  private async takeSnapshot(
    reason: TriggerReason,
    message: string,
    tags: string[]
  ): Promise<EvaluationOutcome> {
    if (this.evaluating) {
      return { outcome: 'busy' };
    }

    this.evaluating = true;
    const cutoff = this.sequence;
    const changeCount = this.pending.size;

    try {
      const { snapshotId } = await this.sink({ message, tags, validateSources: false });

      for (const [filePath, entry] of this.pending) {
        if (entry.sequence <= cutoff) {
          this.pending.delete(filePath);
        }
      }
      if (this.pending.size === 0) {
        this.lastChangeTime = undefined;
      }
      this.lastAutoSnapshotTime = this.clock();

      this.logger.info(`${reason === 'manual' ? 'Manual' : 'Auto'} snapshot created: ${snapshotId.slice(0, 12)}`, {
        changeCount,
        reason,
      });
      this.emit('snapshot:created', { snapshotId, reason, changeCount });
      return { outcome: 'snapshot', reason, snapshotId, changeCount };
    } catch (error) {
      const err = toError(error);
      this.logger.error('Snapshot failed; pending changes kept for retry', err, { reason });
      this.emit('snapshot:failed', { reason, error: err });
      return { outcome: 'failed', reason, error: err };
    } finally {
      this.evaluating = false;
    }
  }

  private relativeToRoot(filePath: string): string | undefined {
    if (!path.isAbsolute(filePath)) {
      const normalized = path.normalize(filePath);
      return normalized.startsWith('..') || normalized === '.' ? undefined : normalized;
    }
    for (const root of this.roots) {
      const relative = path.relative(root, filePath);
      if (relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative)) {
        return relative;
      }
    }
    return undefined;
  }
}

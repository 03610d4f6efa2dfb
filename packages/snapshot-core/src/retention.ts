/**
 * Retention - decides which snapshots to forget and keeps metadata in step
 */

import { ValidationError, noopLogger, toErrorMessage } from '@snaptrail/snapshot-contracts';
import type {
  BackupEngine,
  EngineRetentionArgs,
  EngineSnapshot,
  ILogger,
  RetentionPolicy,
} from '@snaptrail/snapshot-contracts';
import type { MetadataStore } from '@snaptrail/snapshot-history';
import { normalizeSnapshotId } from './ref-resolver.js';

export interface RetentionRunOptions {
  dryRun: boolean;
}

export interface RetentionResult {
  dryRun: boolean;
  /** Snapshot ids removed from the engine (or that would be, on dry run) */
  removed: string[];
  /** Ids whose metadata could not be deleted; fixed by reconcile() */
  unreconciled: string[];
}

const BUCKETS: Array<[keyof RetentionPolicy, keyof EngineRetentionArgs]> = [
  ['keepLast', 'last'],
  ['keepHourly', 'hourly'],
  ['keepDaily', 'daily'],
  ['keepWeekly', 'weekly'],
  ['keepMonthly', 'monthly'],
  ['keepYearly', 'yearly'],
];

/**
 * Translate a policy into engine parameters.
 * Zero buckets are omitted; a policy that keeps nothing is rejected.
 */
export function toEngineArgs(policy: RetentionPolicy): EngineRetentionArgs {
  const args: EngineRetentionArgs = {};

  for (const [policyKey, engineKey] of BUCKETS) {
    const value = policy[policyKey];
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${policyKey} must be a non-negative integer (got ${value})`, {
        details: { [policyKey]: value },
      });
    }
    if (value > 0) {
      args[engineKey] = value;
    }
  }

  if (Object.keys(args).length === 0) {
    throw new ValidationError('Retention policy keeps no snapshots; at least one bucket must be non-zero');
  }
  return args;
}

/**
 * Retention Engine
 *
 * Bucketing itself is delegated to the backup engine; this class validates
 * the policy, normalizes what comes back and removes matching metadata.
 */
export class RetentionEngine {
  private readonly engine: BackupEngine;
  private readonly store: MetadataStore;
  private readonly logger: ILogger;

  constructor(engine: BackupEngine, store: MetadataStore, logger: ILogger = noopLogger) {
    this.engine = engine;
    this.store = store;
    this.logger = logger;
  }

  toEngineArgs(policy: RetentionPolicy): EngineRetentionArgs {
    return toEngineArgs(policy);
  }

  /**
   * Snapshots the policy removes from `snapshots`.
   * When dryRun is false the engine forgets them as part of the call.
   */
  async evaluate(
    policy: RetentionPolicy,
    snapshots: EngineSnapshot[],
    options: RetentionRunOptions
  ): Promise<Set<string>> {
    const args = toEngineArgs(policy);
    if (snapshots.length === 0) {
      return new Set();
    }

    const removed = await this.engine.forgetByPolicy(args, { dryRun: options.dryRun, prune: true });
    return new Set(removed.map((id) => normalizeSnapshotId(id, snapshots)));
  }

  /**
   * List, evaluate and (unless dry run) delete metadata of removed snapshots
   */
  async apply(policy: RetentionPolicy, options: RetentionRunOptions): Promise<RetentionResult> {
    const listing = await this.engine.listSnapshots();
    const removed = [...(await this.evaluate(policy, listing, options))];
    const unreconciled: string[] = [];

    if (!options.dryRun) {
      for (const snapshotId of removed) {
        try {
          await this.store.delete(snapshotId);
        } catch (error) {
          unreconciled.push(snapshotId);
          this.logger.warn('Snapshot forgotten but metadata delete failed; run reconcile to clean up', {
            snapshotId,
            error: toErrorMessage(error),
          });
        }
      }
    }

    this.logger.info(`Retention ${options.dryRun ? 'would remove' : 'removed'} ${removed.length} snapshots`, {
      policy: toEngineArgs(policy),
    });
    return { dryRun: options.dryRun, removed, unreconciled };
  }

  /**
   * Delete metadata for snapshots the engine no longer has.
   * Returns the ids removed.
   */
  async reconcile(listing?: EngineSnapshot[]): Promise<string[]> {
    const live = listing ?? (await this.engine.listSnapshots());
    const liveIds = new Set(live.map((entry) => entry.id));
    const dangling = (await this.store.listIds()).filter((id) => !liveIds.has(id));

    const removed: string[] = [];
    for (const snapshotId of dangling) {
      if (await this.store.delete(snapshotId)) {
        removed.push(snapshotId);
      }
    }

    if (removed.length > 0) {
      this.logger.info(`Reconciled ${removed.length} dangling metadata records`);
    }
    return removed;
  }
}

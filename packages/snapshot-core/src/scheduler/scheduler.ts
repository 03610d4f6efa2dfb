/**
 * Snapshot Scheduler - fixed-cadence snapshots followed by retention
 */

import { SCHEDULER_DEFAULTS, noopLogger, toError, toErrorMessage } from '@snaptrail/snapshot-contracts';
import type { ILogger } from '@snaptrail/snapshot-contracts';
import { BackgroundLoop } from '../utils/background-loop.js';
import { parseCadence } from './cadence.js';

/**
 * The orchestrator surface the scheduler needs
 */
export interface ScheduledSnapshotTarget {
  snapshot(request: { message: string; tags: string[] }): Promise<{ snapshotId: string }>;
  forget(options: { dryRun: boolean }): Promise<{ removed: string[] }>;
}

export interface SnapshotSchedulerOptions {
  /** Cadence expression, e.g. "1h"; undefined disables scheduling */
  schedule?: string;
  target: ScheduledSnapshotTarget;
  /** Epoch milliseconds */
  clock?: () => number;
  logger?: ILogger;
  checkIntervalMs?: number;
  joinTimeoutMs?: number;
}

export interface ScheduleOutcome {
  time: Date;
  success: boolean;
  snapshotId?: string;
  error?: string;
  /** Snapshots removed by the retention run that followed */
  retentionRemoved?: number;
}

export interface SchedulerStatus {
  running: boolean;
  schedule?: string;
  intervalMs?: number;
  nextFireTime?: Date;
  lastOutcome?: ScheduleOutcome;
}

export class SnapshotScheduler {
  private readonly schedule?: string;
  private readonly target: ScheduledSnapshotTarget;
  private readonly clock: () => number;
  private readonly logger: ILogger;
  private readonly loop: BackgroundLoop;

  private intervalMs?: number;
  private nextFireTime?: number;
  private lastOutcome?: ScheduleOutcome;
  private firing = false;

  constructor(options: SnapshotSchedulerOptions) {
    this.schedule = options.schedule;
    this.target = options.target;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? noopLogger;
    this.loop = new BackgroundLoop({
      name: 'Scheduler',
      intervalMs: options.checkIntervalMs ?? SCHEDULER_DEFAULTS.checkIntervalMs,
      logger: this.logger,
      joinTimeoutMs: options.joinTimeoutMs,
    });
  }

  /**
   * Start the check loop. Returns false when there is nothing to schedule
   * or the cadence cannot be parsed; the rest of the process carries on.
   */
  start(): boolean {
    if (this.loop.running) {
      return true;
    }
    if (!this.schedule) {
      this.logger.info('No schedule configured, skipping scheduled backups');
      return false;
    }

    try {
      this.intervalMs = parseCadence(this.schedule);
    } catch (error) {
      this.logger.error('Scheduler not started', toError(error));
      return false;
    }

    this.nextFireTime = this.clock() + this.intervalMs;
    this.logger.info(`Starting scheduled backup service with schedule: ${this.schedule}`, {
      nextFireTime: new Date(this.nextFireTime).toISOString(),
    });

    this.loop.start(async () => {
      await this.tick();
    });
    return true;
  }

  async stop(): Promise<void> {
    if (this.loop.running) {
      this.logger.info('Stopping scheduled backup service...');
    }
    await this.loop.stop();
  }

  /**
   * One check: fire when due. Returns the outcome when something ran.
   */
  async tick(): Promise<ScheduleOutcome | undefined> {
    const intervalMs = this.intervalMs;
    if (intervalMs === undefined || this.nextFireTime === undefined || this.firing) {
      return undefined;
    }
    const now = this.clock();
    if (now < this.nextFireTime) {
      return undefined;
    }

    this.firing = true;
    const outcome: ScheduleOutcome = { time: new Date(now), success: false };
    try {
      const { snapshotId } = await this.target.snapshot({
        message: `Scheduled backup (${this.schedule})`,
        tags: ['scheduled', 'automatic'],
      });
      outcome.success = true;
      outcome.snapshotId = snapshotId;
      this.logger.info(`Scheduled backup created: ${snapshotId.slice(0, 12)}`);

      try {
        const { removed } = await this.target.forget({ dryRun: false });
        outcome.retentionRemoved = removed.length;
        if (removed.length > 0) {
          this.logger.info(`Retention policy removed ${removed.length} old snapshots`);
        }
      } catch (error) {
        this.logger.warn('Failed to apply retention policy', { error: toErrorMessage(error) });
      }
    } catch (error) {
      outcome.error = toErrorMessage(error);
      this.logger.error('Scheduled backup failed', toError(error));
    } finally {
      // recomputed after failures too
      this.nextFireTime = now + intervalMs;
      this.lastOutcome = outcome;
      this.firing = false;
    }

    this.logger.info(`Next scheduled backup: ${new Date(now + intervalMs).toISOString()}`);
    return outcome;
  }

  getStatus(): SchedulerStatus {
    const status: SchedulerStatus = { running: this.loop.running };
    if (this.schedule !== undefined) status.schedule = this.schedule;
    if (this.intervalMs !== undefined) status.intervalMs = this.intervalMs;
    if (this.nextFireTime !== undefined) status.nextFireTime = new Date(this.nextFireTime);
    if (this.lastOutcome !== undefined) status.lastOutcome = this.lastOutcome;
    return status;
  }
}

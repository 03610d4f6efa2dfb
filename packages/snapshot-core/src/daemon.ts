/**
 * Daemon - wires engine, metadata store, orchestrator, monitor and scheduler
 * into one long-running service.
 */

import { createConsoleLogger, toError } from '@snaptrail/snapshot-contracts';
import type { BackupEngine, ILogger, SnapTrailConfig } from '@snaptrail/snapshot-contracts';
import { ResticEngine } from '@snaptrail/snapshot-engine';
import { MetadataStore } from '@snaptrail/snapshot-history';
import { loadConfig } from './config/load-config.js';
import { ChangeCoalescer } from './monitor/change-coalescer.js';
import { FileMonitor } from './monitor/file-monitor.js';
import type { FileMonitorStatus, WatchFactory } from './monitor/file-monitor.js';
import { BackupOrchestrator } from './orchestrator.js';
import { SnapshotScheduler } from './scheduler/scheduler.js';
import type { SchedulerStatus } from './scheduler/scheduler.js';

export interface CreateDaemonOptions {
  /** Ignored when `config` is given */
  configPath?: string;
  config?: SnapTrailConfig;
  engine?: BackupEngine;
  store?: MetadataStore;
  logger?: ILogger;
  watch?: WatchFactory;
  /** Epoch milliseconds */
  clock?: () => number;
  /** Install SIGINT/SIGTERM handlers on start (default true) */
  handleSignals?: boolean;
}

export interface DaemonStatus {
  running: boolean;
  monitor: FileMonitorStatus;
  scheduler: SchedulerStatus;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class SnapTrailDaemon {
  readonly config: SnapTrailConfig;
  readonly engine: BackupEngine;
  readonly store: MetadataStore;
  readonly orchestrator: BackupOrchestrator;
  readonly coalescer: ChangeCoalescer;
  readonly monitor: FileMonitor;
  readonly scheduler: SnapshotScheduler;
  private readonly logger: ILogger;
  private readonly handleSignals: boolean;

  private running = false;
  private stopping?: Promise<void>;
  private resolveStopped?: () => void;
  private readonly stopped: Promise<void>;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.logger.info(`Received ${signal}, shutting down...`);
    this.stop().catch((error) => {
      this.logger.error('Shutdown failed', toError(error));
    });
  };

  constructor(parts: {
    config: SnapTrailConfig;
    engine: BackupEngine;
    store: MetadataStore;
    orchestrator: BackupOrchestrator;
    coalescer: ChangeCoalescer;
    monitor: FileMonitor;
    scheduler: SnapshotScheduler;
    logger: ILogger;
    handleSignals: boolean;
  }) {
    this.config = parts.config;
    this.engine = parts.engine;
    this.store = parts.store;
    this.orchestrator = parts.orchestrator;
    this.coalescer = parts.coalescer;
    this.monitor = parts.monitor;
    this.scheduler = parts.scheduler;
    this.logger = parts.logger;
    this.handleSignals = parts.handleSignals;
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Make sure the repository exists, then start monitoring and scheduling
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    await this.engine.ensureRepository();

    this.monitor.start();
    const scheduled = this.scheduler.start();
    this.running = true;

    if (this.handleSignals) {
      for (const signal of SHUTDOWN_SIGNALS) {
        process.once(signal, this.onSignal);
      }
    }
    this.logger.info(`snaptrail daemon started for ${this.config.name}`, {
      sourcePaths: this.config.sourcePaths,
      scheduled,
    });
  }

  /**
   * Stop monitor and scheduler, then close the store. Safe to call twice.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  /** Resolves once stop() has completed */
  waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  getStatus(): DaemonStatus {
    return {
      running: this.running,
      monitor: this.monitor.getStatus(),
      scheduler: this.scheduler.getStatus(),
    };
  }

  private async shutdown(): Promise<void> {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.removeListener(signal, this.onSignal);
    }
    try {
      await this.monitor.stop();
      await this.scheduler.stop();
    } finally {
      this.store.close();
      this.running = false;
      this.logger.info('snaptrail daemon stopped');
      this.resolveStopped?.();
    }
  }
}

/**
 * Build a daemon from a config file (or a resolved config)
 */
export async function createDaemon(options: CreateDaemonOptions = {}): Promise<SnapTrailDaemon> {
  const config = options.config ?? (await loadConfig(options.configPath));
  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel, scope: 'snaptrail' });
  const clock = options.clock ?? Date.now;

  const engine =
    options.engine ??
    new ResticEngine({
      repository: config.repository,
      passwordFile: config.passwordFile,
      passwordEnv: config.passwordEnv,
      logger,
    });
  const store = options.store ?? new MetadataStore(config.metadata.path, { logger, now: clock });

  const orchestrator = new BackupOrchestrator({
    engine,
    store,
    config: {
      sourcePaths: config.sourcePaths,
      exclude: config.exclude,
      include: config.include,
      retention: config.retention,
      retainDays: config.metadata.retainDays,
    },
    logger,
    clock,
  });

  const coalescer = new ChangeCoalescer({
    sink: (request) => orchestrator.snapshot(request),
    config: config.monitor,
    roots: config.sourcePaths,
    clock,
    logger,
    lastAutoSnapshotTime: await orchestrator.lastAutoSnapshotTime(),
  });
  const monitor = new FileMonitor({
    sourcePaths: config.sourcePaths,
    coalescer,
    logger,
    watch: options.watch,
  });
  orchestrator.attachMonitor(monitor);

  const scheduler = new SnapshotScheduler({
    schedule: config.schedule,
    target: orchestrator,
    clock,
    logger,
  });

  return new SnapTrailDaemon({
    config,
    engine,
    store,
    orchestrator,
    coalescer,
    monitor,
    scheduler,
    logger,
    handleSignals: options.handleSignals ?? true,
  });
}

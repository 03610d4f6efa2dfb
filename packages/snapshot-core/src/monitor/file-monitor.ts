/**
 * File Monitor - watches source paths and drives the coalescer loop
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { noopLogger, toError } from '@snaptrail/snapshot-contracts';
import type { ChangeEventType, ILogger } from '@snaptrail/snapshot-contracts';
import { BackgroundLoop } from '../utils/background-loop.js';
import type { ChangeCoalescer, CoalescerStatus } from './change-coalescer.js';

export type RawWatchEvent = 'rename' | 'change';

export interface WatchHandle {
  close(): void;
}

/**
 * Starts a recursive watch on `root`; `filename` is relative to it
 */
export type WatchFactory = (
  root: string,
  onEvent: (event: RawWatchEvent, filename: string | null) => void,
  onError: (error: Error) => void
) => WatchHandle;

export interface FileMonitorOptions {
  sourcePaths: string[];
  coalescer: ChangeCoalescer;
  logger?: ILogger;
  watch?: WatchFactory;
  joinTimeoutMs?: number;
}

export interface FileMonitorStatus extends CoalescerStatus {
  monitoring: boolean;
  monitoredPaths: string[];
}

export const nodeWatch: WatchFactory = (root, onEvent, onError) => {
  const watcher = fs.watch(root, { recursive: true }, (event, filename) => {
    onEvent(event, filename);
  });
  watcher.on('error', onError);
  return watcher;
};

/**
 * `rename` covers both creation and deletion; tell them apart by existence
 */
function classify(event: RawWatchEvent, fullPath: string): ChangeEventType | undefined {
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(fullPath);
  } catch {
    stats = undefined;
  }

  if (stats?.isDirectory()) {
    return undefined;
  }
  if (event === 'change') {
    return 'modified';
  }
  return stats ? 'created' : 'deleted';
}

export class FileMonitor {
  private readonly sourcePaths: string[];
  private readonly coalescer: ChangeCoalescer;
  private readonly logger: ILogger;
  private readonly watch: WatchFactory;
  private readonly loop: BackgroundLoop;
  private watchers: WatchHandle[] = [];

  constructor(options: FileMonitorOptions) {
    this.sourcePaths = options.sourcePaths.map((p) => path.resolve(p));
    this.coalescer = options.coalescer;
    this.logger = options.logger ?? noopLogger;
    this.watch = options.watch ?? nodeWatch;
    this.loop = new BackgroundLoop({
      name: 'File monitor',
      intervalMs: options.coalescer.tickMs,
      logger: this.logger,
      joinTimeoutMs: options.joinTimeoutMs,
    });
  }

  get running(): boolean {
    return this.loop.running;
  }

  start(): void {
    if (this.loop.running) {
      return;
    }
    this.logger.info('Starting file monitor...');

    for (const root of this.sourcePaths) {
      if (!fs.existsSync(root)) {
        this.logger.warn(`Source path does not exist: ${root}`);
        continue;
      }
      this.watchers.push(
        this.watch(
          root,
          (event, filename) => this.handleEvent(root, event, filename),
          (error) => this.logger.error(`Watch error on ${root}`, error)
        )
      );
      this.logger.info(`Monitoring: ${root}`);
    }

    this.loop.start(async () => {
      await this.coalescer.evaluate();
    });
    this.logger.info('File monitor started');
  }

  /**
   * Stop watching and join the evaluation loop.
   * A snapshot already in flight is allowed to finish.
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping file monitor...');
    for (const watcher of this.watchers) {
      watcher.close();
    }
    this.watchers = [];
    await this.loop.stop();
    this.logger.info('File monitor stopped');
  }

  forceSnapshot(message?: string): Promise<string> {
    return this.coalescer.forceSnapshot(message);
  }

  get pendingCount(): number {
    return this.coalescer.pendingCount;
  }

  getStatus(): FileMonitorStatus {
    return {
      ...this.coalescer.getStatus(),
      monitoring: this.loop.running,
      monitoredPaths: [...this.sourcePaths],
    };
  }

  private handleEvent(root: string, event: RawWatchEvent, filename: string | null): void {
    if (!filename) {
      return;
    }
    const fullPath = path.resolve(root, filename);
    try {
      const eventType = classify(event, fullPath);
      if (eventType) {
        this.coalescer.recordChange(fullPath, eventType);
      }
    } catch (error) {
      this.logger.error(`Failed to record change for ${fullPath}`, toError(error));
    }
  }
}

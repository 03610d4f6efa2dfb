/**
 * Unit tests for the daemon wiring (in-memory engine and store, fake watcher)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_RETENTION_POLICY } from '@snaptrail/snapshot-contracts';
import type { ILogger, SnapTrailConfig } from '@snaptrail/snapshot-contracts';
import { InMemoryBackupEngine } from '@snaptrail/snapshot-engine/testing';
import { IN_MEMORY, MetadataStore } from '@snaptrail/snapshot-history';
import { createDaemon } from '../daemon.js';
import type { WatchFactory } from '../monitor/file-monitor.js';

const T0 = Date.UTC(2024, 8, 1, 12, 0, 0);

function createMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('createDaemon', () => {
  let dir: string;
  let config: SnapTrailConfig;
  let engine: InMemoryBackupEngine;
  let store: MetadataStore;
  let logger: ILogger;
  const watch = vi.fn<WatchFactory>(() => ({ close: vi.fn() }));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snaptrail-daemon-'));
    config = {
      name: 'docs',
      sourcePaths: [dir],
      repository: path.join(dir, 'repo'),
      passwordEnv: 'SNAPTRAIL_PASSWORD',
      schedule: '1h',
      retention: { ...DEFAULT_RETENTION_POLICY },
      exclude: [],
      include: [],
      monitor: {
        autoSnapshotThreshold: 3,
        autoSnapshotIntervalMs: 60 * 60 * 1000,
        debounceMs: 0,
        ignorePatterns: ['*.tmp'],
        tickMs: 60_000,
      },
      metadata: { path: IN_MEMORY, retainDays: 365 },
      logLevel: 'silent',
    };
    engine = new InMemoryBackupEngine({ now: () => T0 });
    store = new MetadataStore(IN_MEMORY);
    logger = createMockLogger();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const build = () =>
    createDaemon({ config, engine, store, logger, watch, clock: () => T0, handleSignals: false });

  it('should initialize the repository and start monitor and scheduler', async () => {
    const daemon = await build();

    await daemon.start();

    expect(engine.initialized).toBe(true);
    expect(daemon.isRunning).toBe(true);
    expect(daemon.getStatus()).toMatchObject({
      running: true,
      monitor: { monitoring: true, monitoredPaths: [dir] },
      scheduler: { running: true, schedule: '1h' },
    });

    await daemon.stop();
    await daemon.waitUntilStopped();
    expect(daemon.getStatus()).toMatchObject({
      running: false,
      monitor: { monitoring: false },
      scheduler: { running: false },
    });
  });

  it('should stop only once', async () => {
    const daemon = await build();
    await daemon.start();

    const first = daemon.stop();
    const second = daemon.stop();

    expect(second).toBe(first);
    await first;
  });

  it('should seed the coalescer with the newest auto snapshot', async () => {
    await store.save({
      snapshotId: 'aaaa0000',
      timestamp: new Date(T0 - 5 * 60 * 1000),
      author: 'tester',
      tags: ['auto', 'monitor'],
      stats: {},
      fileChanges: [],
    });

    const daemon = await build();

    expect(daemon.coalescer.getStatus().lastAutoSnapshotTime).toEqual(new Date(T0 - 5 * 60 * 1000));
  });

  it('should route coalesced changes into recorded snapshots', async () => {
    const daemon = await build();
    engine.writeFile('a.txt', 'alpha');
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'scratch.tmp']) {
      daemon.coalescer.recordChange(path.join(dir, name), 'modified');
    }

    const outcome = await daemon.coalescer.evaluate();

    expect(outcome).toMatchObject({ outcome: 'snapshot', reason: 'threshold', changeCount: 3 });
    const [record] = await daemon.orchestrator.log();
    expect(record).toMatchObject({
      message: 'Auto snapshot: 3 modified (change threshold (3 changes))',
      tags: ['auto', 'monitor'],
      timestamp: new Date(T0),
    });
    expect((await daemon.orchestrator.status()).pendingSource).toBe('monitor');
  });
});

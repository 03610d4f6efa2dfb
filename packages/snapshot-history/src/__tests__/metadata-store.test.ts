/**
 * Unit tests for MetadataStore
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { StorageError } from '@snaptrail/snapshot-contracts';
import type { FileChange, ILogger, SnapshotMetadata } from '@snaptrail/snapshot-contracts';
import { MetadataStore } from '../metadata-store.js';
import { IN_MEMORY } from '../database.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.UTC(2024, 5, 15, 12, 0, 0);

function createMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const createMetadata = (overrides?: Partial<SnapshotMetadata>): SnapshotMetadata => ({
  snapshotId: 'aaaa1111',
  message: 'initial import',
  timestamp: new Date(NOW - 60_000),
  author: 'alice',
  tags: ['manual'],
  stats: { filesNew: 2, dataAdded: 512 },
  fileChanges: [
    { path: 'src/a.ts', changeType: 'added', sizeBytes: 100, checksum: 'c1' },
    { path: 'src/b.ts', changeType: 'added' },
  ],
  ...overrides,
});

describe('MetadataStore', () => {
  let store: MetadataStore;
  let logger: ILogger;

  beforeEach(() => {
    logger = createMockLogger();
    store = new MetadataStore(IN_MEMORY, { logger, now: () => NOW });
  });

  afterEach(() => {
    store.close();
  });

  describe('save / get', () => {
    it('should round-trip a record with file changes', async () => {
      const metadata = createMetadata({ parentSnapshot: 'ffff0000' });

      await store.save(metadata);
      const loaded = await store.get('aaaa1111');

      expect(loaded).toEqual(metadata);
    });

    it('should round-trip a record without file changes or optional fields', async () => {
      const metadata = createMetadata({ fileChanges: [], message: undefined });
      delete metadata.message;

      await store.save(metadata);
      const loaded = await store.get('aaaa1111');

      expect(loaded).toEqual(metadata);
      expect(loaded).not.toHaveProperty('message');
      expect(loaded).not.toHaveProperty('parentSnapshot');
    });

    it('should return null for unknown snapshot', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('should replace file changes on repeated save', async () => {
      await store.save(createMetadata());
      await store.save(
        createMetadata({
          message: 'rewritten',
          fileChanges: [{ path: 'docs/readme.md', changeType: 'modified' }],
        })
      );

      const loaded = await store.get('aaaa1111');

      expect(loaded?.message).toBe('rewritten');
      expect(loaded?.fileChanges).toEqual([{ path: 'docs/readme.md', changeType: 'modified' }]);
      expect((await store.getStats()).totalFileChanges).toBe(1);
    });

    it('should preserve file change order', async () => {
      const fileChanges = ['z.txt', 'a.txt', 'm.txt'].map((p) => ({
        path: p,
        changeType: 'added' as const,
      }));

      await store.save(createMetadata({ fileChanges }));

      expect((await store.get('aaaa1111'))?.fileChanges.map((c) => c.path)).toEqual([
        'z.txt',
        'a.txt',
        'm.txt',
      ]);
    });

    it('should round-trip a record with more file changes than one insert can bind', async () => {
      const fileChanges: FileChange[] = Array.from({ length: 10_000 }, (_, i) => ({
        path: `src/file-${i}.ts`,
        changeType: 'modified',
        sizeBytes: i,
        checksum: `sum-${i}`,
      }));
      const metadata = createMetadata({ fileChanges });

      await store.save(metadata);
      const loaded = await store.get('aaaa1111');

      expect(loaded?.fileChanges).toHaveLength(10_000);
      expect(loaded).toEqual(metadata);
      expect((await store.getStats()).totalFileChanges).toBe(10_000);
    });
  });

  describe('getRecent', () => {
    beforeEach(async () => {
      await store.save(
        createMetadata({ snapshotId: 's1', timestamp: new Date(NOW - 3000), author: 'alice', tags: ['auto', 'monitor'] })
      );
      await store.save(
        createMetadata({ snapshotId: 's2', timestamp: new Date(NOW - 2000), author: 'bob', tags: ['manual'] })
      );
      await store.save(
        createMetadata({ snapshotId: 's3', timestamp: new Date(NOW - 1000), author: 'alice', tags: ['auto'] })
      );
    });

    it('should return newest first', async () => {
      const recent = await store.getRecent();

      expect(recent.map((m) => m.snapshotId)).toEqual(['s3', 's2', 's1']);
    });

    it('should respect limit', async () => {
      const recent = await store.getRecent({ limit: 2 });

      expect(recent.map((m) => m.snapshotId)).toEqual(['s3', 's2']);
    });

    it('should filter by author', async () => {
      const recent = await store.getRecent({ author: 'alice' });

      expect(recent.map((m) => m.snapshotId)).toEqual(['s3', 's1']);
    });

    it('should require every requested tag', async () => {
      expect((await store.getRecent({ tags: ['auto'] })).map((m) => m.snapshotId)).toEqual(['s3', 's1']);
      expect((await store.getRecent({ tags: ['auto', 'monitor'] })).map((m) => m.snapshotId)).toEqual([
        's1',
      ]);
    });

    it('should match tags exactly, not by substring', async () => {
      expect(await store.getRecent({ tags: ['aut'] })).toEqual([]);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await store.save(createMetadata({ snapshotId: 's1', message: 'Fix login bug', author: 'alice', tags: [] }));
      await store.save(
        createMetadata({
          snapshotId: 's2',
          message: 'Nightly',
          author: 'bob',
          tags: ['release-candidate'],
          timestamp: new Date(NOW),
        })
      );
    });

    it('should match message substrings', async () => {
      expect((await store.search('login')).map((m) => m.snapshotId)).toEqual(['s1']);
    });

    it('should be case-sensitive', async () => {
      expect(await store.search('LOGIN')).toEqual([]);
    });

    it('should match author and tag substrings', async () => {
      expect((await store.search('bob')).map((m) => m.snapshotId)).toEqual(['s2']);
      expect((await store.search('candidate')).map((m) => m.snapshotId)).toEqual(['s2']);
    });

    it('should order results newest first and apply limit', async () => {
      expect((await store.search('i')).map((m) => m.snapshotId)).toEqual(['s2', 's1']);
      expect((await store.search('i', 1)).map((m) => m.snapshotId)).toEqual(['s2']);
    });
  });

  describe('delete', () => {
    it('should delete record and cascade file changes', async () => {
      await store.save(createMetadata());

      expect(await store.delete('aaaa1111')).toBe(true);
      expect(await store.get('aaaa1111')).toBeNull();
      expect(await store.getStats()).toEqual({ totalSnapshots: 0, totalFileChanges: 0, authors: [] });
    });

    it('should return false when nothing was deleted', async () => {
      expect(await store.delete('missing')).toBe(false);
    });
  });

  describe('cleanup', () => {
    it('should remove records older than retention window', async () => {
      await store.save(createMetadata({ snapshotId: 'old', timestamp: new Date(NOW - 40 * DAY_MS) }));
      await store.save(createMetadata({ snapshotId: 'recent', timestamp: new Date(NOW - 10 * DAY_MS) }));

      const removed = await store.cleanup(30);

      expect(removed).toBe(1);
      expect(await store.listIds()).toEqual(['recent']);
    });

    it('should return 0 when nothing is old enough', async () => {
      await store.save(createMetadata());

      expect(await store.cleanup()).toBe(0);
    });
  });

  describe('has / listIds / getStats', () => {
    it('should report tracked ids and counters', async () => {
      await store.save(createMetadata({ snapshotId: 's1', author: 'alice', timestamp: new Date(NOW - 2000) }));
      await store.save(createMetadata({ snapshotId: 's2', author: 'bob', timestamp: new Date(NOW - 1000) }));
      await store.save(createMetadata({ snapshotId: 's3', author: 'alice', timestamp: new Date(NOW) }));

      expect(await store.has('s2')).toBe(true);
      expect(await store.has('nope')).toBe(false);
      expect(await store.listIds()).toEqual(['s3', 's2', 's1']);
      expect(await store.getStats()).toEqual({
        totalSnapshots: 3,
        totalFileChanges: 6,
        authors: [
          { author: 'alice', count: 2 },
          { author: 'bob', count: 1 },
        ],
      });
    });
  });

  describe('failure handling', () => {
    it('should degrade reads and throw StorageError on writes after close', async () => {
      store.close();

      expect(await store.get('aaaa1111')).toBeNull();
      expect(await store.getRecent()).toEqual([]);
      expect(await store.search('x')).toEqual([]);
      expect(logger.warn).toHaveBeenCalled();

      await expect(store.save(createMetadata())).rejects.toBeInstanceOf(StorageError);
      await expect(store.delete('aaaa1111')).rejects.toBeInstanceOf(StorageError);
      await expect(store.cleanup()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('file-backed database', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snaptrail-store-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should create parent directories and persist across reopen', async () => {
      const filename = path.join(tmpDir, 'metadata', 'metadata.db');
      const first = new MetadataStore(filename);
      await first.save(createMetadata());
      first.close();

      const second = new MetadataStore(filename);
      const loaded = await second.get('aaaa1111');
      second.close();

      expect(loaded?.fileChanges).toHaveLength(2);
      expect(fs.existsSync(filename)).toBe(true);
    });
  });
});

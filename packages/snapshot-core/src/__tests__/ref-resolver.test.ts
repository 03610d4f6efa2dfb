import { describe, it, expect, vi } from 'vitest';
import { SnapshotRefError } from '@snaptrail/snapshot-contracts';
import type { EngineSnapshot } from '@snaptrail/snapshot-contracts';
import { InMemoryBackupEngine } from '@snaptrail/snapshot-engine/testing';
import { looksLikeSnapshotId, resolveRef, resolveSnapshotRef } from '../ref-resolver.js';

const entry = (id: string, tags: string[] = []): EngineSnapshot => ({
  id,
  time: new Date(0),
  tags,
  paths: ['/data'],
});

const LISTING = [entry('snapshot-a', ['release']), entry('snapshot-b', ['release']), entry('snapshot-c')];

describe('resolveRef', () => {
  it('should resolve latest and HEAD to the newest snapshot', () => {
    expect(resolveRef('latest', LISTING)).toBe('snapshot-c');
    expect(resolveRef('HEAD', LISTING)).toBe('snapshot-c');
  });

  it('should resolve HEAD~N by position from the newest', () => {
    expect(resolveRef('HEAD~0', LISTING)).toBe('snapshot-c');
    expect(resolveRef('HEAD~1', LISTING)).toBe('snapshot-b');
    expect(resolveRef('HEAD~2', LISTING)).toBe('snapshot-a');
  });

  it('should fail when the offset is past the oldest snapshot', () => {
    try {
      resolveRef('HEAD~5', LISTING);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotRefError);
      if (error instanceof SnapshotRefError) {
        expect(error.reason).toBe('not-found');
        expect(error.message).toBe('Not enough snapshots (have 3) (ref: "HEAD~5")');
      }
    }
  });

  it('should fail on an empty listing', () => {
    expect(() => resolveRef('latest', [])).toThrow('No snapshots found (ref: "latest")');
  });

  it('should reject a malformed HEAD offset', () => {
    expect(() => resolveRef('HEAD~x', LISTING)).toThrow('Invalid reference format (ref: "HEAD~x")');
  });

  it('should return identifier-shaped refs verbatim', () => {
    expect(resolveRef('deadbeef', LISTING)).toBe('deadbeef');
    expect(resolveRef('a'.repeat(64), [])).toBe('a'.repeat(64));
  });

  it('should pick the newest snapshot carrying a tag', () => {
    expect(resolveRef('release', LISTING)).toBe('snapshot-b');
  });

  it('should pass unknown refs through', () => {
    expect(resolveRef('nightly', LISTING)).toBe('nightly');
  });
});

describe('looksLikeSnapshotId', () => {
  it.each([
    ['deadbeef', true],
    ['0123456789abcdef', true],
    ['dead', false],
    ['DEADBEEF', false],
    ['release', false],
    ['a'.repeat(65), false],
  ])('%j -> %j', (ref, expected) => {
    expect(looksLikeSnapshotId(ref)).toBe(expected);
  });
});

describe('resolveSnapshotRef', () => {
  const createEngine = async () => {
    let clock = Date.UTC(2024, 0, 1);
    const engine = new InMemoryBackupEngine({ now: () => clock++ });
    const ids: string[] = [];
    for (const tags of [['init'], ['release'], []]) {
      ids.push((await engine.createSnapshot({ paths: ['/data'], tags, excludes: [], includes: [] })).snapshotId);
    }
    return { engine, ids };
  };

  it('should resolve positional refs through the engine listing', async () => {
    const { engine, ids } = await createEngine();

    await expect(resolveSnapshotRef(engine, 'latest')).resolves.toBe(ids[2]);
    await expect(resolveSnapshotRef(engine, 'HEAD~1')).resolves.toBe(ids[1]);
    await expect(resolveSnapshotRef(engine, 'HEAD~3')).rejects.toThrow(SnapshotRefError);
  });

  it('should resolve tags through the engine without listing', async () => {
    const { engine, ids } = await createEngine();
    const listSpy = vi.spyOn(engine, 'listSnapshots');

    await expect(resolveSnapshotRef(engine, 'init')).resolves.toBe(ids[0]);
    await expect(resolveSnapshotRef(engine, 'unknown-tag')).resolves.toBe('unknown-tag');
    expect(listSpy).not.toHaveBeenCalled();
  });
});

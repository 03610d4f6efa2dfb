/**
 * Symbolic snapshot references.
 *
 * Grammar, in precedence order:
 *   <id>      anything shaped like an engine identifier, returned verbatim
 *   latest    newest snapshot (alias: HEAD)
 *   HEAD~N    N positions before the newest
 *   <tag>     newest snapshot carrying the tag
 *   <other>   returned unchanged for the engine to interpret
 *
 * A tag shaped like an identifier is never looked up as a tag.
 */

import { SnapshotRefError } from '@snaptrail/snapshot-contracts';
import type { BackupEngine, EngineSnapshot } from '@snaptrail/snapshot-contracts';

/** restic ids: 8 (short) to 64 (full) lowercase hex characters */
export const SNAPSHOT_ID_PATTERN = /^[0-9a-f]{8,64}$/;

const HEAD_OFFSET_PREFIX = 'HEAD~';

export function looksLikeSnapshotId(ref: string): boolean {
  return SNAPSHOT_ID_PATTERN.test(ref);
}

function isLatest(ref: string): boolean {
  return ref === 'latest' || ref === 'HEAD';
}

/**
 * Parse the N of `HEAD~N`; undefined when `ref` is not a HEAD offset
 */
function parseHeadOffset(ref: string): number | undefined {
  if (!ref.startsWith(HEAD_OFFSET_PREFIX)) {
    return undefined;
  }
  const digits = ref.slice(HEAD_OFFSET_PREFIX.length);
  if (!/^\d+$/.test(digits)) {
    throw new SnapshotRefError(ref, 'invalid', 'Invalid reference format');
  }
  return Number.parseInt(digits, 10);
}

function pickFromNewest(ref: string, listing: EngineSnapshot[], offset: number): string {
  if (listing.length === 0) {
    throw new SnapshotRefError(ref, 'not-found', 'No snapshots found');
  }
  const entry = listing[listing.length - 1 - offset];
  if (!entry || offset >= listing.length) {
    throw new SnapshotRefError(ref, 'not-found', `Not enough snapshots (have ${listing.length})`);
  }
  return entry.id;
}

/**
 * Map an id (possibly abbreviated) onto the full id of the listing entry it
 * names; unknown ids come back unchanged
 */
export function normalizeSnapshotId(id: string, listing: EngineSnapshot[]): string {
  const match = listing.find(
    (entry) => entry.id === id || entry.shortId === id || entry.id.startsWith(id)
  );
  return match?.id ?? id;
}

/**
 * Resolve a reference against an oldest -> newest listing
 */
export function resolveRef(ref: string, listing: EngineSnapshot[]): string {
  if (looksLikeSnapshotId(ref)) {
    return ref;
  }
  if (isLatest(ref)) {
    return pickFromNewest(ref, listing, 0);
  }

  const offset = parseHeadOffset(ref);
  if (offset !== undefined) {
    return pickFromNewest(ref, listing, offset);
  }

  for (let i = listing.length - 1; i >= 0; i--) {
    const entry = listing[i];
    if (entry?.tags.includes(ref)) {
      return entry.id;
    }
  }

  return ref;
}

/**
 * Resolve a reference against a live engine.
 * Lists snapshots only for latest/HEAD forms; tags go through the engine's own lookup.
 */
export async function resolveSnapshotRef(engine: BackupEngine, ref: string): Promise<string> {
  if (looksLikeSnapshotId(ref)) {
    return ref;
  }
  if (isLatest(ref)) {
    return pickFromNewest(ref, await engine.listSnapshots(), 0);
  }

  const offset = parseHeadOffset(ref);
  if (offset !== undefined) {
    return pickFromNewest(ref, await engine.listSnapshots(), offset);
  }

  return (await engine.resolveKnownTag(ref)) ?? ref;
}

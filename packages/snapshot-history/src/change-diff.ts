/**
 * Metadata-level diff between two recorded snapshots.
 * Works on the stored file-change lists only; the engine is not consulted.
 */

import type { FileChange } from '@snaptrail/snapshot-contracts';

function indexByPath(changes: FileChange[]): Map<string, FileChange> {
  const byPath = new Map<string, FileChange>();
  for (const change of changes) {
    byPath.set(change.path, change);
  }
  return byPath;
}

/**
 * Compare the file-change lists of two records.
 *
 * Paths only in `to` are added, paths in both with a different checksum are
 * modified, paths only in `from` are deleted. Added and modified entries keep
 * `to`'s order; deleted entries keep `from`'s.
 */
export function diffFileChanges(from: FileChange[], to: FileChange[]): FileChange[] {
  const fromByPath = indexByPath(from);
  const toByPath = indexByPath(to);
  const result: FileChange[] = [];

  for (const [filePath, change] of toByPath) {
    const previous = fromByPath.get(filePath);
    if (!previous) {
      result.push({ ...change, changeType: 'added' });
    } else if (previous.checksum !== change.checksum) {
      result.push({ path: filePath, changeType: 'modified' });
    }
  }

  for (const filePath of fromByPath.keys()) {
    if (!toByPath.has(filePath)) {
      result.push({ path: filePath, changeType: 'deleted' });
    }
  }

  return result;
}

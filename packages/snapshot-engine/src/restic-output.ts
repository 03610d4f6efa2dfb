/**
 * Zod schemas and parsers for restic's JSON output
 */

import { z } from 'zod';
import { EngineError, toErrorMessage } from '@snaptrail/snapshot-contracts';
import type {
  BackupProgress,
  EngineSnapshot,
  RepositoryStats,
  SnapshotDiffResult,
  SnapshotStats,
} from '@snaptrail/snapshot-contracts';

// ═══════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════

export const ResticSnapshotSchema = z.object({
  id: z.string().min(1),
  short_id: z.string().optional(),
  time: z.string(),
  tags: z.array(z.string()).nullish(),
  paths: z.array(z.string()).nullish(),
  hostname: z.string().optional(),
  username: z.string().optional(),
  parent: z.string().optional(),
});

export const ResticSnapshotListSchema = z.array(ResticSnapshotSchema).nullable();

export const BackupStatusSchema = z.object({
  message_type: z.literal('status'),
  percent_done: z.number().default(0),
  total_files: z.number().default(0),
  files_done: z.number().default(0),
  total_bytes: z.number().default(0),
  bytes_done: z.number().default(0),
  current_files: z.array(z.string()).nullish(),
});

export const BackupSummarySchema = z.object({
  message_type: z.literal('summary'),
  snapshot_id: z.string().optional(),
  files_new: z.number().default(0),
  files_changed: z.number().default(0),
  files_unmodified: z.number().default(0),
  dirs_new: z.number().default(0),
  dirs_changed: z.number().default(0),
  dirs_unmodified: z.number().default(0),
  data_added: z.number().default(0),
  total_files_processed: z.number().default(0),
  total_bytes_processed: z.number().default(0),
  total_duration: z.number().default(0),
});

export const BackupMessageSchema = z.discriminatedUnion('message_type', [
  BackupStatusSchema,
  BackupSummarySchema,
]);

export const DiffEntrySchema = z.object({
  path: z.string(),
  modifier: z.string().default(''),
});

export const ForgetGroupSchema = z.object({
  remove: z.array(z.object({ id: z.string() })).nullish(),
});

export const ForgetResultSchema = z.array(ForgetGroupSchema).nullable();

export const RepoStatsSchema = z.object({
  total_size: z.number().default(0),
  total_file_count: z.number().default(0),
  snapshots_count: z.number().optional(),
});

export type BackupSummary = z.infer<typeof BackupSummarySchema>;

// ═══════════════════════════════════════════════════════════════════════
// Parsers
// ═══════════════════════════════════════════════════════════════════════

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new EngineError(`Failed to parse ${what}: ${toErrorMessage(error)}`, { cause: error });
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new EngineError(`Unexpected ${what}: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Parse one line of JSON, returning undefined for blank or non-JSON lines
 */
function tryParseLine(line: string): unknown {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/**
 * `restic snapshots --json` -> listing ordered oldest -> newest
 */
export function parseSnapshotList(stdout: string): EngineSnapshot[] {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) {
    return [];
  }

  const list = parseWith(ResticSnapshotListSchema, parseJson(trimmed, 'snapshot list'), 'snapshot list') ?? [];

  return list
    .map((entry, order) => ({ entry, order }))
    .sort((a, b) => Date.parse(a.entry.time) - Date.parse(b.entry.time) || a.order - b.order)
    .map(({ entry }) => {
      const snapshot: EngineSnapshot = {
        id: entry.id,
        time: new Date(entry.time),
        tags: entry.tags ?? [],
        paths: entry.paths ?? [],
      };
      if (entry.short_id) snapshot.shortId = entry.short_id;
      if (entry.hostname) snapshot.hostname = entry.hostname;
      if (entry.username) snapshot.username = entry.username;
      if (entry.parent) snapshot.parent = entry.parent;
      return snapshot;
    });
}

/**
 * Map one `backup --json` status line to a progress payload.
 * Returns undefined for anything that is not a status line.
 */
export function parseBackupProgress(line: string): BackupProgress | undefined {
  const result = BackupStatusSchema.safeParse(tryParseLine(line));
  if (!result.success) {
    return undefined;
  }
  const status = result.data;
  return {
    percentDone: status.percent_done,
    filesDone: status.files_done,
    totalFiles: status.total_files,
    bytesDone: status.bytes_done,
    totalBytes: status.total_bytes,
    currentFiles: status.current_files ?? [],
  };
}

/**
 * Find the summary message in `backup --json` output
 */
export function parseBackupSummary(stdout: string): BackupSummary | undefined {
  let summary: BackupSummary | undefined;
  for (const line of stdout.split('\n')) {
    const result = BackupMessageSchema.safeParse(tryParseLine(line));
    if (result.success && result.data.message_type === 'summary') {
      summary = result.data;
    }
  }
  return summary;
}

export function summaryToStats(summary: BackupSummary): SnapshotStats {
  return {
    filesNew: summary.files_new,
    filesChanged: summary.files_changed,
    filesUnmodified: summary.files_unmodified,
    dirsNew: summary.dirs_new,
    dirsChanged: summary.dirs_changed,
    dirsUnmodified: summary.dirs_unmodified,
    dataAdded: summary.data_added,
    totalFilesProcessed: summary.total_files_processed,
    totalBytesProcessed: summary.total_bytes_processed,
    durationSeconds: summary.total_duration,
  };
}

/**
 * `restic diff --json`: one JSON object per line.
 * `+` added, `-` removed, `M` modified; other messages are skipped.
 */
export function parseDiffOutput(stdout: string): SnapshotDiffResult {
  const diff: SnapshotDiffResult = { added: [], removed: [], modified: [] };

  for (const line of stdout.split('\n')) {
    const result = DiffEntrySchema.safeParse(tryParseLine(line));
    if (!result.success) {
      continue;
    }
    const { path, modifier } = result.data;
    if (modifier === '+') {
      diff.added.push(path);
    } else if (modifier === '-') {
      diff.removed.push(path);
    } else if (modifier === 'M') {
      diff.modified.push(path);
    }
  }

  return diff;
}

/**
 * `restic forget --json`: groups, each with an optional `remove` list
 */
export function parseForgetOutput(stdout: string): string[] {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) {
    return [];
  }
  const groups = parseWith(ForgetResultSchema, parseJson(trimmed, 'forget output'), 'forget output') ?? [];
  return groups.flatMap((group) => (group.remove ?? []).map((snapshot) => snapshot.id));
}

export function parseRepoStats(stdout: string): RepositoryStats {
  const stats = parseWith(RepoStatsSchema, parseJson(stdout.trim(), 'repository stats'), 'repository stats');
  const result: RepositoryStats = {
    totalSize: stats.total_size,
    totalFileCount: stats.total_file_count,
  };
  if (stats.snapshots_count !== undefined) {
    result.snapshotsCount = stats.snapshots_count;
  }
  return result;
}

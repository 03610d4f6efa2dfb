/**
 * Default values shared across packages.
 *
 * Components import from here instead of defining inline constants.
 */

import type { MonitorConfig, RetentionPolicy } from './types.js';

export const DEFAULT_RETENTION_POLICY: Readonly<RetentionPolicy> = {
  keepLast: 10,
  keepHourly: 24,
  keepDaily: 7,
  keepWeekly: 4,
  keepMonthly: 12,
  keepYearly: 5,
};

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  '*.tmp',
  '*.swp',
  '*.lock',
  '.DS_Store',
  '__pycache__',
];

export const DEFAULT_MONITOR_CONFIG: Readonly<MonitorConfig> = {
  autoSnapshotThreshold: 50,
  autoSnapshotIntervalMs: 60 * 60 * 1000,
  debounceMs: 30_000,
  ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
  tickMs: 1_000,
};

export const SCHEDULER_DEFAULTS = {
  /** How often the scheduler checks whether a run is due (60s) */
  checkIntervalMs: 60_000,
} as const;

export const LOOP_DEFAULTS = {
  /** Max time stop() waits for a background loop to finish (5s) */
  joinTimeoutMs: 5_000,
} as const;

export const METADATA_DEFAULTS = {
  /** Relative to the repository directory */
  directory: 'metadata',
  fileName: 'metadata.db',
  retainDays: 365,
  recentLimit: 10,
  searchLimit: 50,
} as const;

/** Prefix of the engine tag that carries a snapshot message */
export const MESSAGE_TAG_PREFIX = 'message:';

export const DEFAULT_CONFIG_PATH = '.snaptrail/config.yml';

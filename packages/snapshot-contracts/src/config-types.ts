/**
 * Resolved configuration (paths absolute, durations in milliseconds)
 */

import type { LogLevel } from './logger.js';
import type { MonitorConfig, RetentionPolicy } from './types.js';

export interface MetadataConfig {
  /** Absolute path of the SQLite file */
  path: string;
  /** Records older than this are removed by cleanupMetadata() */
  retainDays: number;
}

export interface SnapTrailConfig {
  name: string;
  /** Absolute, glob-expanded */
  sourcePaths: string[];
  repository: string;
  passwordFile?: string;
  passwordEnv?: string;
  /** Cadence string as written; undefined = no scheduled snapshots */
  schedule?: string;
  retention: RetentionPolicy;
  exclude: string[];
  include: string[];
  monitor: MonitorConfig;
  metadata: MetadataConfig;
  logLevel: LogLevel;
}

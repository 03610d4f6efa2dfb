/**
 * Zod schemas for the configuration file
 *
 * Provides runtime validation for configs loaded from YAML
 */

import { z } from 'zod';
import { DEFAULT_IGNORE_PATTERNS, DEFAULT_RETENTION_POLICY, METADATA_DEFAULTS } from './defaults.js';

const count = z.number().int().min(0);

/**
 * Retention bucket counts
 */
export const RetentionPolicySchema = z.object({
  keepLast: count.default(DEFAULT_RETENTION_POLICY.keepLast),
  keepHourly: count.default(DEFAULT_RETENTION_POLICY.keepHourly),
  keepDaily: count.default(DEFAULT_RETENTION_POLICY.keepDaily),
  keepWeekly: count.default(DEFAULT_RETENTION_POLICY.keepWeekly),
  keepMonthly: count.default(DEFAULT_RETENTION_POLICY.keepMonthly),
  keepYearly: count.default(DEFAULT_RETENTION_POLICY.keepYearly),
});

/**
 * Monitor section as written in the file (human units)
 */
export const MonitorFileConfigSchema = z.object({
  autoSnapshotThreshold: z.number().int().positive().default(50),
  /** Cadence string, e.g. "1h" */
  autoSnapshotInterval: z.string().min(1).default('1h'),
  debounceSeconds: z.number().min(0).default(30),
  ignorePatterns: z.array(z.string()).default([...DEFAULT_IGNORE_PATTERNS]),
  tickSeconds: z.number().positive().default(1),
});

export const MetadataFileConfigSchema = z.object({
  /** SQLite file; defaults to <repository>/metadata/metadata.db */
  path: z.string().min(1).optional(),
  retainDays: z.number().int().positive().default(METADATA_DEFAULTS.retainDays),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Complete configuration file schema
 */
export const SnapTrailConfigSchema = z
  .object({
    name: z.string().min(1),
    sourcePaths: z.array(z.string().min(1)).min(1, 'At least one source path is required'),
    repository: z.string().min(1),
    passwordFile: z.string().min(1).optional(),
    /** Name of the environment variable holding the repository password */
    passwordEnv: z.string().min(1).optional(),
    /** Cadence for scheduled snapshots, e.g. "1h"; omitted = no schedule */
    schedule: z.string().optional(),
    retention: RetentionPolicySchema.default({}),
    exclude: z.array(z.string()).default([]),
    include: z.array(z.string()).default([]),
    monitor: MonitorFileConfigSchema.default({}),
    metadata: MetadataFileConfigSchema.default({}),
    logLevel: LogLevelSchema.default('info'),
  })
  .refine((config) => Boolean(config.passwordFile ?? config.passwordEnv), {
    message: 'Must specify either passwordFile or passwordEnv',
    path: ['passwordFile'],
  });

export type SnapTrailFileConfig = z.infer<typeof SnapTrailConfigSchema>;

/**
 * Parse and validate configuration file contents
 */
export function parseFileConfig(data: unknown): SnapTrailFileConfig {
  return SnapTrailConfigSchema.parse(data);
}

/**
 * Validate configuration without throwing
 */
export function validateFileConfig(data: unknown): {
  success: boolean;
  data?: SnapTrailFileConfig;
  error?: z.ZodError;
} {
  const result = SnapTrailConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

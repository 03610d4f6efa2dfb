// ============================================
// snaptrail - Shared Contracts
// ============================================

// Domain Types
export type {
  FileChangeType,
  FileChange,
  SnapshotStats,
  SnapshotMetadata,
  RetentionPolicy,
  ChangeEventType,
  PendingChange,
  MonitorConfig,
  TriggerReason,
} from './types.js';

// Engine Contract
export type {
  BackupEngine,
  EngineSnapshot,
  CreateSnapshotRequest,
  CreateSnapshotResult,
  BackupProgress,
  RestoreRequest,
  SnapshotDiffResult,
  EngineRetentionArgs,
  ForgetOptions,
  RepositoryStats,
} from './engine.js';

// Configuration
export type { SnapTrailConfig, MetadataConfig } from './config-types.js';
export {
  RetentionPolicySchema,
  MonitorFileConfigSchema,
  MetadataFileConfigSchema,
  LogLevelSchema,
  SnapTrailConfigSchema,
  parseFileConfig,
  validateFileConfig,
} from './config-schemas.js';
export type { SnapTrailFileConfig } from './config-schemas.js';

// Defaults
export {
  DEFAULT_RETENTION_POLICY,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_MONITOR_CONFIG,
  SCHEDULER_DEFAULTS,
  LOOP_DEFAULTS,
  METADATA_DEFAULTS,
  MESSAGE_TAG_PREFIX,
  DEFAULT_CONFIG_PATH,
} from './defaults.js';

// Errors
export {
  SnapTrailError,
  ValidationError,
  EngineError,
  StorageError,
  SnapshotRefError,
  InvalidStateError,
  ConfigError,
  isSnapTrailError,
  toErrorMessage,
  toError,
} from './errors.js';
export type { SnapTrailErrorCode, SnapTrailErrorOptions, RefFailureReason } from './errors.js';

// Logging
export { createConsoleLogger, noopLogger } from './logger.js';
export type { ILogger, LogLevel, LogMeta, LogSink, ConsoleLoggerOptions } from './logger.js';

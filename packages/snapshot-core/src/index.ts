/**
 * @snaptrail/snapshot-core
 *
 * Snapshot lifecycle: references, retention, change coalescing, scheduling
 * and the orchestrator tying them to an engine and a metadata store.
 */

// Orchestrator
export { BackupOrchestrator } from './orchestrator.js';
export type {
  BackupOrchestratorOptions,
  OrchestratorConfig,
  SnapshotOptions,
  SnapshotResult,
  RestoreOptions,
  ForgetRequest,
  ForgetResult,
  PendingChangeSource,
  BackupStatus,
  RecentSnapshotSummary,
} from './orchestrator.js';

// References
export {
  SNAPSHOT_ID_PATTERN,
  looksLikeSnapshotId,
  normalizeSnapshotId,
  resolveRef,
  resolveSnapshotRef,
} from './ref-resolver.js';

// Retention
export { RetentionEngine, toEngineArgs } from './retention.js';
export type { RetentionRunOptions, RetentionResult } from './retention.js';

// Monitor
export { ChangeCoalescer } from './monitor/change-coalescer.js';
export type {
  ChangeCoalescerOptions,
  CoalescerState,
  CoalescerStatus,
  EvaluationOutcome,
  SnapshotSink,
  SnapshotSinkRequest,
} from './monitor/change-coalescer.js';
export { FileMonitor, nodeWatch } from './monitor/file-monitor.js';
export type {
  FileMonitorOptions,
  FileMonitorStatus,
  RawWatchEvent,
  WatchFactory,
  WatchHandle,
} from './monitor/file-monitor.js';

// Scheduler
export { parseCadence } from './scheduler/cadence.js';
export { SnapshotScheduler } from './scheduler/scheduler.js';
export type {
  ScheduledSnapshotTarget,
  SnapshotSchedulerOptions,
  ScheduleOutcome,
  SchedulerStatus,
} from './scheduler/scheduler.js';

// Configuration
export { loadConfig, parseConfig, expandHome, isRemoteRepository } from './config/load-config.js';

// Daemon
export { createDaemon, SnapTrailDaemon } from './daemon.js';
export type { CreateDaemonOptions, DaemonStatus } from './daemon.js';

// Utilities
export { SerialQueue } from './utils/serial-queue.js';
export { BackgroundLoop } from './utils/background-loop.js';
export type { BackgroundLoopOptions } from './utils/background-loop.js';

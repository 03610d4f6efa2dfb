/**
 * Backup engine adapters
 */

export { ResticEngine } from './restic-engine.js';
export type { ResticEngineOptions } from './restic-engine.js';
export { spawnCommand } from './command-runner.js';
export type { CommandRunner, CommandRequest, CommandResult } from './command-runner.js';
export {
  parseSnapshotList,
  parseBackupProgress,
  parseBackupSummary,
  summaryToStats,
  parseDiffOutput,
  parseForgetOutput,
  parseRepoStats,
} from './restic-output.js';
export type { BackupSummary } from './restic-output.js';

/**
 * BackupEngine implementation that drives the restic CLI
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { EngineError, isSnapTrailError, noopLogger, toErrorMessage } from '@snaptrail/snapshot-contracts';
import type {
  BackupEngine,
  CreateSnapshotRequest,
  CreateSnapshotResult,
  EngineRetentionArgs,
  EngineSnapshot,
  ForgetOptions,
  ILogger,
  RepositoryStats,
  RestoreRequest,
  SnapshotDiffResult,
} from '@snaptrail/snapshot-contracts';
import { spawnCommand } from './command-runner.js';
import type { CommandResult, CommandRunner } from './command-runner.js';
import {
  parseBackupProgress,
  parseBackupSummary,
  parseDiffOutput,
  parseForgetOutput,
  parseRepoStats,
  parseSnapshotList,
  summaryToStats,
} from './restic-output.js';

export interface ResticEngineOptions {
  /** Repository location (RESTIC_REPOSITORY) */
  repository: string;
  passwordFile?: string;
  /** Name of the environment variable that holds the password */
  passwordEnv?: string;
  /** Default: 'restic' (resolved through PATH) */
  binary?: string;
  runner?: CommandRunner;
  /** Base environment; default process.env */
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
}

const RETENTION_FLAGS: Array<[keyof EngineRetentionArgs, string]> = [
  ['last', '--keep-last'],
  ['hourly', '--keep-hourly'],
  ['daily', '--keep-daily'],
  ['weekly', '--keep-weekly'],
  ['monthly', '--keep-monthly'],
  ['yearly', '--keep-yearly'],
];

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Restic Engine
 *
 * Every call spawns one restic process; output is requested as JSON and
 * validated before it reaches the rest of the system.
 */
export class ResticEngine implements BackupEngine {
  readonly repository: string;
  private readonly passwordFile?: string;
  private readonly passwordEnv?: string;
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly logger: ILogger;

  constructor(options: ResticEngineOptions) {
    this.repository = options.repository;
    this.passwordFile = options.passwordFile;
    this.passwordEnv = options.passwordEnv;
    this.binary = options.binary ?? 'restic';
    this.runner = options.runner ?? spawnCommand;
    this.baseEnv = options.env ?? process.env;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Initialize the repository unless `restic cat config` succeeds
   */
  async ensureRepository(): Promise<void> {
    try {
      await this.run(['cat', 'config']);
      return;
    } catch (error) {
      if (!isSnapTrailError(error) || error.details?.['missingBinary'] === true) {
        throw error;
      }
    }

    this.logger.info(`Repository doesn't exist, initializing at ${this.repository}`);
    // Remote backends (s3:, sftp:, rest:) have no local parent directory
    if (!this.repository.includes(':')) {
      fs.mkdirSync(path.dirname(this.repository), { recursive: true });
    }
    await this.run(['init']);
    this.logger.info(`Initialized restic repository at ${this.repository}`);
  }

  async createSnapshot(request: CreateSnapshotRequest): Promise<CreateSnapshotResult> {
    const args = ['backup', ...request.paths];
    for (const tag of request.tags) {
      args.push('--tag', tag);
    }
    for (const pattern of request.excludes) {
      args.push('--exclude', pattern);
    }
    for (const pattern of request.includes) {
      args.push('--include', pattern);
    }
    args.push('--json');

    const onProgress = request.onProgress;
    const result = await this.run(
      args,
      onProgress
        ? (line) => {
            const progress = parseBackupProgress(line);
            if (progress) {
              onProgress(progress);
            }
          }
        : undefined
    );

    const summary = parseBackupSummary(result.stdout);
    if (!summary?.snapshot_id) {
      throw new EngineError('No snapshot ID returned from backup', {
        command: this.describe(args),
        details: { stdout: result.stdout.slice(-500) },
      });
    }

    this.logger.info(`Backup completed with snapshot ID: ${summary.snapshot_id}`);
    return { snapshotId: summary.snapshot_id, stats: summaryToStats(summary) };
  }

  async restoreSnapshot(snapshotId: string, target: string, request: RestoreRequest = {}): Promise<void> {
    const args = ['restore', snapshotId, '--target', target];
    for (const selected of request.paths ?? []) {
      args.push('--include', selected);
    }
    for (const pattern of request.exclude ?? []) {
      args.push('--exclude', pattern);
    }
    for (const pattern of request.include ?? []) {
      args.push('--include', pattern);
    }
    if (request.verify) {
      args.push('--verify');
    }

    await this.run(args);
    this.logger.info(`Restored snapshot ${snapshotId} to ${target}`);
  }

  async listSnapshots(): Promise<EngineSnapshot[]> {
    const result = await this.run(['snapshots', '--json']);
    return parseSnapshotList(result.stdout);
  }

  async diffSnapshots(from: string, to: string): Promise<SnapshotDiffResult> {
    const result = await this.run(['diff', '--json', from, to]);
    return parseDiffOutput(result.stdout);
  }

  async forgetByPolicy(retention: EngineRetentionArgs, options: ForgetOptions): Promise<string[]> {
    const args = ['forget'];
    for (const [key, flag] of RETENTION_FLAGS) {
      const value = retention[key];
      if (value !== undefined) {
        args.push(flag, String(value));
      }
    }
    this.pushForgetFlags(args, options);
    args.push('--json');

    const result = await this.run(args);
    const removed = parseForgetOutput(result.stdout);
    this.logger.info(`${options.dryRun ? 'Would remove' : 'Removed'} ${removed.length} snapshots`);
    return removed;
  }

  async forgetSnapshots(snapshotIds: string[], options: ForgetOptions): Promise<string[]> {
    if (snapshotIds.length === 0) {
      return [];
    }
    const args = ['forget', ...snapshotIds];
    this.pushForgetFlags(args, options);

    await this.run(args);
    return [...snapshotIds];
  }

  async repoStats(): Promise<RepositoryStats> {
    const result = await this.run(['stats', '--json']);
    return parseRepoStats(result.stdout);
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.run(['check']);
      this.logger.info('Repository check passed');
      return true;
    } catch (error) {
      this.logger.error('Repository check failed', error instanceof Error ? error : undefined);
      return false;
    }
  }

  async resolveKnownTag(tag: string): Promise<string | undefined> {
    const result = await this.run(['snapshots', '--json', '--tag', tag]);
    const listing = parseSnapshotList(result.stdout);
    return listing[listing.length - 1]?.id;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  private pushForgetFlags(args: string[], options: ForgetOptions): void {
    if (options.dryRun) {
      args.push('--dry-run');
    }
    if (options.prune ?? true) {
      args.push('--prune');
    }
  }

  private describe(args: string[]): string {
    return [this.binary, ...args].join(' ');
  }

  /**
   * Environment for the child process: repository plus password source
   */
  private buildEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...this.baseEnv, RESTIC_REPOSITORY: this.repository };

    if (this.passwordFile) {
      env['RESTIC_PASSWORD_FILE'] = this.passwordFile;
      return env;
    }
    if (this.passwordEnv) {
      const password = this.baseEnv[this.passwordEnv];
      if (!password) {
        throw new EngineError(`Environment variable ${this.passwordEnv} is not set`);
      }
      env['RESTIC_PASSWORD'] = password;
      return env;
    }
    throw new EngineError('No password file or password environment variable configured');
  }

  private async run(args: string[], onStdoutLine?: (line: string) => void): Promise<CommandResult> {
    const command = this.describe(args);
    const env = this.buildEnv();
    this.logger.debug('Running restic command', { command });

    let result: CommandResult;
    try {
      result = await this.runner({ command: this.binary, args, env, onStdoutLine });
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new EngineError('Restic binary not found. Please install restic first.', {
          command,
          cause: error,
          details: { missingBinary: true },
        });
      }
      throw new EngineError(`Failed to run restic: ${toErrorMessage(error)}`, { command, cause: error });
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new EngineError(`Restic command failed (exit ${result.exitCode}): ${stderr}`, {
        command,
        stderr,
      });
    }

    return result;
  }
}

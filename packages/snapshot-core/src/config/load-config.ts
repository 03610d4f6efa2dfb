/**
 * Configuration loading: YAML file -> validated, resolved SnapTrailConfig
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { glob, hasMagic } from 'glob';
import { parse as parseYAML } from 'yaml';
import {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  METADATA_DEFAULTS,
  toErrorMessage,
  validateFileConfig,
} from '@snaptrail/snapshot-contracts';
import type { SnapTrailConfig } from '@snaptrail/snapshot-contracts';
import { parseCadence } from '../scheduler/cadence.js';

/** `s3:bucket`, `sftp:host:/path`, `rest:http://...` */
const REMOTE_REPOSITORY_PATTERN = /^[a-z][a-z0-9+.-]+:/i;

export function isRemoteRepository(repository: string): boolean {
  return REMOTE_REPOSITORY_PATTERN.test(repository);
}

export function expandHome(p: string): string {
  if (p === '~') {
    return os.homedir();
  }
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function resolvePath(p: string, baseDir: string): string {
  return path.resolve(baseDir, expandHome(p));
}

/**
 * Expand glob patterns; plain paths are kept even when missing
 */
async function expandSourcePaths(patterns: string[], baseDir: string): Promise<string[]> {
  const expanded: string[] = [];
  for (const pattern of patterns) {
    const resolved = resolvePath(pattern, baseDir);
    if (!hasMagic(resolved)) {
      expanded.push(resolved);
      continue;
    }
    const matches = await glob(resolved, { absolute: true });
    expanded.push(...matches.sort());
  }
  return [...new Set(expanded)];
}

/**
 * Validate already-parsed configuration data.
 * Relative paths are resolved against `baseDir`.
 */
export async function parseConfig(data: unknown, baseDir: string): Promise<SnapTrailConfig> {
  const validation = validateFileConfig(data);
  if (!validation.success || !validation.data) {
    const errorMessages: string[] = [];
    for (const issue of validation.error?.errors ?? []) {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      errorMessages.push(`  • ${where}: ${issue.message}`);
    }
    throw new ConfigError(`Invalid configuration:\n${errorMessages.join('\n')}`, {
      details: { issues: validation.error?.errors ?? [] },
    });
  }
  const file = validation.data;

  const sourcePaths = await expandSourcePaths(file.sourcePaths, baseDir);
  if (sourcePaths.length === 0) {
    throw new ConfigError('No source paths matched the configured patterns', {
      details: { sourcePaths: file.sourcePaths },
    });
  }

  const remote = isRemoteRepository(file.repository);
  const repository = remote ? file.repository : resolvePath(file.repository, baseDir);
  const metadataPath = file.metadata.path
    ? resolvePath(file.metadata.path, baseDir)
    : path.join(remote ? baseDir : repository, METADATA_DEFAULTS.directory, METADATA_DEFAULTS.fileName);

  const config: SnapTrailConfig = {
    name: file.name,
    sourcePaths,
    repository,
    retention: file.retention,
    exclude: file.exclude,
    include: file.include,
    monitor: {
      autoSnapshotThreshold: file.monitor.autoSnapshotThreshold,
      autoSnapshotIntervalMs: parseCadence(file.monitor.autoSnapshotInterval),
      debounceMs: file.monitor.debounceSeconds * 1000,
      ignorePatterns: file.monitor.ignorePatterns,
      tickMs: file.monitor.tickSeconds * 1000,
    },
    metadata: {
      path: metadataPath,
      retainDays: file.metadata.retainDays,
    },
    logLevel: file.logLevel,
  };
  if (file.passwordFile) {
    config.passwordFile = resolvePath(file.passwordFile, baseDir);
  }
  if (file.passwordEnv) {
    config.passwordEnv = file.passwordEnv;
  }
  const schedule = file.schedule?.trim();
  if (schedule) {
    config.schedule = schedule;
  }
  return config;
}

/**
 * Read and resolve a YAML configuration file
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<SnapTrailConfig> {
  const absolute = path.resolve(expandHome(configPath));

  let content: string;
  try {
    content = await fs.readFile(absolute, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file not found: ${absolute}`, {
      cause: error,
      details: { path: absolute },
    });
  }

  let data: unknown;
  try {
    data = parseYAML(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${absolute}: ${toErrorMessage(error)}`, {
      cause: error,
      details: { path: absolute },
    });
  }

  return parseConfig(data, path.dirname(absolute));
}

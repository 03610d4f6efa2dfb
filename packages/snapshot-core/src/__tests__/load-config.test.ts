/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError, DEFAULT_IGNORE_PATTERNS } from '@snaptrail/snapshot-contracts';
import { expandHome, isRemoteRepository, loadConfig, parseConfig } from '../config/load-config.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snaptrail-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: string): string => {
    const file = path.join(dir, 'config.yml');
    fs.writeFileSync(file, content);
    return file;
  };

  it('should resolve paths, expand globs and convert durations', async () => {
    fs.mkdirSync(path.join(dir, 'notes'));
    fs.mkdirSync(path.join(dir, 'projects', 'beta'), { recursive: true });
    fs.mkdirSync(path.join(dir, 'projects', 'alpha'), { recursive: true });
    const file = writeConfig(
      [
        'name: docs',
        'sourcePaths:',
        '  - ./notes',
        '  - ./projects/*',
        'repository: ./repo',
        'passwordFile: ./password.txt',
        'schedule: " 2h "',
        'retention:',
        '  keepLast: 5',
        'exclude: ["*.log"]',
        'monitor:',
        '  autoSnapshotThreshold: 10',
        '  autoSnapshotInterval: 30m',
        '  debounceSeconds: 5',
        '',
      ].join('\n')
    );

    const config = await loadConfig(file);

    expect(config).toEqual({
      name: 'docs',
      sourcePaths: [
        path.join(dir, 'notes'),
        path.join(dir, 'projects', 'alpha'),
        path.join(dir, 'projects', 'beta'),
      ],
      repository: path.join(dir, 'repo'),
      passwordFile: path.join(dir, 'password.txt'),
      schedule: '2h',
      retention: { keepLast: 5, keepHourly: 24, keepDaily: 7, keepWeekly: 4, keepMonthly: 12, keepYearly: 5 },
      exclude: ['*.log'],
      include: [],
      monitor: {
        autoSnapshotThreshold: 10,
        autoSnapshotIntervalMs: 30 * 60 * 1000,
        debounceMs: 5000,
        ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
        tickMs: 1000,
      },
      metadata: { path: path.join(dir, 'repo', 'metadata', 'metadata.db'), retainDays: 365 },
      logLevel: 'info',
    });
  });

  it('should fail with ConfigError when the file is missing', async () => {
    const file = path.join(dir, 'absent.yml');

    await expect(loadConfig(file)).rejects.toThrow(`Configuration file not found: ${file}`);
  });

  it('should fail with ConfigError on malformed YAML', async () => {
    const file = writeConfig('name: [unclosed\n');

    await expect(loadConfig(file)).rejects.toThrow(ConfigError);
    await expect(loadConfig(file)).rejects.toThrow(/^Invalid YAML in /);
  });
});

describe('parseConfig', () => {
  const base = { name: 'docs', sourcePaths: ['/data'], repository: '/backups/repo', passwordEnv: 'SNAPTRAIL_PASSWORD' };

  it('should keep plain source paths that do not exist yet', async () => {
    const config = await parseConfig({ ...base, sourcePaths: ['./later'] }, '/work');

    expect(config.sourcePaths).toEqual([path.resolve('/work', 'later')]);
    expect(config.passwordEnv).toBe('SNAPTRAIL_PASSWORD');
    expect(config.passwordFile).toBeUndefined();
    expect(config.schedule).toBeUndefined();
  });

  it('should leave remote repositories untouched', async () => {
    const config = await parseConfig({ ...base, repository: 's3:bucket/backups' }, '/work/.snaptrail');

    expect(config.repository).toBe('s3:bucket/backups');
    expect(config.metadata.path).toBe(path.join('/work/.snaptrail', 'metadata', 'metadata.db'));
  });

  it('should honour an explicit metadata path', async () => {
    const config = await parseConfig({ ...base, metadata: { path: 'meta/history.db', retainDays: 30 } }, '/work');

    expect(config.metadata).toEqual({ path: path.resolve('/work', 'meta/history.db'), retainDays: 30 });
  });

  it('should list validation issues', async () => {
    const withoutPassword = { name: 'docs', sourcePaths: ['/data'], repository: '/backups/repo' };

    await expect(parseConfig(withoutPassword, '/work')).rejects.toThrow(
      'Invalid configuration:\n  • passwordFile: Must specify either passwordFile or passwordEnv'
    );
    await expect(parseConfig({ ...base, sourcePaths: [] }, '/work')).rejects.toThrow(
      '  • sourcePaths: At least one source path is required'
    );
  });

  it('should reject an unparseable monitor interval', async () => {
    await expect(parseConfig({ ...base, monitor: { autoSnapshotInterval: '1w' } }, '/work')).rejects.toThrow(
      'Invalid schedule format: "1w" (expected e.g. 30m, 1h, 2d)'
    );
  });

  it('should fail when no source path survives glob expansion', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snaptrail-glob-'));
    try {
      await expect(parseConfig({ ...base, sourcePaths: ['./nothing-*'] }, dir)).rejects.toThrow(
        'No source paths matched the configured patterns'
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('path helpers', () => {
  it('should expand the home directory', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/backups')).toBe(path.join(os.homedir(), 'backups'));
    expect(expandHome('/tmp/~x')).toBe('/tmp/~x');
  });

  it.each([
    ['s3:bucket/path', true],
    ['sftp:user@host:/srv/repo', true],
    ['rest:http://localhost:8000/', true],
    ['/var/backups/repo', false],
    ['./repo', false],
  ])('isRemoteRepository(%j) -> %j', (repository, expected) => {
    expect(isRemoteRepository(repository)).toBe(expected);
  });
});

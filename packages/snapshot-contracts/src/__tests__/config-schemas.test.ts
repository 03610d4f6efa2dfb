/**
 * Unit tests for configuration schemas
 */

import { describe, it, expect } from 'vitest';
import { parseFileConfig, validateFileConfig } from '../config-schemas.js';

const minimal = {
  name: 'documents',
  sourcePaths: ['~/Documents'],
  repository: '/backups/repo',
  passwordFile: '/secrets/restic.key',
};

describe('SnapTrailConfigSchema', () => {
  it('should fill defaults for optional sections', () => {
    const config = parseFileConfig(minimal);

    expect(config.retention).toEqual({
      keepLast: 10,
      keepHourly: 24,
      keepDaily: 7,
      keepWeekly: 4,
      keepMonthly: 12,
      keepYearly: 5,
    });
    expect(config.monitor.autoSnapshotThreshold).toBe(50);
    expect(config.monitor.autoSnapshotInterval).toBe('1h');
    expect(config.monitor.debounceSeconds).toBe(30);
    expect(config.metadata.retainDays).toBe(365);
    expect(config.exclude).toEqual([]);
    expect(config.logLevel).toBe('info');
    expect(config.schedule).toBeUndefined();
  });

  it('should require a password source', () => {
    const { passwordFile: _ignored, ...withoutPassword } = minimal;
    const result = validateFileConfig(withoutPassword);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Must specify either passwordFile or passwordEnv');
  });

  it('should accept passwordEnv instead of passwordFile', () => {
    const { passwordFile: _ignored, ...withoutPassword } = minimal;
    const result = validateFileConfig({ ...withoutPassword, passwordEnv: 'RESTIC_PASSWORD' });

    expect(result.success).toBe(true);
  });

  it('should reject negative retention counts', () => {
    const result = validateFileConfig({ ...minimal, retention: { keepLast: -1 } });

    expect(result.success).toBe(false);
  });

  it('should reject an empty source list', () => {
    const result = validateFileConfig({ ...minimal, sourcePaths: [] });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('At least one source path is required');
  });
});

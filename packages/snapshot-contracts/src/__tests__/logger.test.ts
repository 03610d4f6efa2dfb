/**
 * Unit tests for the console logger
 */

import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger } from '../logger.js';
import type { LogSink } from '../logger.js';

function createSink(): LogSink & { lines: Array<[string, string]> } {
  const lines: Array<[string, string]> = [];
  return {
    lines,
    write: vi.fn((level: string, line: string) => {
      lines.push([level, line]);
    }),
  };
}

describe('createConsoleLogger', () => {
  it('should prefix lines with scope and level', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ scope: 'monitor', sink });

    logger.info('Monitoring started');

    expect(sink.lines).toEqual([['info', '[monitor] INFO Monitoring started']]);
  });

  it('should render meta as JSON', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });

    logger.warn('Change detection failed', { snapshotId: 'abc', attempt: 2 });

    expect(sink.lines).toEqual([
      ['warn', 'WARN Change detection failed {"snapshotId":"abc","attempt":2}'],
    ]);
  });

  it('should drop messages below the configured level', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'warn', sink });

    logger.debug('noise');
    logger.info('still noise');
    logger.error('Save failed', new Error('disk full'));

    expect(sink.lines).toEqual([['error', 'ERROR Save failed: disk full']]);
  });

  it('should emit nothing when silent', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'silent', sink });

    logger.error('ignored');

    expect(sink.write).not.toHaveBeenCalled();
  });
});

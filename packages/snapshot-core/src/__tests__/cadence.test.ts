import { describe, it, expect } from 'vitest';
import { ConfigError } from '@snaptrail/snapshot-contracts';
import { parseCadence } from '../scheduler/cadence.js';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

describe('parseCadence', () => {
  it.each([
    ['2h', 2 * HOUR],
    ['30m', 30 * MINUTE],
    ['1d', DAY],
    [' 1D ', DAY],
    ['12H', 12 * HOUR],
  ])('should parse %j', (expression, expected) => {
    expect(parseCadence(expression)).toBe(expected);
  });

  it.each(['abc', '5x', '', 'h', '1.5h', '-1h', '1 h'])('should reject %j', (expression) => {
    expect(() => parseCadence(expression)).toThrow(ConfigError);
  });

  it('should name the expected format in the error', () => {
    expect(() => parseCadence('5x')).toThrow('Invalid schedule format: "5x" (expected e.g. 30m, 1h, 2d)');
  });

  it('should reject a zero interval', () => {
    expect(() => parseCadence('0h')).toThrow('Schedule interval must be positive: "0h"');
  });
});

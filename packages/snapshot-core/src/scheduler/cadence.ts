/**
 * Cadence expressions: `<positive integer><unit>`, unit h | m | d.
 * Surrounding whitespace and letter case are ignored.
 */

import { ConfigError } from '@snaptrail/snapshot-contracts';

const CADENCE_PATTERN = /^(\d+)([hmd])$/;

const UNIT_MS: Record<string, number> = {
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parse a cadence into milliseconds
 */
export function parseCadence(expression: string): number {
  const normalized = expression.trim().toLowerCase();
  const match = CADENCE_PATTERN.exec(normalized);
  const amount = match?.[1];
  const unitMs = match?.[2] ? UNIT_MS[match[2]] : undefined;

  if (amount === undefined || unitMs === undefined) {
    throw new ConfigError(`Invalid schedule format: "${expression}" (expected e.g. 30m, 1h, 2d)`);
  }

  const value = Number.parseInt(amount, 10);
  if (value <= 0) {
    throw new ConfigError(`Schedule interval must be positive: "${expression}"`);
  }
  return value * unitMs;
}

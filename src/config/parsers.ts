/**
 * Configuration value parsers
 *
 * Used only where raw KEY=VALUE strings enter the process; everything past
 * config loading works with real booleans and minute counts.
 */

import { ConfigurationError } from '../utils/errors';

const TRUTHY = new Set(['true', 't', 'yes', 'y', '1']);

const MINUTES_PER_UNIT: Record<string, number> = {
  m: 1,
  h: 60,
  d: 1440,
};

const DURATION_PATTERN = /^(\d+)\s*([mhd])?$/i;

export function parseBool(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  return TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Parse "30", "30M", "2h", "7D" into minutes.
 */
export function parseDuration(value: string | undefined, key: string): number {
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`Missing required duration: ${key}`);
  }

  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid duration for ${key}: '${value}' (expected <integer>[M|H|D])`);
  }

  const amount = parseInt(match[1], 10);
  const unit = (match[2] ?? 'm').toLowerCase();
  return amount * MINUTES_PER_UNIT[unit];
}

/**
 * Positive integer or the fallback. Invalid and non-positive values are not an error.
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return fallback;
  }
  const parsed = parseInt(value.trim(), 10);
  return parsed > 0 ? parsed : fallback;
}

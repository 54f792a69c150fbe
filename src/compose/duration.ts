/**
 * Compose duration strings (`20s`, `1m30s`, `1.5s`, `250ms`) converted to milliseconds.
 */

import { Failure, Success, type Result } from '../domain/types/result.js';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

// `ms` must be tried before `m` and `s`
const DURATION_PART = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/g;
const DURATION_FULL = /^(?:\d+(?:\.\d+)?(?:ns|us|µs|ms|s|m|h))+$/;
const BARE_NUMBER = /^\d+(?:\.\d+)?$/;

/**
 * Parse a duration; a bare number counts as seconds
 */
export function parseDuration(value: string | number): Result<number> {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      return Failure(`Invalid duration: ${value}`);
    }
    return Success(Math.round(value * 1_000));
  }

  const text = value.trim();
  if (text === '') {
    return Failure('Invalid duration: empty value');
  }

  if (BARE_NUMBER.test(text)) {
    return Success(Math.round(Number(text) * 1_000));
  }

  if (!DURATION_FULL.test(text)) {
    return Failure(`Invalid duration: ${value}`);
  }

  let total = 0;
  for (const [, amount, unit] of text.matchAll(DURATION_PART)) {
    total += Number(amount) * (UNIT_MS[unit ?? 's'] ?? 0);
  }

  return Success(Math.round(total));
}

/**
 * Format milliseconds in the same compact grammar (`20s`, `1m30s`, `250ms`)
 */
export function formatDuration(ms: number): string {
  if (ms <= 0) return '0s';

  const parts: string[] = [];
  let remaining = Math.round(ms);

  const hours = Math.floor(remaining / 3_600_000);
  remaining -= hours * 3_600_000;
  const minutes = Math.floor(remaining / 60_000);
  remaining -= minutes * 60_000;
  const seconds = Math.floor(remaining / 1_000);
  remaining -= seconds * 1_000;

  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);
  if (remaining > 0) parts.push(`${remaining}ms`);

  return parts.join('');
}

/**
 * Health check resolution: declared text -> durations in milliseconds with Docker's defaults.
 */

import { DEFAULT_HEALTHCHECK } from '../config/defaults.js';
import { Failure, Success, type Result } from '../domain/types/result.js';
import type { HealthCheck, RawHealthCheck } from '../domain/types/compose.js';
import { parseDuration } from './duration.js';

function resolveDuration(
  value: string | number | undefined,
  fallback: number,
  field: string,
): Result<number> {
  if (value === undefined) return Success(fallback);
  const parsed = parseDuration(value);
  return parsed.ok ? parsed : Failure(`healthcheck.${field}: ${parsed.error}`);
}

/**
 * Normalize the `test` field; a plain string runs through the shell
 */
export function normalizeTest(test: string | string[] | undefined): string[] {
  if (test === undefined) return [];
  if (typeof test === 'string') return test.trim() === '' ? [] : ['CMD-SHELL', test];
  return [...test];
}

export function resolveHealthCheck(raw: RawHealthCheck): Result<HealthCheck> {
  const interval = resolveDuration(raw.interval, DEFAULT_HEALTHCHECK.intervalMs, 'interval');
  if (!interval.ok) return interval;
  const timeout = resolveDuration(raw.timeout, DEFAULT_HEALTHCHECK.timeoutMs, 'timeout');
  if (!timeout.ok) return timeout;
  const startPeriod = resolveDuration(
    raw.startPeriod,
    DEFAULT_HEALTHCHECK.startPeriodMs,
    'start_period',
  );
  if (!startPeriod.ok) return startPeriod;

  const retries = raw.retries ?? DEFAULT_HEALTHCHECK.retries;
  if (!Number.isInteger(retries) || retries < 0) {
    return Failure(`healthcheck.retries: must be a non-negative integer, got ${retries}`);
  }

  const test = normalizeTest(raw.test);

  return Success({
    test,
    intervalMs: interval.value,
    timeoutMs: timeout.value,
    retries,
    startPeriodMs: startPeriod.value,
    disabled: raw.disable === true || test[0] === 'NONE',
  });
}

/**
 * Longest a dependent may wait for this check before the orchestrator gives up
 */
export function readinessWindowMs(healthcheck: HealthCheck): number {
  return healthcheck.startPeriodMs + healthcheck.retries * (healthcheck.intervalMs + healthcheck.timeoutMs);
}

/**
 * Human-readable command, e.g. `mysqladmin ping -h localhost`
 */
export function describeTest(healthcheck: HealthCheck): string {
  const [kind, ...args] = healthcheck.test;
  if (kind === undefined) return '(inherited from image)';
  if (kind === 'NONE') return '(disabled)';
  if (kind === 'CMD' || kind === 'CMD-SHELL') return args.join(' ');
  return healthcheck.test.join(' ');
}

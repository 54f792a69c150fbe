/**
 * Shared field validators
 *
 * Zod validators for the topology generator options.
 */

import { z } from 'zod';
import { parseDuration } from '../compose/duration.js';

/**
 * Validates TCP/UDP port numbers within valid range
 */
export const portValidator = z.coerce
  .number()
  .int('Port must be an integer')
  .min(1, 'Port must be >= 1')
  .max(65535, 'Port must be <= 65535');

/**
 * Service, volume and network names as the orchestrator accepts them
 */
export const resourceNameValidator = z
  .string()
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'Must start with a letter or digit and contain only letters, digits, "_", "." or "-"');

/**
 * Compose duration text such as `20s` or `1m30s`
 */
export const durationValidator = z
  .string()
  .refine((value) => parseDuration(value).ok, (value) => ({ message: `Invalid duration: ${value}` }));

export const retriesValidator = z.coerce
  .number()
  .int('Retries must be an integer')
  .min(0, 'Retries must be >= 0');

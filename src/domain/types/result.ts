/**
 * Result pattern for expected failures (bad YAML, malformed port text, unreadable files).
 */

/**
 * Result type - simple discriminated union
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

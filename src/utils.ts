/**
 * Common utility functions used across the sync core.
 */

/**
 * Generate a UUID v4 (random UUID).
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Promise-based sleep.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Full-jitter exponential backoff: a uniformly random delay in
 * `[0, min(maxMs, baseMs * 2^attempt))`.
 *
 * @param attempt - Zero-based reconnect attempt.
 * @param random  - Source of randomness in `[0, 1)`; injectable for tests.
 */
export function fullJitterDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(maxMs, baseMs * 2 ** attempt);
  return Math.floor(random() * ceiling);
}

/**
 * Structural equality for plain JSON-like values (objects, arrays, primitives).
 *
 * Used to skip no-op writes so that applying the same remote change twice
 * leaves the local store (and its observers) untouched.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  if (!isRecord(a) || !isRecord(b)) return false;
  /* Keys holding `undefined` count as absent. */
  const aKeys = Object.keys(a).filter((k) => a[k] !== undefined);
  const bKeys = Object.keys(b).filter((k) => b[k] !== undefined);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((k) => deepEqual(a[k], b[k]));
}

/**
 * Narrow an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a snake_case string to camelCase.
 *
 * @example
 * snakeToCamel('participant_ids'); // 'participantIds'
 */
export function snakeToCamel(s: string): string {
  return s.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Convert a camelCase string to snake_case.
 *
 * @example
 * camelToSnake('serverUpdatedAt'); // 'server_updated_at'
 */
export function camelToSnake(s: string): string {
  return s.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

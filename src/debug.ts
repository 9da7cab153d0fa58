/**
 * @fileoverview Opt-in debug logging
 *
 * Every call is dropped unless debug mode is on. Debug mode comes from
 * {@link setDebugMode}, or from `<PREFIX>_DEBUG_MODE=true` in the process
 * environment, where the prefix is the engine's (`murmur` by default):
 *
 * ```sh
 * MURMUR_DEBUG_MODE=true node app.js
 * ```
 *
 * Messages start with a bracketed area tag (`[SYNC]`, `[QUEUE]`,
 * `[RECONCILE]`, `[PRESENCE]`, ...).
 */

type Level = 'log' | 'warn' | 'error';

/** `null` until the environment has been read. */
let enabled: boolean | null = null;
let prefix = 'murmur';

/**
 * Set the prefix of the environment flag; the flag is re-read on the next call.
 *
 * @internal Called by `initEngine`.
 */
export function _setDebugPrefix(next: string) {
  if (next === prefix) return;
  prefix = next;
  enabled = null;
}

export function isDebugMode(): boolean {
  if (enabled === null) {
    enabled = typeof process !== 'undefined' && process.env[`${prefix.toUpperCase()}_DEBUG_MODE`] === 'true';
  }
  return enabled;
}

/** Override the environment flag for the rest of the process. */
export function setDebugMode(on: boolean) {
  enabled = on;
}

/**
 * Log at the given console level when debug mode is on.
 *
 * @example
 * debug('warn', '[QUEUE] Retry 2 for set conversations/c1');
 */
export function debug(level: Level, ...args: unknown[]): void {
  if (isDebugMode()) console[level](...args);
}

export const debugLog = (...args: unknown[]) => debug('log', ...args);
export const debugWarn = (...args: unknown[]) => debug('warn', ...args);
export const debugError = (...args: unknown[]) => debug('error', ...args);

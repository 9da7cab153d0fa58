/**
 * @fileoverview Engine Configuration
 *
 * Central configuration hub for the sync core. {@link initEngine} (in
 * {@link engine.ts}) is the first function consumers call. It accepts a
 * {@link MurmurConfig} object that describes:
 *   - Who the local user is
 *   - Which remote store to talk to (a ready {@link RemoteStore}, or a Supabase
 *     client the engine wraps)
 *   - Where the local database lives
 *   - Presence and retry timings
 *
 * The resolved config is stored as a module-level singleton and read by the
 * engine through {@link getEngineConfig}. Components themselves receive the
 * values they need as explicit arguments so they can be built in isolation.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { RemoteStore } from './remote/types';
import type { MediaUploader } from './data';
import type { NetworkStore } from './stores/network';
import type { SyncStatusStore } from './stores/sync';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Top-level configuration for the sync core.
 *
 * Only `userId` and one of `remote`/`supabase` are required.
 *
 * @example
 * initEngine({
 *   prefix: 'murmur',
 *   userId: 'u1',
 *   supabase: createClient(url, key),
 *   heartbeatIntervalMs: 30_000,
 * });
 */
export interface MurmurConfig {
  /** Application prefix: debug env flag, default database name. Default `'murmur'`. */
  prefix?: string;
  /** The signed-in user. */
  userId: string;

  /** A ready remote store. Takes precedence over `supabase`. */
  remote?: RemoteStore;
  /** Supabase client; wrapped in the Postgres/Realtime adapter when `remote` is absent. */
  supabase?: SupabaseClient;

  database?: DatabaseOptions;

  /** Uploader used by {@link data.ts#sendMediaMessage} when none is passed per call. */
  mediaUploader?: MediaUploader;

  /** Connectivity source. Default: the shared `isOnline` store. */
  network?: NetworkStore;
  /** Status sink. Default: the shared `syncStatusStore`. */
  syncStatus?: SyncStatusStore;

  /** Typing indicator debounce after the last keystroke. Default: 3000. */
  typingDebounceMs?: number;
  /** Typing indicators older than this (by server write time) are hidden. Default: 6000. */
  typingTtlMs?: number;
  /** Online heartbeat period. Default: 60000. */
  heartbeatIntervalMs?: number;
  /** Waits between delivery attempts; length is the retry count. Default: [1000, 4000, 10000]. */
  retryDelaysMs?: number[];
  /** Re-read-and-reapply rounds on a version conflict. Default: 3. */
  maxConflictRetries?: number;
  /** Realtime reconnect backoff base. Default: 1000. */
  reconnectBaseMs?: number;
  /** Realtime reconnect backoff cap. Default: 30000. */
  reconnectMaxMs?: number;
  /** Conflict audit entries older than this are purged on start. Default: 30. */
  conflictHistoryMaxAgeDays?: number;

  /** Randomness in `[0, 1)` for reconnect jitter. Default: `Math.random`. */
  random?: () => number;
  /** Wall clock in epoch ms. Default: `Date.now`. */
  now?: () => number;
}

export interface DatabaseOptions {
  /** IndexedDB database name. Default: `${prefix}-db`. */
  name?: string;
  /** Alternative IndexedDB implementation (e.g. per-test factories). */
  indexedDB?: IDBFactory;
  IDBKeyRange?: typeof IDBKeyRange;
}

/** {@link MurmurConfig} with every default filled in. */
export interface ResolvedConfig {
  prefix: string;
  userId: string;
  remote?: RemoteStore;
  supabase?: SupabaseClient;
  database: DatabaseOptions & { name: string };
  mediaUploader?: MediaUploader;
  network?: NetworkStore;
  syncStatus?: SyncStatusStore;
  typingDebounceMs: number;
  typingTtlMs: number;
  heartbeatIntervalMs: number;
  retryDelaysMs: number[];
  maxConflictRetries: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  conflictHistoryMaxAgeDays: number;
  random: () => number;
  now: () => number;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_TYPING_DEBOUNCE_MS = 3000;
export const DEFAULT_TYPING_TTL_MS = 6000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 60_000;
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [1000, 4000, 10_000];
export const DEFAULT_MAX_CONFLICT_RETRIES = 3;
export const DEFAULT_RECONNECT_BASE_MS = 1000;
export const DEFAULT_RECONNECT_MAX_MS = 30_000;
export const DEFAULT_CONFLICT_HISTORY_MAX_AGE_DAYS = 30;

/**
 * Fill in defaults and validate the shape.
 *
 * @throws {Error} When `userId` is empty or a timing is negative.
 */
export function resolveConfig(config: MurmurConfig): ResolvedConfig {
  if (!config.userId) {
    throw new Error('MurmurConfig.userId is required');
  }
  const prefix = config.prefix ?? 'murmur';

  const resolved: ResolvedConfig = {
    prefix,
    userId: config.userId,
    remote: config.remote,
    supabase: config.supabase,
    database: { ...config.database, name: config.database?.name ?? `${prefix}-db` },
    mediaUploader: config.mediaUploader,
    network: config.network,
    syncStatus: config.syncStatus,
    typingDebounceMs: config.typingDebounceMs ?? DEFAULT_TYPING_DEBOUNCE_MS,
    typingTtlMs: config.typingTtlMs ?? DEFAULT_TYPING_TTL_MS,
    heartbeatIntervalMs: config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
    retryDelaysMs: [...(config.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS)],
    maxConflictRetries: config.maxConflictRetries ?? DEFAULT_MAX_CONFLICT_RETRIES,
    reconnectBaseMs: config.reconnectBaseMs ?? DEFAULT_RECONNECT_BASE_MS,
    reconnectMaxMs: config.reconnectMaxMs ?? DEFAULT_RECONNECT_MAX_MS,
    conflictHistoryMaxAgeDays: config.conflictHistoryMaxAgeDays ?? DEFAULT_CONFLICT_HISTORY_MAX_AGE_DAYS,
    random: config.random ?? Math.random,
    now: config.now ?? Date.now
  };

  const timings: Array<[string, number]> = [
    ['typingDebounceMs', resolved.typingDebounceMs],
    ['typingTtlMs', resolved.typingTtlMs],
    ['heartbeatIntervalMs', resolved.heartbeatIntervalMs],
    ['reconnectBaseMs', resolved.reconnectBaseMs],
    ['reconnectMaxMs', resolved.reconnectMaxMs],
    ...resolved.retryDelaysMs.map((ms, i): [string, number] => [`retryDelaysMs[${i}]`, ms])
  ];
  for (const [name, value] of timings) {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`MurmurConfig.${name} must be a non-negative number (got ${value})`);
    }
  }

  return resolved;
}

// =============================================================================
// Module State
// =============================================================================

/** Singleton engine configuration (set by {@link engine.ts#initEngine}). */
let engineConfig: ResolvedConfig | null = null;

/** @internal */
export function _setEngineConfig(config: ResolvedConfig | null): void {
  engineConfig = config;
}

/**
 * Get the current engine configuration.
 *
 * @throws {Error} If {@link engine.ts#initEngine} has not been called yet.
 */
export function getEngineConfig(): ResolvedConfig {
  if (!engineConfig) {
    throw new Error('Sync engine not initialized. Call initEngine() first.');
  }
  return engineConfig;
}

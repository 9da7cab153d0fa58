/**
 * Sync status store.
 *
 * Aggregate view of the write pipeline and the realtime hub for status UI.
 * Leaving `syncing` is held back until it has been on screen for
 * {@link MIN_SYNCING_MS}, so short drains do not flicker.
 */

import { writable, type Readable } from 'svelte/store';
import type { SyncStatus } from '../types';
import type { RemoteErrorCode } from '../errors';

/** An operation the pipeline gave up on. */
export interface SyncError {
  /** Remote document path of the operation. */
  entityKey: string;
  operation: string;
  code: RemoteErrorCode | 'upload';
  message: string;
  timestamp: string;
}

export type RealtimeState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface SyncState {
  status: SyncStatus;
  /** Rows waiting in the outbox. */
  pendingCount: number;
  lastError: string | null;
  lastErrorDetails: string | null;
  /** Newest last, at most {@link MAX_SYNC_ERRORS}. */
  syncErrors: SyncError[];
  lastSyncTime: string | null;
  realtimeState: RealtimeState;
}

export interface SyncStatusStore extends Readable<SyncState> {
  /** Current state without subscribing. */
  get(): SyncState;
  setStatus(status: SyncStatus): void;
  setPendingCount(count: number): void;
  setError(friendly: string | null, raw?: string | null): void;
  addSyncError(error: SyncError): void;
  clearSyncErrors(): void;
  setLastSyncTime(time: string): void;
  setRealtimeState(state: RealtimeState): void;
  reset(): void;
}

const MIN_SYNCING_MS = 500;
const MAX_SYNC_ERRORS = 10;

function initialState(): SyncState {
  return {
    status: 'idle',
    pendingCount: 0,
    lastError: null,
    lastErrorDetails: null,
    syncErrors: [],
    lastSyncTime: null,
    realtimeState: 'disconnected'
  };
}

export function createSyncStatusStore(): SyncStatusStore {
  const store = writable<SyncState>(initialState());
  let state = initialState();
  store.subscribe((next) => {
    state = next;
  });

  /* Last requested status; may still be waiting on the syncing hold */
  let requested: SyncStatus = 'idle';
  let syncingSince: number | null = null;
  let deferred: ReturnType<typeof setTimeout> | null = null;

  const patch = (changes: Partial<SyncState>) => store.update((s) => ({ ...s, ...changes }));

  function cancelDeferred() {
    if (deferred !== null) clearTimeout(deferred);
    deferred = null;
  }

  function settle(status: SyncStatus) {
    syncingSince = null;
    patch(status === 'idle' ? { status, lastError: null } : { status });
  }

  function setStatus(status: SyncStatus) {
    if (status === requested && status !== 'syncing') return;
    cancelDeferred();
    requested = status;

    if (status === 'syncing') {
      syncingSince = Date.now();
      patch({ status, lastError: null });
      return;
    }

    const shownFor = syncingSince === null ? MIN_SYNCING_MS : Date.now() - syncingSince;
    if (shownFor >= MIN_SYNCING_MS) {
      settle(status);
      return;
    }
    deferred = setTimeout(() => {
      deferred = null;
      settle(status);
    }, MIN_SYNCING_MS - shownFor);
  }

  return {
    subscribe: store.subscribe,
    get: () => state,
    setStatus,
    setPendingCount: (pendingCount) => patch({ pendingCount }),
    setError: (friendly, raw) => patch({ lastError: friendly, lastErrorDetails: raw ?? null }),
    addSyncError: (error) =>
      store.update((s) => ({ ...s, syncErrors: [...s.syncErrors, error].slice(-MAX_SYNC_ERRORS) })),
    clearSyncErrors: () => patch({ syncErrors: [] }),
    setLastSyncTime: (lastSyncTime) => patch({ lastSyncTime }),
    setRealtimeState: (realtimeState) => {
      if (state.realtimeState !== realtimeState) patch({ realtimeState });
    },
    reset() {
      cancelDeferred();
      syncingSince = null;
      requested = 'idle';
      store.set(initialState());
    }
  };
}

/** Shared instance used when the engine config names none. */
export const syncStatusStore = createSyncStatusStore();

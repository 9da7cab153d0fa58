/**
 * @fileoverview Resilient Realtime Subscriptions
 *
 * Wraps raw {@link RemoteStore.subscribe} streams so that callers get a
 * subscription that never dies on its own. When the underlying stream errors:
 *
 *   1. the connection state moves to `'error'`
 *   2. a reconnect is scheduled with full-jitter exponential backoff
 *      (`random() * min(cap, base * 2^attempt)`), retried indefinitely
 *   3. on reconnect the last known state of every document is replayed to the
 *      caller flagged `isFromCache: true`, followed by the fresh server state
 *
 * A network-store reconnect edge skips the remaining backoff wait.
 *
 * All subscriptions opened through one {@link RealtimeHub} share an aggregate
 * connection state, pushed to listeners registered with
 * {@link RealtimeHub.onConnectionStateChange} (the engine forwards it to the
 * sync status store).
 */

import { debugError, debugLog, debugWarn } from './debug';
import { fullJitterDelay } from './utils';
import type { NetworkStore } from './stores/network';
import type { RealtimeState } from './stores/sync';
import type { CollectionQuery, RemoteChange, RemoteStore, Unsubscribe } from './remote/types';

export type RealtimeConnectionState = RealtimeState;

export interface RealtimeHubOptions {
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  random?: () => number;
  /** Reconnect immediately (attempt counter reset) when the network returns. */
  network?: Pick<NetworkStore, 'onReconnect'>;
}

export interface RealtimeHub {
  subscribe(
    path: string,
    onChanges: (changes: RemoteChange[]) => void,
    query?: CollectionQuery
  ): Unsubscribe;
  getConnectionState(): RealtimeConnectionState;
  isRealtimeHealthy(): boolean;
  onConnectionStateChange(callback: (state: RealtimeConnectionState) => void): () => void;
  /** Close every subscription opened through this hub. */
  stopAll(): void;
}

// =============================================================================
// Hub
// =============================================================================

export function createRealtimeHub(remote: RemoteStore, options: RealtimeHubOptions): RealtimeHub {
  const random = options.random ?? Math.random;
  const states = new Map<number, RealtimeConnectionState>();
  const closers = new Map<number, () => void>();
  const listeners = new Set<(state: RealtimeConnectionState) => void>();
  let nextId = 0;
  let lastAggregate: RealtimeConnectionState = 'disconnected';

  function aggregate(): RealtimeConnectionState {
    if (states.size === 0) return 'disconnected';
    const values = [...states.values()];
    if (values.includes('error')) return 'error';
    if (values.includes('connecting')) return 'connecting';
    return 'connected';
  }

  function publish() {
    const next = aggregate();
    if (next === lastAggregate) return;
    lastAggregate = next;
    for (const listener of listeners) {
      try {
        listener(next);
      } catch (e) {
        debugError('[Realtime] Connection state listener error:', e);
      }
    }
  }

  function subscribe(
    path: string,
    onChanges: (changes: RemoteChange[]) => void,
    query?: CollectionQuery
  ): Unsubscribe {
    const id = nextId++;
    const lastKnown = new Map<string, RemoteChange>();
    let raw: Unsubscribe | null = null;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let attempt = 0;
    let closed = false;

    function setState(state: RealtimeConnectionState) {
      states.set(id, state);
      publish();
    }

    function forward(changes: RemoteChange[]) {
      try {
        onChanges(changes);
      } catch (e) {
        debugError(`[Realtime] Change handler for ${path} threw:`, e);
      }
    }

    function connect() {
      setState('connecting');
      raw = remote.subscribe(
        path,
        {
          onChanges(changes) {
            if (closed) return;
            if (attempt > 0) debugLog(`[Realtime] Reconnected: ${path}`);
            attempt = 0;
            setState('connected');
            for (const change of changes) {
              if (change.data === null) lastKnown.delete(change.id);
              else lastKnown.set(change.id, change);
            }
            forward(changes);
          },
          onError(error) {
            if (closed) return;
            raw = null;
            setState('error');
            scheduleReconnect(error.code);
          }
        },
        query
      );
    }

    function scheduleReconnect(reason: string) {
      const wait = fullJitterDelay(attempt, options.reconnectBaseMs, options.reconnectMaxMs, random);
      debugWarn(`[Realtime] ${path} dropped (${reason}); reconnect #${attempt + 1} in ${wait}ms`);
      attempt++;
      timer = setTimeout(reconnect, wait);
    }

    function reconnect() {
      timer = null;
      if (closed) return;
      if (lastKnown.size > 0) {
        forward([...lastKnown.values()].map((change) => ({ ...change, isFromCache: true })));
      }
      connect();
    }

    const offReconnect = options.network?.onReconnect(() => {
      if (closed || timer === null) return;
      clearTimeout(timer);
      attempt = 0;
      reconnect();
    });

    function close() {
      if (closed) return;
      closed = true;
      if (timer !== null) clearTimeout(timer);
      timer = null;
      raw?.();
      raw = null;
      offReconnect?.();
      states.delete(id);
      closers.delete(id);
      publish();
    }

    closers.set(id, close);
    connect();
    return close;
  }

  return {
    subscribe,
    getConnectionState: () => lastAggregate,
    isRealtimeHealthy: () => lastAggregate === 'connected',
    onConnectionStateChange(callback) {
      listeners.add(callback);
      return () => listeners.delete(callback);
    },
    stopAll() {
      for (const close of [...closers.values()]) close();
    }
  };
}

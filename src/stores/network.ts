import { writable, type Readable } from 'svelte/store';
import { debugError, debugLog } from '../debug';

type EdgeCallback = () => void | Promise<void>;
type Edge = 'reconnect' | 'disconnect';

/**
 * Connectivity as reported by the host. There is no platform event source
 * under Node, so the app shell (or a test) calls `setOnline` on every change.
 */
export interface NetworkStore extends Readable<boolean> {
  get(): boolean;
  /** Resolves once every callback of the resulting edge has run. */
  setOnline(online: boolean): Promise<void>;
  /** Runs on an offline -> online edge only. */
  onReconnect(callback: EdgeCallback): () => void;
  /** Runs on an online -> offline edge only. */
  onDisconnect(callback: EdgeCallback): () => void;
}

export function createNetworkStore(initiallyOnline = true): NetworkStore {
  const store = writable(initiallyOnline);
  let online = initiallyOnline;
  const callbacks: Record<Edge, Set<EdgeCallback>> = {
    reconnect: new Set(),
    disconnect: new Set()
  };

  function register(edge: Edge, callback: EdgeCallback): () => void {
    callbacks[edge].add(callback);
    return () => callbacks[edge].delete(callback);
  }

  /* One after another: a reconnect handler may depend on an earlier one */
  async function fire(edge: Edge): Promise<void> {
    for (const callback of [...callbacks[edge]]) {
      try {
        await callback();
      } catch (e) {
        debugError(`[Network] ${edge} callback failed:`, e);
      }
    }
  }

  return {
    subscribe: store.subscribe,
    get: () => online,
    async setOnline(next) {
      if (next === online) return;
      online = next;
      store.set(next);
      debugLog(`[Network] ${next ? 'Online' : 'Offline'}`);
      await fire(next ? 'reconnect' : 'disconnect');
    },
    onReconnect: (callback) => register('reconnect', callback),
    onDisconnect: (callback) => register('disconnect', callback)
  };
}

/** Shared instance used when the engine config names none. */
export const isOnline = createNetworkStore();

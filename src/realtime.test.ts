import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemoteStoreError } from './errors';
import { createRealtimeHub } from './realtime';
import { createNetworkStore } from './stores/network';
import type { RemoteChange, RemoteStore, SubscriptionHandlers } from './remote/types';

/** Remote whose subscriptions are driven by the test. */
function scriptedRemote() {
  const subscriptions: SubscriptionHandlers[] = [];
  let unsubscribed = 0;
  const remote: RemoteStore = {
    read: async () => ({ ok: true, doc: null }),
    write: async () => ({ ok: true, version: 1, serverTimestamp: 1 }),
    subscribe(_path, handlers) {
      subscriptions.push(handlers);
      return () => {
        unsubscribed++;
      };
    }
  };
  return {
    remote,
    subscriptions,
    latest: () => subscriptions[subscriptions.length - 1],
    unsubscribed: () => unsubscribed
  };
}

function change(id: string, text: string): RemoteChange {
  return { path: `users/${id}`, id, data: { text }, version: 1, serverTimestamp: 1, isFromCache: false };
}

const drop = () => new RemoteStoreError('unavailable', 'connection lost');

describe('createRealtimeHub', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reconnects with full-jitter exponential backoff', () => {
    const scripted = scriptedRemote();
    const hub = createRealtimeHub(scripted.remote, {
      reconnectBaseMs: 1000,
      reconnectMaxMs: 30_000,
      random: () => 0.5
    });
    hub.subscribe('users/u1', () => {});
    expect(scripted.subscriptions).toHaveLength(1);

    const expectedWaits = [500, 1000, 2000, 4000];
    for (const [i, wait] of expectedWaits.entries()) {
      scripted.latest().onError(drop());
      vi.advanceTimersByTime(wait - 1);
      expect(scripted.subscriptions).toHaveLength(i + 1);
      vi.advanceTimersByTime(1);
      expect(scripted.subscriptions).toHaveLength(i + 2);
    }
  });

  it('caps the backoff and resets it after a successful snapshot', () => {
    const scripted = scriptedRemote();
    const hub = createRealtimeHub(scripted.remote, {
      reconnectBaseMs: 1000,
      reconnectMaxMs: 3000,
      random: () => 0.5
    });
    hub.subscribe('users/u1', () => {});

    for (let i = 0; i < 4; i++) {
      scripted.latest().onError(drop());
      vi.runOnlyPendingTimers();
    }
    /* attempt 4: min(3000, 16000) * 0.5 */
    scripted.latest().onError(drop());
    vi.advanceTimersByTime(1499);
    expect(scripted.subscriptions).toHaveLength(5);
    vi.advanceTimersByTime(1);
    expect(scripted.subscriptions).toHaveLength(6);

    scripted.latest().onChanges([]);
    scripted.latest().onError(drop());
    vi.advanceTimersByTime(500);
    expect(scripted.subscriptions).toHaveLength(7);
  });

  it('replays the last known state from cache before the fresh snapshot', () => {
    const scripted = scriptedRemote();
    const hub = createRealtimeHub(scripted.remote, { reconnectBaseMs: 100, reconnectMaxMs: 1000, random: () => 0 });
    const received: RemoteChange[][] = [];
    hub.subscribe('users', (changes) => received.push(changes));

    scripted.latest().onChanges([change('a', 'one'), change('b', 'two')]);
    scripted.latest().onChanges([{ ...change('b', 'two'), data: null }]);
    scripted.latest().onError(drop());
    vi.advanceTimersByTime(0);

    expect(received).toHaveLength(3);
    expect(received[2]).toEqual([{ ...change('a', 'one'), isFromCache: true }]);

    scripted.latest().onChanges([change('a', 'three')]);
    expect(received[3]).toEqual([change('a', 'three')]);
  });

  it('publishes the aggregate connection state', () => {
    const scripted = scriptedRemote();
    const hub = createRealtimeHub(scripted.remote, { reconnectBaseMs: 100, reconnectMaxMs: 1000, random: () => 0 });
    const states: string[] = [];
    hub.onConnectionStateChange((state) => states.push(state));

    hub.subscribe('users/u1', () => {});
    scripted.latest().onChanges([]);
    expect(hub.isRealtimeHealthy()).toBe(true);
    scripted.latest().onError(drop());
    vi.advanceTimersByTime(0);
    hub.stopAll();

    expect(states).toEqual(['connecting', 'connected', 'error', 'connecting', 'disconnected']);
    expect(hub.getConnectionState()).toBe('disconnected');
  });

  it('skips the remaining wait when the network comes back', async () => {
    const scripted = scriptedRemote();
    const network = createNetworkStore(false);
    const hub = createRealtimeHub(scripted.remote, {
      reconnectBaseMs: 10_000,
      reconnectMaxMs: 60_000,
      random: () => 0.9,
      network
    });
    hub.subscribe('users/u1', () => {});
    scripted.latest().onError(drop());
    expect(scripted.subscriptions).toHaveLength(1);

    await network.setOnline(true);
    expect(scripted.subscriptions).toHaveLength(2);
  });

  it('closes the raw subscriptions on stopAll', () => {
    const scripted = scriptedRemote();
    const hub = createRealtimeHub(scripted.remote, { reconnectBaseMs: 100, reconnectMaxMs: 1000 });
    hub.subscribe('users/u1', () => {});
    hub.subscribe('users/u2', () => {});
    hub.stopAll();
    expect(scripted.unsubscribed()).toBe(2);
  });
});

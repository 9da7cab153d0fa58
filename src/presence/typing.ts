/**
 * Typing indicators.
 *
 * Outbound: `inputChanged` marks the local user as typing in
 * `conversations/{id}/typing/{me}` and (re)starts a debounce; when the
 * debounce runs out, or a message is sent, the flag is cleared. While the user
 * keeps typing the `true` flag is rewritten at most once per debounce window
 * so remote viewers keep seeing it within the TTL.
 *
 * Inbound: `observeTyping` lists the other participants whose flag is set and
 * whose last write is younger than the TTL. Age is measured against the
 * `updatedAt` the writer stamps with its own clock; documents without one fall
 * back to the server time. Entries drop out on their own when they age past
 * the TTL, without a new event.
 *
 * Indicators live in memory only. Write failures are logged and otherwise
 * ignored.
 */

import { readable, type Readable } from 'svelte/store';
import { debugError, debugWarn } from '../debug';
import { paths } from '../remote/paths';
import type { RealtimeHub } from '../realtime';
import type { RemoteChange, RemoteStore } from '../remote/types';
import type { TypingIndicator } from '../types';

export interface TypingCoordinatorOptions {
  remote: RemoteStore;
  hub: Pick<RealtimeHub, 'subscribe'>;
  userId: string;
  debounceMs: number;
  ttlMs: number;
  now?: () => number;
}

export interface TypingCoordinator {
  inputChanged(conversationId: string): void;
  messageSent(conversationId: string): void;
  /** User ids currently typing in the conversation, local user excluded. */
  observeTyping(conversationId: string): Readable<string[]>;
  /** Cancel timers and end every observer of the conversation. */
  close(conversationId: string): void;
  closeAll(): void;
}

interface OutboundState {
  timer: ReturnType<typeof setTimeout> | null;
  typing: boolean;
  lastWriteAt: number;
}

export function toTypingIndicator(conversationId: string, change: RemoteChange): TypingIndicator {
  const stamped = change.data?.updatedAt;
  return {
    conversationId,
    userId: change.id,
    isTyping: change.data?.isTyping === true,
    updatedAt: typeof stamped === 'number' ? stamped : change.serverTimestamp
  };
}

/** Ids of the users in `indicators` who are typing as of `now`. */
export function activeTypists(
  indicators: Iterable<TypingIndicator>,
  selfId: string,
  now: number,
  ttlMs: number
): string[] {
  const ids: string[] = [];
  for (const indicator of indicators) {
    if (indicator.isTyping && indicator.userId !== selfId && now - indicator.updatedAt < ttlMs) {
      ids.push(indicator.userId);
    }
  }
  return ids.sort();
}

export function createTypingCoordinator(options: TypingCoordinatorOptions): TypingCoordinator {
  const { remote, hub, userId, debounceMs, ttlMs } = options;
  const now = options.now ?? Date.now;
  const outbound = new Map<string, OutboundState>();
  const observers = new Map<string, Set<() => void>>();

  function write(conversationId: string, isTyping: boolean) {
    const path = paths.typing(conversationId, userId);
    remote.write(path, { conversationId, userId, isTyping, updatedAt: now() }).then(
      (result) => {
        if (!result.ok) debugWarn(`[PRESENCE] Typing write failed (${result.error.code})`);
      },
      (e: unknown) => debugError('[PRESENCE] Typing write threw:', e)
    );
  }

  function stopTyping(conversationId: string) {
    const state = outbound.get(conversationId);
    if (!state) return;
    if (state.timer !== null) clearTimeout(state.timer);
    outbound.delete(conversationId);
    if (state.typing) write(conversationId, false);
  }

  function inputChanged(conversationId: string) {
    const state = outbound.get(conversationId) ?? { timer: null, typing: false, lastWriteAt: 0 };
    outbound.set(conversationId, state);

    const t = now();
    if (!state.typing || t - state.lastWriteAt >= debounceMs) {
      state.typing = true;
      state.lastWriteAt = t;
      write(conversationId, true);
    }

    if (state.timer !== null) clearTimeout(state.timer);
    state.timer = setTimeout(() => {
      state.timer = null;
      stopTyping(conversationId);
    }, debounceMs);
  }

  function observeTyping(conversationId: string): Readable<string[]> {
    return readable<string[]>([], (set) => {
      const indicators = new Map<string, TypingIndicator>();
      let expiry: ReturnType<typeof setTimeout> | null = null;
      let last: string[] = [];

      function publish() {
        const t = now();
        const next = activeTypists(indicators.values(), userId, t, ttlMs);
        if (next.join('\n') !== last.join('\n')) {
          last = next;
          set(next);
        }

        if (expiry !== null) clearTimeout(expiry);
        expiry = null;
        let soonest = Infinity;
        for (const indicator of indicators.values()) {
          if (indicator.isTyping && indicator.userId !== userId) {
            const expiresAt = indicator.updatedAt + ttlMs;
            if (expiresAt > t) soonest = Math.min(soonest, expiresAt);
          }
        }
        if (soonest !== Infinity) expiry = setTimeout(publish, soonest - t);
      }

      const unsubscribe = hub.subscribe(paths.typingCollection(conversationId), (changes) => {
        for (const change of changes) {
          if (change.data === null) indicators.delete(change.id);
          else indicators.set(change.id, toTypingIndicator(conversationId, change));
        }
        publish();
      });

      let ended = false;
      const end = () => {
        if (ended) return;
        ended = true;
        unsubscribe();
        if (expiry !== null) clearTimeout(expiry);
        observers.get(conversationId)?.delete(end);
        if (last.length > 0) set([]);
      };
      const ends = observers.get(conversationId) ?? new Set<() => void>();
      ends.add(end);
      observers.set(conversationId, ends);
      return end;
    });
  }

  function close(conversationId: string) {
    stopTyping(conversationId);
    for (const end of [...(observers.get(conversationId) ?? [])]) end();
    observers.delete(conversationId);
  }

  return {
    inputChanged,
    messageSent: stopTyping,
    observeTyping,
    close,
    closeAll() {
      for (const id of new Set([...outbound.keys(), ...observers.keys()])) close(id);
    }
  };
}

/**
 * Online status.
 *
 * `foreground()` marks the local user online and keeps `lastSeen` fresh with a
 * heartbeat; `background()` stops the heartbeat and marks the user offline.
 * Nobody can mark another user offline when their app dies, so readers never
 * trust `isOnline` alone: a user counts as online only while their last
 * heartbeat is younger than two periods ({@link isEffectivelyOnline}).
 *
 * Presence writes go straight to the remote store, not through the outbox.
 * Failures are logged; they never touch message state.
 */

import { readable, type Readable } from 'svelte/store';
import { debugError, debugLog, debugWarn } from '../debug';
import { paths } from '../remote/paths';
import { userById } from '../queries';
import type { LocalStore } from '../database';
import type { RemoteStore } from '../remote/types';
import type { User } from '../types';

export interface OnlinePresenceOptions {
  remote: RemoteStore;
  store: LocalStore;
  userId: string;
  heartbeatIntervalMs: number;
  now?: () => number;
}

export interface OnlinePresence {
  foreground(): Promise<void>;
  background(): Promise<void>;
  /** Effective online state of a user, from the local store; flips to offline at expiry. */
  observePresence(userId: string): Readable<boolean>;
  stop(): void;
}

export function isEffectivelyOnline(
  user: Pick<User, 'isOnline' | 'lastSeen'>,
  now: number,
  heartbeatMs: number
): boolean {
  return user.isOnline && now - user.lastSeen < 2 * heartbeatMs;
}

export function createOnlinePresence(options: OnlinePresenceOptions): OnlinePresence {
  const { remote, store, userId, heartbeatIntervalMs } = options;
  const now = options.now ?? Date.now;
  let heartbeat: ReturnType<typeof setInterval> | null = null;

  async function writePresence(isOnline: boolean): Promise<void> {
    try {
      const result = await remote.write(paths.user(userId), { isOnline, lastSeen: now() });
      if (!result.ok) debugWarn(`[PRESENCE] Presence write failed (${result.error.code})`);
    } catch (e) {
      debugError('[PRESENCE] Presence write threw:', e);
    }
  }

  function stopHeartbeat() {
    if (heartbeat !== null) clearInterval(heartbeat);
    heartbeat = null;
  }

  return {
    async foreground() {
      stopHeartbeat();
      heartbeat = setInterval(() => {
        writePresence(true).catch((e: unknown) => debugError('[PRESENCE] Heartbeat failed:', e));
      }, heartbeatIntervalMs);
      debugLog('[PRESENCE] Foreground');
      await writePresence(true);
    },

    async background() {
      stopHeartbeat();
      debugLog('[PRESENCE] Background');
      await writePresence(false);
    },

    observePresence(watchedId) {
      return readable(false, (set) => {
        let expiry: ReturnType<typeof setTimeout> | null = null;

        const unsubscribe = store.observe(userById(watchedId)).subscribe((user) => {
          if (expiry !== null) clearTimeout(expiry);
          expiry = null;
          if (!user) {
            set(false);
            return;
          }

          const evaluate = () => {
            expiry = null;
            const online = isEffectivelyOnline(user, now(), heartbeatIntervalMs);
            set(online);
            if (online) {
              expiry = setTimeout(evaluate, user.lastSeen + 2 * heartbeatIntervalMs - now());
            }
          };
          evaluate();
        });

        return () => {
          unsubscribe();
          if (expiry !== null) clearTimeout(expiry);
        };
      });
    },

    stop: stopHeartbeat
  };
}

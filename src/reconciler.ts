/**
 * @fileoverview Sync Reconciler
 *
 * Applies remote change streams to the local store. Each watch opens one or
 * more resilient subscriptions through the {@link RealtimeHub}; every batch
 * they deliver is decoded, merged field by field against the local copy
 * ({@link conflicts.ts}) and written back through {@link LocalStore.mutate},
 * which skips records that did not change. Applying the same batch twice is
 * therefore a no-op for the store and its observers.
 *
 * Batches from all watches are applied strictly one after another, in the
 * order they arrived.
 *
 * After a message batch the conversation's `lastMessageSummary` is moved
 * forward to the newest local message when that message is newer than the
 * summary. Deleted documents are ignored: the reconciler never removes local
 * data.
 *
 * Incoming messages from other senders that do not yet carry a delivery
 * acknowledgement from the local user are handed to `onDeliver` (the write
 * pipeline acknowledges them), except when the batch is a cache replay.
 *
 * A snapshot merged while local writes to the same document were pending does
 * not count as seen (see {@link conflicts.ts}). Such documents are remembered,
 * and {@link Reconciler.refresh} reads them again once their last pending
 * write has settled, so a newer remote value that was held back still lands.
 */

import Dexie from 'dexie';
import { debugError, debugLog, debugWarn } from './debug';
import { parsePath, paths } from './remote/paths';
import { decodeConversation, decodeMessage, decodeUser } from './remote/decode';
import {
  mergeConversation,
  mergeMessage,
  mergeUser,
  storeConflictHistory,
  type FieldConflictResolution,
  type MergeResult
} from './conflicts';
import type { LocalStore } from './database';
import type { Outbox } from './queue';
import type { RealtimeHub } from './realtime';
import type { RemoteChange, RemoteStore, Unsubscribe } from './remote/types';
import type { SyncStatusStore } from './stores/sync';
import type { EntityByTable, EntityTable, Message } from './types';

export interface ReconcilerDeps {
  store: LocalStore;
  hub: RealtimeHub;
  /** Used to re-read documents whose remote values were held back. */
  remote: Pick<RemoteStore, 'read'>;
  outbox: Pick<Outbox, 'getPendingFields'>;
  /** The local user; acknowledgements are sent on their behalf. */
  userId: string;
  /** Called for each freshly received message that still lacks our delivery receipt. */
  onDeliver?: (message: Message) => void;
  status?: SyncStatusStore;
}

export interface WatchHandle {
  close(): void;
}

export interface Reconciler {
  /** Conversation document plus its messages. */
  watchConversation(conversationId: string): WatchHandle;
  /** Every conversation the user participates in. */
  watchConversationList(userId: string): WatchHandle;
  /** Profile and presence of one user. */
  watchUser(userId: string): WatchHandle;

  applyMessageChanges(changes: RemoteChange[]): Promise<void>;
  applyConversationChanges(changes: RemoteChange[]): Promise<void>;
  applyUserChanges(changes: RemoteChange[]): Promise<void>;

  /**
   * Re-read and merge a document whose remote values were held back for
   * pending local writes. Does nothing while writes to it are still queued,
   * or when nothing was held back.
   */
  refresh(path: string): Promise<void>;

  /** Resolves once every batch received so far has been applied. */
  idle(): Promise<void>;
  stopAll(): void;
}

type Merge<K extends EntityTable> = (
  local: EntityByTable[K] | undefined,
  remote: EntityByTable[K],
  pendingFields: ReadonlySet<string>
) => MergeResult<EntityByTable[K]>;

export function createReconciler(deps: ReconcilerDeps): Reconciler {
  const { store, hub, remote, outbox, userId } = deps;
  const handles = new Set<WatchHandle>();
  /* Paths merged while a local value was kept over the remote one */
  const held = new Set<string>();
  let chain: Promise<void> = Promise.resolve();

  /* Serialize batch application across every watch */
  function enqueueBatch(label: string, apply: () => Promise<void>) {
    chain = chain.then(apply).catch((e: unknown) => {
      debugError(`[RECONCILE] Failed to apply ${label} batch:`, e);
    });
  }

  /**
   * Merge one remote record into the local store.
   *
   * @returns The record as stored afterwards.
   */
  async function mergeInto<K extends EntityTable>(
    table: K,
    path: string,
    remote: EntityByTable[K],
    merge: Merge<K>
  ): Promise<EntityByTable[K] | undefined> {
    const pending = await outbox.getPendingFields(path);
    const resolutions: FieldConflictResolution[] = [];

    const stored = await store.mutate(table, remote.id, (current) => {
      const result = merge(current, remote, pending);
      if (result.stale) return undefined;
      resolutions.push(...result.fieldResolutions);
      return result.merged;
    });

    if (resolutions.some((r) => r.strategy === 'local_pending')) held.add(path);
    if (resolutions.length > 0) {
      await storeConflictHistory(store, table, remote.id, resolutions, pending.size > 0);
    }
    return stored;
  }

  /**
   * Move `lastMessageSummary` forward to the newest stored message when that
   * message is newer than the current summary.
   */
  async function reconcileSummary(conversationId: string): Promise<void> {
    const newest = await store.db.messages
      .where('[conversationId+timestamp]')
      .between([conversationId, Dexie.minKey], [conversationId, Dexie.maxKey])
      .last();
    if (!newest) return;

    await store.mutate('conversations', conversationId, (conversation) => {
      if (!conversation) return undefined;
      const summary = conversation.lastMessageSummary;
      const isNewer =
        !summary ||
        newest.timestamp > summary.timestamp ||
        (newest.timestamp === summary.timestamp && newest.id > summary.messageId);
      if (!isNewer) return undefined;
      return {
        ...conversation,
        lastMessageSummary: {
          messageId: newest.id,
          senderId: newest.senderId,
          text: newest.text,
          timestamp: newest.timestamp,
          type: newest.type
        }
      };
    });
  }

  function markSynced(changes: RemoteChange[]) {
    if (changes.some((c) => !c.isFromCache)) {
      deps.status?.setLastSyncTime(new Date().toISOString());
    }
  }

  // ===========================================================================
  // Batch Application
  // ===========================================================================

  async function applyMessageChanges(changes: RemoteChange[]): Promise<void> {
    const touched = new Set<string>();

    for (const change of changes) {
      if (change.data === null) continue;
      const remote = decodeMessage({ ...change, data: change.data });
      if (!remote) {
        debugLog(`[RECONCILE] Skipping malformed message ${change.path}`);
        continue;
      }

      const stored = await mergeInto('messages', change.path, remote, mergeMessage);
      touched.add(remote.conversationId);

      if (
        stored &&
        !change.isFromCache &&
        stored.senderId !== userId &&
        stored.deliveredTo[userId] === undefined
      ) {
        deps.onDeliver?.(stored);
      }
    }

    for (const conversationId of touched) {
      await reconcileSummary(conversationId);
    }
    markSynced(changes);
  }

  async function applyConversationChanges(changes: RemoteChange[]): Promise<void> {
    for (const change of changes) {
      if (change.data === null) {
        debugLog(`[RECONCILE] ${change.path} left the subscription; local copy kept`);
        continue;
      }
      const remote = decodeConversation({ ...change, data: change.data });
      if (!remote) {
        debugLog(`[RECONCILE] Skipping malformed conversation ${change.path}`);
        continue;
      }
      await mergeInto('conversations', change.path, remote, mergeConversation);
      await reconcileSummary(remote.id);
    }
    markSynced(changes);
  }

  async function applyUserChanges(changes: RemoteChange[]): Promise<void> {
    for (const change of changes) {
      if (change.data === null) continue;
      await mergeInto('users', change.path, decodeUser({ ...change, data: change.data }), mergeUser);
    }
    markSynced(changes);
  }

  function applyDocument(change: RemoteChange): Promise<void> {
    switch (parsePath(change.path).kind) {
      case 'user':
        return applyUserChanges([change]);
      case 'conversation':
        return applyConversationChanges([change]);
      case 'message':
        return applyMessageChanges([change]);
      default:
        return Promise.resolve();
    }
  }

  async function refresh(path: string): Promise<void> {
    if (!held.has(path)) return;
    if ((await outbox.getPendingFields(path)).size > 0) return;
    held.delete(path);

    const result = await remote.read(path);
    if (!result.ok) {
      held.add(path);
      debugWarn(`[RECONCILE] Could not re-read ${path} (${result.error.code})`);
      return;
    }
    const { doc } = result;
    if (!doc) return;

    debugLog(`[RECONCILE] Re-reading ${path} after its pending writes settled`);
    enqueueBatch('refresh', () =>
      applyDocument({
        path: doc.path,
        id: doc.id,
        data: doc.data,
        version: doc.version,
        serverTimestamp: doc.serverTimestamp,
        isFromCache: false
      })
    );
    await chain;
  }

  // ===========================================================================
  // Watches
  // ===========================================================================

  function track(...subscriptions: Unsubscribe[]): WatchHandle {
    let closed = false;
    const handle: WatchHandle = {
      close() {
        if (closed) return;
        closed = true;
        for (const unsubscribe of subscriptions) unsubscribe();
        handles.delete(handle);
      }
    };
    handles.add(handle);
    return handle;
  }

  return {
    watchConversation(conversationId) {
      debugLog(`[RECONCILE] Watching conversation ${conversationId}`);
      return track(
        hub.subscribe(paths.conversation(conversationId), (changes) =>
          enqueueBatch('conversation', () => applyConversationChanges(changes))
        ),
        hub.subscribe(paths.messages(conversationId), (changes) =>
          enqueueBatch('message', () => applyMessageChanges(changes))
        )
      );
    },

    watchConversationList(listUserId) {
      return track(
        hub.subscribe(
          paths.conversations(),
          (changes) => enqueueBatch('conversation list', () => applyConversationChanges(changes)),
          { arrayContains: { field: 'participantIds', value: listUserId } }
        )
      );
    },

    watchUser(watchedId) {
      return track(
        hub.subscribe(paths.user(watchedId), (changes) =>
          enqueueBatch('user', () => applyUserChanges(changes))
        )
      );
    },

    applyMessageChanges,
    applyConversationChanges,
    applyUserChanges,
    refresh,

    async idle() {
      let current: Promise<void>;
      do {
        current = chain;
        await current;
      } while (current !== chain);
    },

    stopAll() {
      for (const handle of [...handles]) handle.close();
    }
  };
}

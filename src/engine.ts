import { createLocalStore, deleteLocalStore, type LocalStore, type LocalStoreOptions } from './database';
import { resolveConfig, _setEngineConfig, type MurmurConfig, type ResolvedConfig } from './config';
import { _setDebugPrefix, debugError, debugLog, debugWarn } from './debug';
import { StoreCorruptError, type RemoteStoreError } from './errors';
import { createOutbox, type Outbox } from './queue';
import { createWritePipeline, type WritePipeline } from './pipeline';
import { createReconciler, type Reconciler, type WatchHandle } from './reconciler';
import { createRealtimeHub, type RealtimeHub } from './realtime';
import { createDataLayer, type DataLayer, type SendMediaMessageInput } from './data';
import { cleanupConflictHistory } from './conflicts';
import { createTypingCoordinator, type TypingCoordinator } from './presence/typing';
import { createOnlinePresence, type OnlinePresence } from './presence/online';
import { activeConversation } from './notifications';
import { visibleMessages, conversationById, unreadCount } from './queries';
import { paths } from './remote/paths';
import { createMemoryRemoteStore } from './remote/memory';
import { createSupabaseRemoteStore } from './remote/supabase';
import { isOnline, type NetworkStore } from './stores/network';
import { syncStatusStore, type SyncStatusStore } from './stores/sync';
import { get, type Readable } from 'svelte/store';
import type { CollectionQuery, RemoteChange, RemoteStore } from './remote/types';
import type { Conversation, Message } from './types';

// ============================================================
// OFFLINE-FIRST SYNC ENGINE
//
// Rules:
// 1. All reads come from the local store
// 2. All writes go to the local store first, immediately
// 3. Every write creates a pending operation in the outbox
// 4. The write pipeline ships the outbox to the remote store in the background
// 5. Realtime subscriptions merge remote changes into the local store
// ============================================================

export interface Engine {
  readonly config: ResolvedConfig;
  readonly store: LocalStore;
  readonly remote: RemoteStore;
  readonly hub: RealtimeHub;
  readonly outbox: Outbox;
  readonly reconciler: Reconciler;
  readonly data: DataLayer;
  readonly typing: TypingCoordinator;
  readonly online: OnlinePresence;
  readonly network: NetworkStore;
  readonly status: SyncStatusStore;
  /** The local store was rebuilt during init because its schema did not match. */
  readonly rebuilt: boolean;
  /** The running write pipeline, or `null` while the engine is stopped. */
  pipeline(): WritePipeline | null;
}

export interface ConversationHandle {
  readonly conversationId: string;
  readonly conversation: Readable<Conversation | undefined>;
  /** Visible messages, timestamp ascending. */
  readonly messages: Readable<Message[] | undefined>;
  readonly unread: Readable<number | undefined>;
  /** Ids of the other participants currently typing. */
  readonly typing: Readable<string[]>;
  inputChanged(): void;
  /** Send a text message as the local user and clear their typing flag. */
  send(text: string): Promise<Message>;
  /** Clear the typing flag and send a media message as the local user. */
  sendMedia(input: Omit<SendMediaMessageInput, 'conversationId' | 'senderId'>): Promise<Message>;
  /** Effective online state of a participant; kept in sync while the handle is open. */
  presence(userId: string): Readable<boolean>;
  /** Stops listening. In-flight message propagation is not affected. */
  close(): void;
}

let engine: Engine | null = null;
let pipeline: WritePipeline | null = null;
let started = false;
let userWatch: WatchHandle | null = null;
let listWatch: WatchHandle | null = null;
let realtimeStateUnsubscribe: (() => void) | null = null;
let disconnectUnsubscribe: (() => void) | null = null;
const openHandles = new Set<ConversationHandle>();
/* Presence watches on other users, shared by every open conversation */
const peerWatches = new Map<string, { watch: WatchHandle; holders: number }>();

// ============================================================
// INITIALIZATION
// ============================================================

/**
 * Open the local store, recovering from a schema mismatch by deleting the
 * database and starting empty.
 */
async function openLocalStore(options: LocalStoreOptions): Promise<{ store: LocalStore; rebuilt: boolean }> {
  try {
    return { store: await createLocalStore(options), rebuilt: false };
  } catch (e) {
    if (!(e instanceof StoreCorruptError)) throw e;
    /* Recoverable incident: always reported, debug mode or not */
    console.error('[DB] Local store is unusable, deleting and rebuilding from remote:', e);
    await deleteLocalStore(options);
    return { store: await createLocalStore(options), rebuilt: true };
  }
}

function buildRemote(config: ResolvedConfig): RemoteStore {
  if (config.remote) return config.remote;
  if (config.supabase) return createSupabaseRemoteStore(config.supabase, { channelPrefix: config.prefix });
  debugWarn('[SYNC] No remote store configured; running in demo mode against an in-memory store');
  return createMemoryRemoteStore({ now: config.now });
}

/**
 * Initialize the engine: resolve config, open the local store and wire every
 * component. Does not start syncing; call {@link startSyncEngine} for that.
 * Calling it again tears down the previous engine first.
 *
 * @throws {Error} For an invalid config, or when the local store cannot be opened
 *   even after a rebuild.
 */
export async function initEngine(input: MurmurConfig): Promise<Engine> {
  if (engine) await resetEngine();

  const config = resolveConfig(input);
  _setDebugPrefix(config.prefix);
  _setEngineConfig(config);

  const { store, rebuilt } = await openLocalStore(config.database);
  const network = config.network ?? isOnline;
  const status = config.syncStatus ?? syncStatusStore;
  const remote = buildRemote(config);

  const hub = createRealtimeHub(remote, {
    reconnectBaseMs: config.reconnectBaseMs,
    reconnectMaxMs: config.reconnectMaxMs,
    random: config.random,
    network
  });
  const outbox = createOutbox(store, status);

  const data = createDataLayer({
    store,
    outbox,
    /* Operations queued while stopped are picked up by resume() on start */
    pipeline: { schedule: (key) => pipeline?.schedule(key) },
    userId: config.userId,
    now: config.now,
    mediaUploader: config.mediaUploader,
    status
  });

  const reconciler = createReconciler({
    store,
    hub,
    remote,
    outbox,
    userId: config.userId,
    status,
    onDeliver: (message) => {
      data.acknowledgeDelivery(message, config.userId).catch((e: unknown) => {
        debugError(`[SYNC] Delivery acknowledgement for ${message.id} failed:`, e);
      });
    }
  });

  engine = {
    config,
    store,
    remote,
    hub,
    outbox,
    reconciler,
    data,
    typing: createTypingCoordinator({
      remote,
      hub,
      userId: config.userId,
      debounceMs: config.typingDebounceMs,
      ttlMs: config.typingTtlMs,
      now: config.now
    }),
    online: createOnlinePresence({
      remote,
      store,
      userId: config.userId,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      now: config.now
    }),
    network,
    status,
    rebuilt,
    pipeline: () => pipeline
  };

  if (rebuilt) {
    try {
      await rehydrate(engine);
    } catch (e) {
      /* Live subscriptions fill the store once the remote is reachable */
      debugWarn('[SYNC] Rehydration after rebuild incomplete:', e);
    }
  }

  debugLog(`[SYNC] Engine initialized for ${config.userId}`);
  return engine;
}

// ============================================================
// REHYDRATION
// ============================================================

/** First snapshot of a path, without keeping the subscription. */
function snapshot(remote: RemoteStore, path: string, query?: CollectionQuery): Promise<RemoteChange[]> {
  return new Promise((resolve, reject) => {
    let unsubscribe: (() => void) | null = null;
    let settled = false;
    const finish = () => {
      settled = true;
      unsubscribe?.();
    };
    unsubscribe = remote.subscribe(
      path,
      {
        onChanges(changes) {
          if (settled) return;
          finish();
          resolve(changes);
        },
        onError(error: RemoteStoreError) {
          if (settled) return;
          finish();
          reject(error);
        }
      },
      query
    );
    if (settled) unsubscribe();
  });
}

/**
 * Refill an empty local store from the remote store: the local user's
 * profile, their conversations and every conversation's messages.
 */
async function rehydrate(target: Engine): Promise<void> {
  const { remote, reconciler, config } = target;
  debugLog('[SYNC] Rehydrating local store from remote');

  await reconciler.applyUserChanges(await snapshot(remote, paths.user(config.userId)));
  const conversations = await snapshot(remote, paths.conversations(), {
    arrayContains: { field: 'participantIds', value: config.userId }
  });
  await reconciler.applyConversationChanges(conversations);

  for (const conversation of conversations) {
    if (conversation.data === null) continue;
    /* Cache replays do not trigger delivery acknowledgements */
    const messages = await snapshot(remote, paths.messages(conversation.id));
    await reconciler.applyMessageChanges(messages.map((m) => ({ ...m, isFromCache: true })));
  }
}

// ============================================================
// LIFECYCLE
// ============================================================

/**
 * Get the initialized engine.
 *
 * @throws {Error} If {@link initEngine} has not been called.
 */
export function getEngine(): Engine {
  if (!engine) throw new Error('Sync engine not initialized. Call initEngine() first.');
  return engine;
}

/**
 * Start syncing: resume the outbox, and watch the local user's profile and
 * conversation list.
 */
export async function startSyncEngine(): Promise<void> {
  const current = getEngine();
  if (started) return;
  started = true;

  const { config, store, hub, outbox, remote, network, status, reconciler } = current;

  realtimeStateUnsubscribe = hub.onConnectionStateChange((state) => status.setRealtimeState(state));
  disconnectUnsubscribe = network.onDisconnect(() => status.setStatus('offline'));

  await cleanupConflictHistory(store, config.conflictHistoryMaxAgeDays);

  pipeline = createWritePipeline({
    store,
    outbox,
    remote,
    network,
    status,
    retryDelaysMs: config.retryDelaysMs,
    maxConflictRetries: config.maxConflictRetries,
    onSettled: (op) => reconciler.refresh(op.entityKey)
  });
  await pipeline.resume();

  userWatch = reconciler.watchUser(config.userId);
  listWatch = reconciler.watchConversationList(config.userId);
  debugLog('[SYNC] Engine started');
}

/**
 * Stop syncing. Pending operations stay in the outbox and are resumed by the
 * next {@link startSyncEngine}.
 */
export async function stopSyncEngine(): Promise<void> {
  if (!engine || !started) return;
  started = false;

  for (const handle of [...openHandles]) handle.close();
  userWatch?.close();
  listWatch?.close();
  userWatch = null;
  listWatch = null;

  engine.reconciler.stopAll();
  engine.typing.closeAll();
  engine.online.stop();
  engine.hub.stopAll();

  realtimeStateUnsubscribe?.();
  disconnectUnsubscribe?.();
  realtimeStateUnsubscribe = null;
  disconnectUnsubscribe = null;

  pipeline?.stop();
  await pipeline?.idle();
  pipeline = null;
  await engine.reconciler.idle();
  debugLog('[SYNC] Engine stopped');
}

/**
 * Stop the engine, close the local store and forget the configuration.
 *
 * @param options.destroy - Also delete the local database.
 */
export async function resetEngine(options: { destroy?: boolean } = {}): Promise<void> {
  if (!engine) return;
  await stopSyncEngine();
  const { store } = engine;
  engine = null;
  _setEngineConfig(null);
  if (options.destroy) await store.destroy();
  else store.close();
}

// ============================================================
// CONVERSATIONS
// ============================================================

function retainPeer(reconciler: Reconciler, userId: string) {
  const entry = peerWatches.get(userId);
  if (entry) {
    entry.holders++;
    return;
  }
  peerWatches.set(userId, { watch: reconciler.watchUser(userId), holders: 1 });
}

function releasePeer(userId: string) {
  const entry = peerWatches.get(userId);
  if (!entry) return;
  entry.holders--;
  if (entry.holders > 0) return;
  entry.watch.close();
  peerWatches.delete(userId);
}

/**
 * Start following one conversation: its document, its messages, who is
 * typing in it, and the profile and presence of every other participant.
 * Marks it as the active conversation for notification suppression until the
 * handle is closed.
 */
export function openConversation(conversationId: string): ConversationHandle {
  const current = getEngine();
  const { store, reconciler, typing, online, data, config } = current;
  const watch = reconciler.watchConversation(conversationId);
  activeConversation.set(conversationId);

  const conversation = store.observe(conversationById(conversationId));
  const peers = new Set<string>();
  const unsubscribePeers = conversation.subscribe((value) => {
    if (!value) return;
    const next = new Set(value.participantIds.filter((id) => id !== config.userId));
    for (const id of next) {
      if (peers.has(id)) continue;
      peers.add(id);
      retainPeer(reconciler, id);
    }
    for (const id of [...peers]) {
      if (next.has(id)) continue;
      peers.delete(id);
      releasePeer(id);
    }
  });

  let closed = false;
  const handle: ConversationHandle = {
    conversationId,
    conversation,
    messages: store.observe(visibleMessages(conversationId, config.userId)),
    unread: store.observe(unreadCount(conversationId, config.userId)),
    typing: typing.observeTyping(conversationId),
    inputChanged: () => typing.inputChanged(conversationId),
    async send(text) {
      const message = await data.sendMessage({ conversationId, senderId: config.userId, text });
      typing.messageSent(conversationId);
      return message;
    },
    sendMedia(input) {
      typing.messageSent(conversationId);
      return data.sendMediaMessage({ ...input, conversationId, senderId: config.userId });
    },
    presence: (userId) => online.observePresence(userId),
    close() {
      if (closed) return;
      closed = true;
      watch.close();
      unsubscribePeers();
      for (const id of peers) releasePeer(id);
      peers.clear();
      typing.close(conversationId);
      if (get(activeConversation) === conversationId) activeConversation.set(null);
      openHandles.delete(handle);
    }
  };
  openHandles.add(handle);
  return handle;
}

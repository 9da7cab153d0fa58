/**
 * @fileoverview Main entry point for `murmur-sync`
 *
 * Re-exports the public API surface:
 *
 * - **Engine Configuration & Lifecycle**: initialize, start, stop and reset
 *   the offline-first sync core.
 * - **Intents**: optimistic writes (send, read, react, group management,
 *   settings), reached through `getEngine().data`.
 * - **Local Store & Queries**: the Dexie-backed cache and its live queries.
 * - **Remote Store**: the store contract, path builders, and the memory and
 *   Supabase implementations.
 * - **Presence**: typing indicators and effective online state.
 * - **Reactive Stores**: sync status and network state.
 * - **Errors, Debug & Utilities**.
 */

// =============================================================================
//  Engine Configuration & Lifecycle
// =============================================================================

export {
  initEngine,
  startSyncEngine,
  stopSyncEngine,
  resetEngine,
  getEngine,
  openConversation
} from './engine';
export type { Engine, ConversationHandle } from './engine';

export { resolveConfig, getEngineConfig } from './config';
export type { MurmurConfig, ResolvedConfig, DatabaseOptions } from './config';

// =============================================================================
//  Intents
// =============================================================================

export { createDataLayer, directConversationId, SUPPORTED_REACTIONS, MAX_GROUP_SIZE } from './data';
export type {
  DataLayer,
  MediaUploader,
  SendMessageInput,
  SendMediaMessageInput,
  CreateGroupInput,
  ProfileUpdate
} from './data';

export { canTransition, advanceStatus, deriveRemoteStatus } from './messageStatus';
export { createWritePipeline } from './pipeline';
export type { WritePipeline } from './pipeline';
export { createOutbox } from './queue';
export type { Outbox } from './queue';

// =============================================================================
//  Local Store & Queries
// =============================================================================

export { createLocalStore, deleteLocalStore, SCHEMA_VERSION } from './database';
export type { LocalStore, LocalStoreOptions, LiveQuery } from './database';

export {
  userById,
  conversationById,
  conversationList,
  visibleMessages,
  unreadCount,
  isHiddenFor
} from './queries';

// =============================================================================
//  Reconciliation
// =============================================================================

export { createReconciler } from './reconciler';
export type { Reconciler, WatchHandle } from './reconciler';
export { mergeMessage, mergeConversation, mergeUser, cleanupConflictHistory } from './conflicts';
export type { FieldConflictResolution, MergeResult } from './conflicts';
export { createRealtimeHub } from './realtime';
export type { RealtimeHub, RealtimeConnectionState } from './realtime';

// =============================================================================
//  Remote Store
// =============================================================================

export { paths, parsePath } from './remote/paths';
export { arrayUnion, arrayRemove } from './remote/types';
export type {
  RemoteStore,
  RemoteChange,
  RemoteDocument,
  DocumentData,
  ReadResult,
  WriteResult,
  WriteOptions,
  CollectionQuery
} from './remote/types';
export { createMemoryRemoteStore } from './remote/memory';
export type { MemoryRemoteStore } from './remote/memory';
export { createSupabaseRemoteStore } from './remote/supabase';
export type { SupabaseRemoteStoreOptions } from './remote/supabase';

// =============================================================================
//  Presence, Settings & Notifications
// =============================================================================

export { createTypingCoordinator, activeTypists } from './presence/typing';
export type { TypingCoordinator } from './presence/typing';
export { createOnlinePresence, isEffectivelyOnline } from './presence/online';
export type { OnlinePresence } from './presence/online';
export { effective, resolveSettings, SYSTEM_DEFAULTS } from './settings';
export type { ResolvedSettings } from './settings';
export { activeConversation, shouldSuppressNotification } from './notifications';

// =============================================================================
//  Reactive Stores
// =============================================================================

export { syncStatusStore, createSyncStatusStore } from './stores/sync';
export type { SyncStatusStore, SyncError, SyncState, RealtimeState } from './stores/sync';
export { isOnline, createNetworkStore } from './stores/network';
export type { NetworkStore } from './stores/network';

// =============================================================================
//  Errors, Debug & Utilities
// =============================================================================

export {
  RemoteStoreError,
  ValidationError,
  StoreCorruptError,
  UploadError,
  classifyRemoteError,
  toRemoteStoreError
} from './errors';
export type { RemoteErrorCode, ErrorClass } from './errors';

export { debug, isDebugMode, setDebugMode } from './debug';
export { generateId } from './utils';

// =============================================================================
//  Types
// =============================================================================

export type {
  User,
  Conversation,
  ConversationKind,
  LastMessageSummary,
  Message,
  MessageType,
  MessageStatus,
  TypingIndicator,
  Feature,
  OverrideState,
  SyncStatus,
  ConflictHistoryEntry
} from './types';

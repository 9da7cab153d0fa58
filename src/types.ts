/**
 * Domain and Sync Types
 *
 * Shapes shared by the local store, the remote store adapters, the reconciler
 * and the write pipeline. All timestamps are epoch milliseconds.
 *
 * `version` and `serverUpdatedAt` are owned by the remote store: they are
 * assigned on every accepted write and copied verbatim into the local store by
 * the reconciler. A record that has never been confirmed by the server carries
 * `version: 0` and `serverUpdatedAt: null`.
 */

// ============================================================
// FEATURES & SETTINGS
// ============================================================

/** Per-user / per-conversation feature toggles. */
export type Feature = 'autoTranslate' | 'smartReplies';

/** Tri-state conversation-level override. `'unset'` defers to the user default. */
export type OverrideState = 'on' | 'off' | 'unset';

// ============================================================
// USERS
// ============================================================

export interface User {
  id: string;
  displayName: string;
  profilePictureUrl: string | null;
  preferredLanguage: string;
  isOnline: boolean;
  lastSeen: number;
  userLevelDefaults: Partial<Record<Feature, boolean>>;
  /** Users are never deleted, only deactivated. */
  deactivated: boolean;
  version: number;
  serverUpdatedAt: number | null;
}

// ============================================================
// CONVERSATIONS
// ============================================================

export type ConversationKind = 'DIRECT' | 'GROUP';

/** Denormalized copy of the newest message, for list rendering. */
export interface LastMessageSummary {
  messageId: string;
  senderId: string;
  text: string | null;
  timestamp: number;
  type: MessageType;
}

export interface Conversation {
  id: string;
  kind: ConversationKind;
  participantIds: string[];
  name: string | null; // GROUP only
  iconUrl: string | null; // GROUP only
  perUserNickname: Record<string, string>;
  /** userId -> "hidden before this time" */
  perUserDeletedAt: Record<string, number>;
  lastMessageSummary: LastMessageSummary | null;
  settingsOverride: Partial<Record<Feature, OverrideState>>;
  createdBy: string;
  createdAt: number;
  updatedAt: number;
  version: number;
  serverUpdatedAt: number | null;
}

// ============================================================
// MESSAGES
// ============================================================

export type MessageType = 'TEXT' | 'IMAGE' | 'AUDIO' | 'SYSTEM';

export type MessageStatus = 'SENDING' | 'SENT' | 'DELIVERED' | 'READ' | 'FAILED';

export interface Message {
  id: string; // client-generated, idempotency key
  conversationId: string;
  senderId: string;
  type: MessageType;
  text: string | null;
  mediaRef: string | null;
  timestamp: number; // client-assigned, monotonic per sender
  status: MessageStatus;
  readBy: Record<string, number>;
  /** Recipient acknowledgements; drives SENT -> DELIVERED on the sender's side. */
  deliveredTo: Record<string, number>;
  /** emoji -> userIds */
  reactions: Record<string, string[]>;
  /** Local-only: set when the media upload phase failed. Never synced. */
  uploadError?: string;
  version: number;
  serverUpdatedAt: number | null;
}

// ============================================================
// PRESENCE
// ============================================================

/** Ephemeral; held in memory only and never written to the local store. */
export interface TypingIndicator {
  conversationId: string;
  userId: string;
  isTyping: boolean;
  updatedAt: number;
}

// ============================================================
// OUTBOX
// ============================================================

/**
 * Operation types that preserve intent:
 * - 'create': write the full document (idempotent upsert by id)
 * - 'set': merge a patch into the document (dotted keys address map entries)
 */
export type OperationType = 'create' | 'set';

/** Local table an outbox entry belongs to. */
export type EntityTable = 'users' | 'conversations' | 'messages';

/**
 * Durable outbox entry (stored in the `syncQueue` table).
 *
 * `entityKey` is the remote document path and serializes propagation: at most
 * one entry per key is in flight at a time.
 */
export interface SyncOperationItem {
  id?: number; // Auto-increment ID
  entityKey: string; // Remote document path
  table: EntityTable;
  entityId: string;
  operationType: OperationType;
  /** Full document (create) or merge patch (set). */
  value: Record<string, unknown>;
  /** Optimistic-concurrency guard; a mismatch re-reads and reapplies. */
  expectedVersion?: number;
  timestamp: string; // ISO timestamp of when the operation was created
  retries: number; // Number of failed attempts
  lastRetryAt?: string;
}

// ============================================================
// CONFLICT RESOLUTION
// ============================================================

/**
 * Conflict history entry (stored in IndexedDB).
 * Records field-level resolutions for auditing; never shown to the user.
 */
export interface ConflictHistoryEntry {
  id?: number;
  entityId: string;
  entityType: EntityTable;
  field: string;
  localValue: unknown;
  remoteValue: unknown;
  resolvedValue: unknown;
  winner: 'local' | 'remote';
  strategy: 'local_pending' | 'last_write' | 'status_monotonic';
  timestamp: string;
}

export type SyncStatus = 'idle' | 'syncing' | 'error' | 'offline';

// ============================================================
// LOCAL TABLES
// ============================================================

/** Record type stored in each entity table. */
export interface EntityByTable {
  users: User;
  conversations: Conversation;
  messages: Message;
}

/** Key/value row of the `meta` table (schema version, per-sender clocks). */
export interface MetaRow {
  key: string;
  value: unknown;
}

/** Every table of the local database. */
export type StoreTable = EntityTable | 'syncQueue' | 'conflictHistory' | 'meta';

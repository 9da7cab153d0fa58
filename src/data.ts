/**
 * @fileoverview User Intents
 *
 * Every operation the UI can ask for. Each intent follows the same pattern:
 *
 *   1. Validate. Rejections throw {@link ValidationError} before anything is
 *      written.
 *   2. In one local transaction, apply the change to the local store and
 *      enqueue the matching outbox operation(s).
 *   3. After commit, schedule propagation for the touched entity keys.
 *
 * Intents return as soon as the local write has committed; delivery to the
 * remote store happens in the background ({@link pipeline.ts}). The UI learns
 * about the outcome only through the local store (message status) and the
 * sync status store.
 *
 * Media messages are the one two-phase intent: the media is uploaded through
 * an external {@link MediaUploader} first, and only a successful upload puts
 * the message into the outbox.
 *
 * @see {@link ./operations} for the documents and patches written
 * @see {@link ./queue} for how patches are coalesced while they wait
 */

import { ValidationError, UploadError } from './errors';
import { debugError, debugLog } from './debug';
import { generateId } from './utils';
import { advanceStatus } from './messageStatus';
import { arrayRemove, arrayUnion, type DocumentData } from './remote/types';
import { assertValidSegment, paths } from './remote/paths';
import {
  conversationSetOperation,
  createConversationOperation,
  createMessageOperation,
  messageSetOperation,
  userSetOperation
} from './operations';
import type { LocalStore } from './database';
import type { NewOperation, Outbox } from './queue';
import type { WritePipeline } from './pipeline';
import type { SyncStatusStore } from './stores/sync';
import type {
  Conversation,
  Feature,
  LastMessageSummary,
  Message,
  MessageType,
  OverrideState,
  StoreTable,
  User
} from './types';

// =============================================================================
// Constants
// =============================================================================

export const SUPPORTED_REACTIONS: readonly string[] = ['👍', '❤️', '😂', '😮', '😢', '🙏'];

/** Largest group, creator included. */
export const MAX_GROUP_SIZE = 50;

const FEATURES: readonly Feature[] = ['autoTranslate', 'smartReplies'];

// =============================================================================
// Interfaces
// =============================================================================

/** External media storage. Returns the reference stored in `Message.mediaRef`. */
export interface MediaUploader {
  upload(input: {
    messageId: string;
    conversationId: string;
    type: 'IMAGE' | 'AUDIO';
    blob: Blob | Uint8Array;
    mimeType?: string;
  }): Promise<string>;
}

export interface SendMessageInput {
  conversationId: string;
  senderId: string;
  text: string;
  type?: Extract<MessageType, 'TEXT' | 'SYSTEM'>;
}

export interface SendMediaMessageInput {
  conversationId: string;
  senderId: string;
  type: 'IMAGE' | 'AUDIO';
  blob: Blob | Uint8Array;
  mimeType?: string;
  /** Caption. */
  text?: string;
  /** Overrides the engine-wide uploader. */
  uploader?: MediaUploader;
}

export interface CreateGroupInput {
  name: string;
  /** Other members; the local user is added as creator. */
  participantIds: string[];
  iconUrl?: string | null;
}

export interface ProfileUpdate {
  displayName?: string;
  profilePictureUrl?: string | null;
  preferredLanguage?: string;
}

export interface DataLayerDeps {
  store: LocalStore;
  outbox: Outbox;
  pipeline: Pick<WritePipeline, 'schedule'>;
  /** The signed-in user; intents that act on "oneself" check against it. */
  userId: string;
  now: () => number;
  mediaUploader?: MediaUploader;
  status?: SyncStatusStore;
}

export type DataLayer = ReturnType<typeof createDataLayer>;

// =============================================================================
// Helpers
// =============================================================================

function summaryOf(message: Message): LastMessageSummary {
  return {
    messageId: message.id,
    senderId: message.senderId,
    text: message.text,
    timestamp: message.timestamp,
    type: message.type
  };
}

function newMessage(
  fields: Pick<Message, 'id' | 'conversationId' | 'senderId' | 'type' | 'text' | 'mediaRef' | 'timestamp'>
): Message {
  return {
    ...fields,
    status: 'SENDING',
    readBy: {},
    deliveredTo: {},
    reactions: {},
    version: 0,
    serverUpdatedAt: null
  };
}

function requireGroup(conversation: Conversation | undefined, conversationId: string): Conversation {
  if (!conversation) throw new ValidationError(`Unknown conversation ${conversationId}`);
  if (conversation.kind !== 'GROUP') {
    throw new ValidationError(`Conversation ${conversationId} is not a group`);
  }
  return conversation;
}

/**
 * Canonical id of the direct conversation between two users: both ids, sorted
 * and joined by `_`, with `%` and `_` inside an id percent-escaped.
 */
export function directConversationId(a: string, b: string): string {
  return [a, b].sort().map(escapeIdPart).join('_');
}

/* `_` separates the pair, so it must not survive inside either id */
function escapeIdPart(id: string): string {
  return id.replace(/%/g, '%25').replace(/_/g, '%5F');
}

// =============================================================================
// Data Layer
// =============================================================================

export function createDataLayer(deps: DataLayerDeps) {
  const { store, outbox, pipeline, userId: me } = deps;
  const { db } = store;

  /**
   * Run a local write + enqueue in one transaction, then schedule every
   * entity key the enqueued operations touched.
   */
  async function commit<T>(
    tables: readonly StoreTable[],
    fn: (enqueue: (op: NewOperation) => Promise<void>) => Promise<T>
  ): Promise<T> {
    const keys = new Set<string>();
    const result = await store.transaction([...tables, 'syncQueue'], () =>
      fn(async (op) => {
        keys.add(op.entityKey);
        await outbox.enqueue(op);
      })
    );
    for (const key of keys) pipeline.schedule(key);
    return result;
  }

  /** Strictly increasing per sender, even if the wall clock steps back. */
  async function nextTimestamp(senderId: string): Promise<number> {
    const key = `clock:${senderId}`;
    const row = await db.meta.get(key);
    const last = typeof row?.value === 'number' ? row.value : 0;
    const ts = Math.max(deps.now(), last + 1);
    await db.meta.put({ key, value: ts });
    return ts;
  }

  async function requireParticipant(conversationId: string, userId: string): Promise<Conversation> {
    const conversation = await db.conversations.get(conversationId);
    if (!conversation) throw new ValidationError(`Unknown conversation ${conversationId}`);
    if (!conversation.participantIds.includes(userId)) {
      throw new ValidationError(`${userId} is not a participant of ${conversationId}`);
    }
    return conversation;
  }

  function requireSelf(userId: string, action: string) {
    if (userId !== me) throw new ValidationError(`Cannot ${action} for another user`);
  }

  /**
   * Write a message and move the local conversation summary to it. The remote
   * summary follows once the server has accepted the message (see
   * {@link WritePipeline}).
   */
  async function putMessage(message: Message, conversation: Conversation, enqueue: (op: NewOperation) => Promise<void>) {
    await db.messages.put(message);
    await enqueue(createMessageOperation(message));

    const current = conversation.lastMessageSummary;
    if (!current || current.timestamp <= message.timestamp) {
      const updatedAt = Math.max(conversation.updatedAt, message.timestamp);
      await db.conversations.put({ ...conversation, lastMessageSummary: summaryOf(message), updatedAt });
    }
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  /**
   * Send a text message. The message is stored as SENDING and returned
   * immediately; the pipeline moves it to SENT or FAILED.
   *
   * @throws {ValidationError} For empty text or a sender outside the conversation.
   */
  async function sendMessage(input: SendMessageInput): Promise<Message> {
    const text = input.text.trim();
    if (!text) throw new ValidationError('Message text is empty');
    const id = generateId();

    const message = await commit(['messages', 'conversations', 'meta'], async (enqueue) => {
      const conversation = await requireParticipant(input.conversationId, input.senderId);
      const msg = newMessage({
        id,
        conversationId: input.conversationId,
        senderId: input.senderId,
        type: input.type ?? 'TEXT',
        text,
        mediaRef: null,
        timestamp: await nextTimestamp(input.senderId)
      });
      await putMessage(msg, conversation, enqueue);
      return msg;
    });

    debugLog(`[SYNC] Queued message ${message.id} in ${message.conversationId}`);
    return message;
  }

  /**
   * Two-phase media send: store the message locally (SENDING, no media), upload,
   * then hand it to the pipeline. A failed upload leaves the message FAILED
   * with `uploadError` set; it is never enqueued.
   *
   * @throws {ValidationError} Without an uploader or for a sender outside the conversation.
   * @throws {UploadError} When the upload fails.
   */
  async function sendMediaMessage(input: SendMediaMessageInput): Promise<Message> {
    const uploader = input.uploader ?? deps.mediaUploader;
    if (!uploader) throw new ValidationError('No media uploader configured');
    const id = generateId();

    const pending = await store.transaction(['messages', 'conversations', 'meta'], async () => {
      await requireParticipant(input.conversationId, input.senderId);
      const msg = newMessage({
        id,
        conversationId: input.conversationId,
        senderId: input.senderId,
        type: input.type,
        text: input.text?.trim() || null,
        mediaRef: null,
        timestamp: await nextTimestamp(input.senderId)
      });
      await db.messages.put(msg);
      return msg;
    });

    let mediaRef: string;
    try {
      mediaRef = await uploader.upload({
        messageId: id,
        conversationId: input.conversationId,
        type: input.type,
        blob: input.blob,
        mimeType: input.mimeType
      });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      debugError(`[SYNC] Upload failed for message ${id}:`, e);
      await store.mutate('messages', id, (msg) =>
        msg ? { ...msg, status: advanceStatus(msg.status, 'FAILED'), uploadError: reason } : undefined
      );
      deps.status?.addSyncError({
        entityKey: paths.message(input.conversationId, id),
        operation: 'upload',
        code: 'upload',
        message: reason,
        timestamp: new Date().toISOString()
      });
      throw new UploadError(`Media upload failed: ${reason}`, { cause: e });
    }

    return commit(['messages', 'conversations'], async (enqueue) => {
      const conversation = await requireParticipant(input.conversationId, input.senderId);
      const msg: Message = { ...pending, mediaRef };
      await putMessage(msg, conversation, enqueue);
      return msg;
    });
  }

  /**
   * Move a FAILED message back to SENDING and enqueue it again.
   *
   * @throws {ValidationError} Unless the message exists and is FAILED. A media
   *   message whose upload never succeeded has to be sent again from scratch.
   */
  async function retryMessage(messageId: string): Promise<Message> {
    return commit(['messages'], async (enqueue) => {
      const message = await db.messages.get(messageId);
      if (!message) throw new ValidationError(`Unknown message ${messageId}`);
      if (message.status !== 'FAILED') {
        throw new ValidationError(`Message ${messageId} is ${message.status}, not FAILED`);
      }
      if (message.type !== 'TEXT' && message.type !== 'SYSTEM' && message.mediaRef === null) {
        throw new ValidationError(`Media for ${messageId} was never uploaded; send it again`);
      }
      const retried: Message = { ...message, status: advanceStatus(message.status, 'SENDING') };
      delete retried.uploadError;
      await db.messages.put(retried);
      await enqueue(createMessageOperation(retried));
      return retried;
    });
  }

  // ===========================================================================
  // Receipts & Reactions
  // ===========================================================================

  /** Add `readBy[userId]` (and `deliveredTo[userId]`) to messages from others. */
  async function markRead(messageIds: readonly string[], userId: string): Promise<number> {
    requireSelf(userId, 'mark messages read');
    return commit(['messages'], async (enqueue) => {
      const ts = deps.now();
      let marked = 0;
      for (const message of await db.messages.bulkGet([...messageIds])) {
        if (!message || message.senderId === userId || message.readBy[userId] !== undefined) continue;

        const patch: DocumentData = { [`readBy.${userId}`]: ts };
        const deliveredTo = { ...message.deliveredTo };
        if (deliveredTo[userId] === undefined) {
          deliveredTo[userId] = ts;
          patch[`deliveredTo.${userId}`] = ts;
        }
        await db.messages.put({ ...message, readBy: { ...message.readBy, [userId]: ts }, deliveredTo });
        await enqueue(messageSetOperation(message, patch));
        marked++;
      }
      return marked;
    });
  }

  /** Mark every unread message from others in a conversation as read. */
  async function markConversationRead(conversationId: string, userId: string): Promise<number> {
    const unread = await db.messages
      .where('conversationId')
      .equals(conversationId)
      .filter((m) => m.senderId !== userId && m.readBy[userId] === undefined)
      .primaryKeys();
    if (unread.length === 0) return 0;
    return markRead(unread, userId);
  }

  /** Record that a message from someone else reached this device. */
  async function acknowledgeDelivery(message: Pick<Message, 'id' | 'conversationId'>, userId: string): Promise<void> {
    await commit(['messages'], async (enqueue) => {
      const current = await db.messages.get(message.id);
      if (!current || current.senderId === userId || current.deliveredTo[userId] !== undefined) return;
      const ts = deps.now();
      await db.messages.put({ ...current, deliveredTo: { ...current.deliveredTo, [userId]: ts } });
      await enqueue(messageSetOperation(current, { [`deliveredTo.${userId}`]: ts }));
    });
  }

  /**
   * One reaction per user per message: picking the current emoji again removes
   * it, picking another one replaces it.
   *
   * @throws {ValidationError} For an emoji outside {@link SUPPORTED_REACTIONS}.
   */
  async function toggleReaction(
    message: Pick<Message, 'id' | 'conversationId'>,
    userId: string,
    emoji: string
  ): Promise<Record<string, string[]>> {
    if (!SUPPORTED_REACTIONS.includes(emoji)) throw new ValidationError(`Unsupported emoji: ${emoji}`);
    requireSelf(userId, 'react');

    return commit(['messages'], async (enqueue) => {
      const current = await db.messages.get(message.id);
      if (!current) throw new ValidationError(`Unknown message ${message.id}`);

      const reactions: Record<string, string[]> = {};
      const patch: DocumentData = {};
      let hadSame = false;
      for (const [e, users] of Object.entries(current.reactions)) {
        if (!users.includes(userId)) {
          reactions[e] = users;
          continue;
        }
        if (e === emoji) hadSame = true;
        patch[`reactions.${e}`] = arrayRemove(userId);
        const rest = users.filter((u) => u !== userId);
        if (rest.length > 0) reactions[e] = rest;
      }
      if (!hadSame) {
        reactions[emoji] = [...(reactions[emoji] ?? []), userId];
        patch[`reactions.${emoji}`] = arrayUnion(userId);
      }

      await db.messages.put({ ...current, reactions });
      await enqueue(messageSetOperation(current, patch));
      return reactions;
    });
  }

  // ===========================================================================
  // Conversations
  // ===========================================================================

  /** Apply a patch to a local conversation and enqueue it. */
  async function updateConversation(
    conversationId: string,
    validate: (conversation: Conversation | undefined) => Conversation,
    change: (conversation: Conversation, ts: number) => { next: Conversation; patch: DocumentData; guarded?: boolean }
  ): Promise<Conversation> {
    return commit(['conversations'], async (enqueue) => {
      const conversation = validate(await db.conversations.get(conversationId));
      const { next, patch, guarded } = change(conversation, deps.now());
      await db.conversations.put(next);
      await enqueue(
        conversationSetOperation(conversationId, patch, guarded ? conversation.version : undefined)
      );
      return next;
    });
  }

  function requireMember(userId: string) {
    return (conversation: Conversation | undefined): Conversation => {
      if (!conversation) throw new ValidationError('Unknown conversation');
      if (!conversation.participantIds.includes(userId)) {
        throw new ValidationError(`${userId} is not a participant of ${conversation.id}`);
      }
      return conversation;
    };
  }

  /**
   * Set the local user's own nickname in a conversation.
   *
   * @throws {ValidationError} For someone else's nickname, an empty nickname or a non-member.
   */
  async function setNickname(conversationId: string, userId: string, nickname: string) {
    requireSelf(userId, 'set a nickname');
    const trimmed = nickname.trim();
    if (!trimmed) throw new ValidationError('Nickname is empty');
    return updateConversation(conversationId, requireMember(userId), (c, ts) => ({
      next: { ...c, perUserNickname: { ...c.perUserNickname, [userId]: trimmed }, updatedAt: ts },
      patch: { [`perUserNickname.${userId}`]: trimmed, updatedAt: ts }
    }));
  }

  async function renameGroup(conversationId: string, name: string) {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError('Group name is empty');
    return updateConversation(
      conversationId,
      (c) => requireGroup(c, conversationId),
      (c, ts) => ({ next: { ...c, name: trimmed, updatedAt: ts }, patch: { name: trimmed, updatedAt: ts } })
    );
  }

  async function setGroupIcon(conversationId: string, iconUrl: string | null) {
    return updateConversation(
      conversationId,
      (c) => requireGroup(c, conversationId),
      (c, ts) => ({ next: { ...c, iconUrl, updatedAt: ts }, patch: { iconUrl, updatedAt: ts } })
    );
  }

  /**
   * Add a member to a group. The remote write is guarded by the conversation
   * version and reapplied on conflict.
   */
  async function addParticipant(conversationId: string, userId: string) {
    assertValidSegment(userId);
    return updateConversation(
      conversationId,
      (c) => {
        const group = requireGroup(c, conversationId);
        if (group.participantIds.includes(userId)) {
          throw new ValidationError(`${userId} is already in ${conversationId}`);
        }
        if (group.participantIds.length >= MAX_GROUP_SIZE) {
          throw new ValidationError(`Groups are limited to ${MAX_GROUP_SIZE} members`);
        }
        return group;
      },
      (c, ts) => ({
        next: { ...c, participantIds: [...c.participantIds, userId], updatedAt: ts },
        patch: { participantIds: arrayUnion(userId), updatedAt: ts },
        guarded: true
      })
    );
  }

  /** Remove a member from a group; a group keeps at least two members. */
  async function removeParticipant(conversationId: string, userId: string) {
    return updateConversation(
      conversationId,
      (c) => {
        const group = requireGroup(c, conversationId);
        if (!group.participantIds.includes(userId)) {
          throw new ValidationError(`${userId} is not in ${conversationId}`);
        }
        if (group.participantIds.length <= 2) {
          throw new ValidationError('A group needs at least two members');
        }
        return group;
      },
      (c, ts) => ({
        next: { ...c, participantIds: c.participantIds.filter((id) => id !== userId), updatedAt: ts },
        patch: { participantIds: arrayRemove(userId), updatedAt: ts },
        guarded: true
      })
    );
  }

  /**
   * Open the direct conversation with another user, creating it when needed.
   * The id is derived from the sorted pair, so both sides converge on the
   * same document.
   */
  async function createDirectConversation(otherUserId: string): Promise<Conversation> {
    assertValidSegment(otherUserId);
    if (otherUserId === me) throw new ValidationError('Cannot start a conversation with yourself');
    const id = directConversationId(me, otherUserId);

    return commit(['conversations'], async (enqueue) => {
      const existing = await db.conversations.get(id);
      if (existing) return existing;

      const ts = deps.now();
      const conversation: Conversation = {
        id,
        kind: 'DIRECT',
        participantIds: [me, otherUserId].sort(),
        name: null,
        iconUrl: null,
        perUserNickname: {},
        perUserDeletedAt: {},
        lastMessageSummary: null,
        settingsOverride: {},
        createdBy: me,
        createdAt: ts,
        updatedAt: ts,
        version: 0,
        serverUpdatedAt: null
      };
      await db.conversations.put(conversation);
      /* Must not exist remotely; if the other side created it first, theirs stays */
      await enqueue({ ...createConversationOperation(conversation), expectedVersion: 0 });
      return conversation;
    });
  }

  /**
   * Create a group with the local user as creator, announced by a SYSTEM
   * message.
   */
  async function createGroup(input: CreateGroupInput): Promise<Conversation> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Group name is empty');
    const participantIds = [...new Set([me, ...input.participantIds])];
    participantIds.forEach(assertValidSegment);
    if (participantIds.length < 2) throw new ValidationError('A group needs at least two members');
    if (participantIds.length > MAX_GROUP_SIZE) {
      throw new ValidationError(`Groups are limited to ${MAX_GROUP_SIZE} members`);
    }

    const id = generateId();
    const messageId = generateId();

    return commit(['conversations', 'messages', 'meta'], async (enqueue) => {
      const ts = await nextTimestamp(me);
      const announcement = newMessage({
        id: messageId,
        conversationId: id,
        senderId: me,
        type: 'SYSTEM',
        text: `created the group "${name}"`,
        mediaRef: null,
        timestamp: ts
      });
      const conversation: Conversation = {
        id,
        kind: 'GROUP',
        participantIds,
        name,
        iconUrl: input.iconUrl ?? null,
        perUserNickname: {},
        perUserDeletedAt: {},
        lastMessageSummary: summaryOf(announcement),
        settingsOverride: {},
        createdBy: me,
        createdAt: ts,
        updatedAt: ts,
        version: 0,
        serverUpdatedAt: null
      };
      await db.conversations.put(conversation);
      /* The remote summary waits for the announcement to be accepted */
      await enqueue(createConversationOperation({ ...conversation, lastMessageSummary: null }));
      await db.messages.put(announcement);
      await enqueue(createMessageOperation(announcement));
      return conversation;
    });
  }

  /** Hide a conversation for oneself: messages up to now stop being visible. */
  async function hideConversation(conversationId: string, userId: string) {
    requireSelf(userId, 'hide a conversation');
    return updateConversation(conversationId, requireMember(userId), (c, ts) => ({
      next: { ...c, perUserDeletedAt: { ...c.perUserDeletedAt, [userId]: ts } },
      patch: { [`perUserDeletedAt.${userId}`]: ts }
    }));
  }

  // ===========================================================================
  // Settings & Profile
  // ===========================================================================

  function requireFeature(feature: Feature) {
    if (!FEATURES.includes(feature)) throw new ValidationError(`Unknown feature ${feature}`);
  }

  /** Write `conversations/{id}.settingsOverride.{feature}`. */
  async function setConversationOverride(conversationId: string, feature: Feature, state: OverrideState) {
    requireFeature(feature);
    return updateConversation(conversationId, requireMember(me), (c) => ({
      next: { ...c, settingsOverride: { ...c.settingsOverride, [feature]: state } },
      patch: { [`settingsOverride.${feature}`]: state }
    }));
  }

  /** Apply a patch to the local user record (when cached) and enqueue it. */
  async function updateUser(userId: string, local: (user: User) => User, patch: DocumentData): Promise<User | undefined> {
    return commit(['users'], async (enqueue) => {
      const user = await db.users.get(userId);
      const next = user ? local(user) : undefined;
      if (next) await db.users.put(next);
      await enqueue(userSetOperation(userId, patch));
      return next;
    });
  }

  /** Write `users/{id}.userLevelDefaults.{feature}`. */
  async function setUserDefault(userId: string, feature: Feature, enabled: boolean) {
    requireSelf(userId, 'change settings');
    requireFeature(feature);
    return updateUser(
      userId,
      (u) => ({ ...u, userLevelDefaults: { ...u.userLevelDefaults, [feature]: enabled } }),
      { [`userLevelDefaults.${feature}`]: enabled }
    );
  }

  async function updateProfile(userId: string, update: ProfileUpdate) {
    requireSelf(userId, 'edit a profile');
    const patch: DocumentData = {};
    if (update.displayName !== undefined) {
      const displayName = update.displayName.trim();
      if (!displayName) throw new ValidationError('Display name is empty');
      patch.displayName = displayName;
    }
    if (update.profilePictureUrl !== undefined) patch.profilePictureUrl = update.profilePictureUrl;
    if (update.preferredLanguage !== undefined) {
      if (!update.preferredLanguage) throw new ValidationError('Preferred language is empty');
      patch.preferredLanguage = update.preferredLanguage;
    }
    if (Object.keys(patch).length === 0) throw new ValidationError('Nothing to update');

    return updateUser(
      userId,
      (u) => ({
        ...u,
        displayName: typeof patch.displayName === 'string' ? patch.displayName : u.displayName,
        profilePictureUrl:
          update.profilePictureUrl !== undefined ? update.profilePictureUrl : u.profilePictureUrl,
        preferredLanguage: update.preferredLanguage ?? u.preferredLanguage
      }),
      patch
    );
  }

  return {
    sendMessage,
    sendMediaMessage,
    retryMessage,
    markRead,
    markConversationRead,
    acknowledgeDelivery,
    toggleReaction,
    setNickname,
    renameGroup,
    setGroupIcon,
    addParticipant,
    removeParticipant,
    createDirectConversation,
    createGroup,
    hideConversation,
    setConversationOverride,
    setUserDefault,
    updateProfile
  };
}

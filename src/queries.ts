/**
 * Built-in live queries over the local store.
 *
 * Each one is a {@link LiveQuery} for {@link LocalStore.observe}; they can also
 * be run once with `query.run(store.db)`.
 */

import Dexie from 'dexie';
import type { LiveQuery, MurmurDatabase } from './database';
import type { Conversation, Message, User } from './types';

export function userById(id: string): LiveQuery<User | undefined> {
  return { tables: ['users'], run: (db) => db.users.get(id) };
}

export function conversationById(id: string): LiveQuery<Conversation | undefined> {
  return { tables: ['conversations'], run: (db) => db.conversations.get(id) };
}

/**
 * Whether `userId` has hidden the conversation and nothing newer arrived since.
 */
export function isHiddenFor(conversation: Conversation, userId: string): boolean {
  const deletedAt = conversation.perUserDeletedAt[userId];
  if (deletedAt === undefined) return false;
  const last = conversation.lastMessageSummary?.timestamp;
  return last === undefined || last <= deletedAt;
}

/** Time used to order the conversation list. */
export function lastActivity(conversation: Conversation): number {
  return Math.max(conversation.lastMessageSummary?.timestamp ?? 0, conversation.updatedAt);
}

/**
 * Conversations `userId` participates in, newest activity first. Hidden
 * conversations reappear once a newer message arrives.
 */
export function conversationList(userId: string): LiveQuery<Conversation[]> {
  return {
    tables: ['conversations'],
    async run(db) {
      const all = await db.conversations.where('participantIds').equals(userId).toArray();
      return all
        .filter((c) => !isHiddenFor(c, userId))
        .sort((a, b) => lastActivity(b) - lastActivity(a) || (a.id < b.id ? -1 : 1));
    }
  };
}

/** Render order: timestamp ascending, id as tie-break. */
export function compareMessages(a: Message, b: Message): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

async function readVisibleMessages(
  db: MurmurDatabase,
  conversationId: string,
  viewerId: string
): Promise<Message[]> {
  const conversation = await db.conversations.get(conversationId);
  const deletedAt = conversation?.perUserDeletedAt[viewerId];
  const messages = await db.messages
    .where('[conversationId+timestamp]')
    .between([conversationId, Dexie.minKey], [conversationId, Dexie.maxKey])
    .toArray();
  return messages
    .filter((m) => deletedAt === undefined || m.timestamp > deletedAt)
    .sort(compareMessages);
}

/**
 * Messages of a conversation visible to `viewerId` (after their hide time),
 * in render order.
 */
export function visibleMessages(conversationId: string, viewerId: string): LiveQuery<Message[]> {
  return {
    tables: ['messages', 'conversations'],
    run: (db) => readVisibleMessages(db, conversationId, viewerId)
  };
}

/** Visible messages from other participants that `userId` has not read. */
export function unreadCount(conversationId: string, userId: string): LiveQuery<number> {
  return {
    tables: ['messages', 'conversations'],
    async run(db) {
      const messages = await readVisibleMessages(db, conversationId, userId);
      return messages.filter(
        (m) => m.senderId !== userId && m.type !== 'SYSTEM' && m.readBy[userId] === undefined
      ).length;
    }
  };
}

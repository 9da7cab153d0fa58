import { createLocalStore, type LocalStore } from '../database';
import { paths } from '../remote/paths';
import type { RemoteChange } from '../remote/types';
import { messageDocument, conversationDocument } from '../operations';
import type { Conversation, Message, User } from '../types';

let dbCounter = 0;

/** A fresh local store on its own database name. */
export function testStore(): Promise<LocalStore> {
  dbCounter += 1;
  return createLocalStore({ name: `murmur-test-${process.pid}-${dbCounter}-${Date.now()}` });
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'alice',
    displayName: 'Alice',
    profilePictureUrl: null,
    preferredLanguage: 'en',
    isOnline: false,
    lastSeen: 0,
    userLevelDefaults: {},
    deactivated: false,
    version: 1,
    serverUpdatedAt: 1000,
    ...overrides
  };
}

export function makeConversation(overrides: Partial<Conversation> = {}): Conversation {
  return {
    id: 'alice_bob',
    kind: 'DIRECT',
    participantIds: ['alice', 'bob'],
    name: null,
    iconUrl: null,
    perUserNickname: {},
    perUserDeletedAt: {},
    lastMessageSummary: null,
    settingsOverride: {},
    createdBy: 'alice',
    createdAt: 100,
    updatedAt: 100,
    version: 1,
    serverUpdatedAt: 1000,
    ...overrides
  };
}

export function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 'm1',
    conversationId: 'alice_bob',
    senderId: 'alice',
    type: 'TEXT',
    text: 'hello',
    mediaRef: null,
    timestamp: 200,
    status: 'SENT',
    readBy: {},
    deliveredTo: {},
    reactions: {},
    version: 1,
    serverUpdatedAt: 1000,
    ...overrides
  };
}

/** A change event carrying `message` as the server sees it, receipts included. */
export function messageChange(message: Message, isFromCache = false): RemoteChange {
  return {
    path: paths.message(message.conversationId, message.id),
    id: message.id,
    data: {
      ...messageDocument(message),
      readBy: { ...message.readBy },
      deliveredTo: { ...message.deliveredTo },
      reactions: { ...message.reactions }
    },
    version: message.version,
    serverTimestamp: message.serverUpdatedAt ?? 0,
    isFromCache
  };
}

export function conversationChange(conversation: Conversation, isFromCache = false): RemoteChange {
  return {
    path: paths.conversation(conversation.id),
    id: conversation.id,
    data: conversationDocument(conversation),
    version: conversation.version,
    serverTimestamp: conversation.serverUpdatedAt ?? 0,
    isFromCache
  };
}

export function userChange(user: User, isFromCache = false): RemoteChange {
  return {
    path: paths.user(user.id),
    id: user.id,
    data: {
      displayName: user.displayName,
      profilePictureUrl: user.profilePictureUrl,
      preferredLanguage: user.preferredLanguage,
      isOnline: user.isOnline,
      lastSeen: user.lastSeen,
      userLevelDefaults: { ...user.userLevelDefaults },
      deactivated: user.deactivated
    },
    version: user.version,
    serverTimestamp: user.serverUpdatedAt ?? 0,
    isFromCache
  };
}

/**
 * Sync Operation Helpers
 *
 * Provides utilities for:
 * - Building outbox operations for each entity kind
 * - Shaping local records into the documents the remote store holds
 * - Transforming an outbox operation into a remote write
 */

import { paths } from './remote/paths';
import type { DocumentData, WriteOptions } from './remote/types';
import type { NewOperation } from './queue';
import type { Conversation, EntityTable, Message, SyncOperationItem } from './types';

// =============================================================================
// Remote Writes
// =============================================================================

export interface RemoteWrite {
  path: string;
  patch: DocumentData;
  options?: WriteOptions;
}

/**
 * Transform an outbox operation into the write the pipeline sends.
 *
 * Both operation types are merges on the remote side; a `create` simply
 * carries every content field of the document. `expectedVersion` is passed
 * through as the optimistic-concurrency guard.
 */
export function operationToWrite(operation: SyncOperationItem): RemoteWrite {
  const patch: DocumentData =
    operation.operationType === 'create'
      ? { id: operation.entityId, ...operation.value }
      : { ...operation.value };

  return operation.expectedVersion === undefined
    ? { path: operation.entityKey, patch }
    : { path: operation.entityKey, patch, options: { expectedVersion: operation.expectedVersion } };
}

// =============================================================================
// Document Shapes
// =============================================================================

/**
 * Content fields of a message document. Receipt and reaction maps are left
 * out: other participants write into them, and a re-sent create must not
 * reset their entries.
 */
export function messageDocument(message: Message): DocumentData {
  return {
    conversationId: message.conversationId,
    senderId: message.senderId,
    type: message.type,
    text: message.text,
    mediaRef: message.mediaRef,
    timestamp: message.timestamp
  };
}

export function conversationDocument(conversation: Conversation): DocumentData {
  return {
    kind: conversation.kind,
    participantIds: [...conversation.participantIds],
    name: conversation.name,
    iconUrl: conversation.iconUrl,
    perUserNickname: { ...conversation.perUserNickname },
    perUserDeletedAt: { ...conversation.perUserDeletedAt },
    lastMessageSummary: conversation.lastMessageSummary ? { ...conversation.lastMessageSummary } : null,
    settingsOverride: { ...conversation.settingsOverride },
    createdBy: conversation.createdBy,
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt
  };
}

// =============================================================================
// Operation Builders
// =============================================================================

function entityKeyFor(table: EntityTable, entityId: string, conversationId?: string): string {
  switch (table) {
    case 'users':
      return paths.user(entityId);
    case 'conversations':
      return paths.conversation(entityId);
    case 'messages':
      if (!conversationId) throw new Error(`Message ${entityId} needs its conversation id`);
      return paths.message(conversationId, entityId);
  }
}

export function createMessageOperation(message: Message): NewOperation {
  return {
    entityKey: entityKeyFor('messages', message.id, message.conversationId),
    table: 'messages',
    entityId: message.id,
    operationType: 'create',
    value: messageDocument(message)
  };
}

export function createConversationOperation(conversation: Conversation): NewOperation {
  return {
    entityKey: entityKeyFor('conversations', conversation.id),
    table: 'conversations',
    entityId: conversation.id,
    operationType: 'create',
    value: conversationDocument(conversation)
  };
}

/** Merge-patch operation on a message document. */
export function messageSetOperation(
  message: Pick<Message, 'id' | 'conversationId'>,
  patch: DocumentData
): NewOperation {
  return {
    entityKey: entityKeyFor('messages', message.id, message.conversationId),
    table: 'messages',
    entityId: message.id,
    operationType: 'set',
    value: patch
  };
}

/** Merge-patch operation on a conversation document, optionally version-guarded. */
export function conversationSetOperation(
  conversationId: string,
  patch: DocumentData,
  expectedVersion?: number
): NewOperation {
  const op: NewOperation = {
    entityKey: entityKeyFor('conversations', conversationId),
    table: 'conversations',
    entityId: conversationId,
    operationType: 'set',
    value: patch
  };
  if (expectedVersion !== undefined) op.expectedVersion = expectedVersion;
  return op;
}

export function userSetOperation(userId: string, patch: DocumentData): NewOperation {
  return {
    entityKey: entityKeyFor('users', userId),
    table: 'users',
    entityId: userId,
    operationType: 'set',
    value: patch
  };
}

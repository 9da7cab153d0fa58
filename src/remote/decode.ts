/**
 * Remote documents -> local records.
 *
 * Documents arrive as untyped maps; every field is read through a guard and
 * falls back to its empty value. A document missing an identifying field
 * (e.g. a message without `conversationId`) decodes to `null` and is skipped
 * by the reconciler.
 */

import { isRecord } from '../utils';
import { deriveRemoteStatus } from '../messageStatus';
import type {
  Conversation,
  ConversationKind,
  Feature,
  LastMessageSummary,
  Message,
  MessageType,
  OverrideState,
  User
} from '../types';
import type { DocumentData } from './types';

/** The parts of a change or document the decoders read. */
export interface DocumentSnapshot {
  id: string;
  data: DocumentData;
  version: number;
  serverTimestamp: number;
}

const MESSAGE_TYPES: readonly MessageType[] = ['TEXT', 'IMAGE', 'AUDIO', 'SYSTEM'];
const FEATURES: readonly Feature[] = ['autoTranslate', 'smartReplies'];

// =============================================================================
// Field Readers
// =============================================================================

function str(data: DocumentData, key: string): string | null {
  const v = data[key];
  return typeof v === 'string' ? v : null;
}

function num(data: DocumentData, key: string): number | null {
  const v = data[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

function numberMap(value: unknown): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isRecord(value)) return out;
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'number') out[k] = v;
  }
  return out;
}

function stringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function reactionMap(value: unknown): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  if (!isRecord(value)) return out;
  for (const [emoji, ids] of Object.entries(value)) {
    const users = stringArray(ids);
    if (users.length > 0) out[emoji] = users;
  }
  return out;
}

function messageType(value: unknown): MessageType {
  return MESSAGE_TYPES.find((t) => t === value) ?? 'TEXT';
}

function featureFlags(value: unknown): Partial<Record<Feature, boolean>> {
  const out: Partial<Record<Feature, boolean>> = {};
  if (!isRecord(value)) return out;
  for (const feature of FEATURES) {
    const v = value[feature];
    if (typeof v === 'boolean') out[feature] = v;
  }
  return out;
}

function overrides(value: unknown): Partial<Record<Feature, OverrideState>> {
  const out: Partial<Record<Feature, OverrideState>> = {};
  if (!isRecord(value)) return out;
  for (const feature of FEATURES) {
    const v = value[feature];
    if (v === 'on' || v === 'off' || v === 'unset') out[feature] = v;
  }
  return out;
}

function summary(value: unknown): LastMessageSummary | null {
  if (!isRecord(value)) return null;
  const messageId = str(value, 'messageId');
  const senderId = str(value, 'senderId');
  const timestamp = num(value, 'timestamp');
  if (messageId === null || senderId === null || timestamp === null) return null;
  return { messageId, senderId, text: str(value, 'text'), timestamp, type: messageType(value.type) };
}

// =============================================================================
// Decoders
// =============================================================================

export function decodeMessage(doc: DocumentSnapshot): Message | null {
  const { data } = doc;
  const conversationId = str(data, 'conversationId');
  const senderId = str(data, 'senderId');
  const timestamp = num(data, 'timestamp');
  if (conversationId === null || senderId === null || timestamp === null) return null;

  const readBy = numberMap(data.readBy);
  const deliveredTo = numberMap(data.deliveredTo);
  return {
    id: doc.id,
    conversationId,
    senderId,
    type: messageType(data.type),
    text: str(data, 'text'),
    mediaRef: str(data, 'mediaRef'),
    timestamp,
    status: deriveRemoteStatus({ senderId, readBy, deliveredTo }),
    readBy,
    deliveredTo,
    reactions: reactionMap(data.reactions),
    version: doc.version,
    serverUpdatedAt: doc.serverTimestamp
  };
}

export function decodeConversation(doc: DocumentSnapshot): Conversation | null {
  const { data } = doc;
  const participantIds = stringArray(data.participantIds);
  const createdBy = str(data, 'createdBy');
  if (participantIds.length === 0 || createdBy === null) return null;

  const kind: ConversationKind = data.kind === 'GROUP' ? 'GROUP' : 'DIRECT';
  const createdAt = num(data, 'createdAt') ?? doc.serverTimestamp;
  return {
    id: doc.id,
    kind,
    participantIds,
    name: str(data, 'name'),
    iconUrl: str(data, 'iconUrl'),
    perUserNickname: stringMap(data.perUserNickname),
    perUserDeletedAt: numberMap(data.perUserDeletedAt),
    lastMessageSummary: summary(data.lastMessageSummary),
    settingsOverride: overrides(data.settingsOverride),
    createdBy,
    createdAt,
    updatedAt: num(data, 'updatedAt') ?? createdAt,
    version: doc.version,
    serverUpdatedAt: doc.serverTimestamp
  };
}

export function decodeUser(doc: DocumentSnapshot): User {
  const { data } = doc;
  return {
    id: doc.id,
    displayName: str(data, 'displayName') ?? '',
    profilePictureUrl: str(data, 'profilePictureUrl'),
    preferredLanguage: str(data, 'preferredLanguage') ?? 'en',
    isOnline: data.isOnline === true,
    lastSeen: num(data, 'lastSeen') ?? 0,
    userLevelDefaults: featureFlags(data.userLevelDefaults),
    deactivated: data.deactivated === true,
    version: doc.version,
    serverUpdatedAt: doc.serverTimestamp
  };
}

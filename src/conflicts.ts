/**
 * @fileoverview Remote/Local Merge Policy
 *
 * Decides what the local store holds after a remote snapshot of an entity
 * arrives. Every decision is per field:
 *
 * **Server-owned bookkeeping** (`version`, `serverUpdatedAt`)
 *   Taken from the snapshot, unless a field was kept for a pending local
 *   write. The snapshot then does not count as seen: the local bookkeeping
 *   stays, so the same or a newer snapshot still applies once the write has
 *   settled.
 *
 * **Grow-only maps** (`readBy`, `deliveredTo`, `perUserNickname`,
 * `perUserDeletedAt`, `settingsOverride`)
 *   Unioned per key; for a key present on both sides the remote entry wins.
 *   Entries written locally and not yet confirmed survive the merge without
 *   any special casing.
 *
 * **Message status**
 *   Re-derived from the merged receipt maps and combined with the local
 *   status so that a confirmed status never regresses. A SENDING or FAILED
 *   message whose document exists remotely becomes at least SENT.
 *
 * **Everything else**
 *   - **local_pending** -- the outbox still holds a write touching the field;
 *     the local value is kept until that write lands.
 *   - **last_write** -- otherwise the snapshot wins. Ordering is by the
 *     server-assigned `serverUpdatedAt` only: a snapshot that is not newer
 *     than the local copy is ignored outright, and the client clock never
 *     takes part.
 *
 * Merging is idempotent: applying the same snapshot twice yields a record
 * equal to the first result, which the local store then declines to rewrite.
 *
 * Outcomes that overrode one side while local writes were pending are kept in
 * the `conflictHistory` table for auditing and purged after
 * `conflictHistoryMaxAgeDays`.
 */

import { debugError, debugLog } from './debug';
import { deepEqual } from './utils';
import { deriveRemoteStatus, mergeStatus } from './messageStatus';
import type { LocalStore } from './database';
import type {
  ConflictHistoryEntry,
  Conversation,
  EntityTable,
  LastMessageSummary,
  Message,
  User
} from './types';

export type { ConflictHistoryEntry };

// =============================================================================
// Interfaces
// =============================================================================

/** Outcome for one field where local and remote disagreed. */
export interface FieldConflictResolution {
  field: string;
  localValue: unknown;
  remoteValue: unknown;
  resolvedValue: unknown;
  winner: 'local' | 'remote';
  strategy: ConflictHistoryEntry['strategy'];
}

export interface MergeResult<T> {
  merged: T;
  /** The snapshot was not newer than the local copy and was ignored. */
  stale: boolean;
  fieldResolutions: FieldConflictResolution[];
}

// =============================================================================
// Field Helpers
// =============================================================================

/** Per-key union; the remote entry wins where both sides have the key. */
export function unionMap<V>(local: Record<string, V>, remote: Record<string, V>): Record<string, V> {
  return { ...local, ...remote };
}

/** The summary of the newer message; the remote one on a tie. */
export function newerSummary(
  local: LastMessageSummary | null,
  remote: LastMessageSummary | null
): LastMessageSummary | null {
  if (!local) return remote;
  if (!remote) return local;
  return local.timestamp > remote.timestamp ? local : remote;
}

type Bookkeeping = { version: number; serverUpdatedAt: number | null };

function bookkeeping(local: Bookkeeping, remote: Bookkeeping, res: FieldConflictResolution[]): Bookkeeping {
  const source = res.some((r) => r.strategy === 'local_pending') ? local : remote;
  return { version: source.version, serverUpdatedAt: source.serverUpdatedAt };
}

function isStale(local: { serverUpdatedAt: number | null }, remote: { serverUpdatedAt: number | null }) {
  return (
    local.serverUpdatedAt !== null &&
    remote.serverUpdatedAt !== null &&
    remote.serverUpdatedAt <= local.serverUpdatedAt
  );
}

/**
 * Resolve one last-write-wins field. The caller only gets here with a
 * snapshot newer than the local copy, so the remote value wins unless a local
 * write to the field is still pending.
 */
function resolveField<T>(
  field: string,
  localValue: T,
  remoteValue: T,
  pendingFields: ReadonlySet<string>,
  out: FieldConflictResolution[]
): T {
  if (deepEqual(localValue, remoteValue)) return remoteValue;
  if (pendingFields.has(field)) {
    out.push({
      field,
      localValue,
      remoteValue,
      resolvedValue: localValue,
      winner: 'local',
      strategy: 'local_pending'
    });
    return localValue;
  }
  out.push({
    field,
    localValue,
    remoteValue,
    resolvedValue: remoteValue,
    winner: 'remote',
    strategy: 'last_write'
  });
  return remoteValue;
}

// =============================================================================
// Entity Merges
// =============================================================================

export function mergeMessage(
  local: Message | undefined,
  remote: Message,
  pendingFields: ReadonlySet<string> = new Set()
): MergeResult<Message> {
  if (!local) return { merged: remote, stale: false, fieldResolutions: [] };
  if (isStale(local, remote)) return { merged: local, stale: true, fieldResolutions: [] };

  const res: FieldConflictResolution[] = [];
  const readBy = unionMap(local.readBy, remote.readBy);
  const deliveredTo = unionMap(local.deliveredTo, remote.deliveredTo);
  const derived = deriveRemoteStatus({ senderId: local.senderId, readBy, deliveredTo });
  const status = mergeStatus(local.status, derived);
  if (status !== derived && status !== 'SENDING' && status !== 'FAILED') {
    res.push({
      field: 'status',
      localValue: local.status,
      remoteValue: derived,
      resolvedValue: status,
      winner: 'local',
      strategy: 'status_monotonic'
    });
  }

  /* No uploadError: the document exists remotely, so any earlier upload failure is moot */
  const merged: Message = {
    id: local.id,
    conversationId: local.conversationId,
    senderId: local.senderId,
    type: resolveField('type', local.type, remote.type, pendingFields, res),
    text: resolveField('text', local.text, remote.text, pendingFields, res),
    mediaRef: resolveField('mediaRef', local.mediaRef, remote.mediaRef, pendingFields, res),
    timestamp: resolveField('timestamp', local.timestamp, remote.timestamp, pendingFields, res),
    status,
    readBy,
    deliveredTo,
    reactions: resolveField('reactions', local.reactions, remote.reactions, pendingFields, res),
    ...bookkeeping(local, remote, res)
  };
  return { merged, stale: false, fieldResolutions: res };
}

export function mergeConversation(
  local: Conversation | undefined,
  remote: Conversation,
  pendingFields: ReadonlySet<string> = new Set()
): MergeResult<Conversation> {
  if (!local) return { merged: remote, stale: false, fieldResolutions: [] };
  if (isStale(local, remote)) return { merged: local, stale: true, fieldResolutions: [] };

  const res: FieldConflictResolution[] = [];
  const merged: Conversation = {
    id: local.id,
    kind: remote.kind,
    participantIds: resolveField(
      'participantIds',
      local.participantIds,
      remote.participantIds,
      pendingFields,
      res
    ),
    name: resolveField('name', local.name, remote.name, pendingFields, res),
    iconUrl: resolveField('iconUrl', local.iconUrl, remote.iconUrl, pendingFields, res),
    perUserNickname: unionMap(local.perUserNickname, remote.perUserNickname),
    perUserDeletedAt: unionMap(local.perUserDeletedAt, remote.perUserDeletedAt),
    lastMessageSummary: newerSummary(local.lastMessageSummary, remote.lastMessageSummary),
    settingsOverride: unionMap(local.settingsOverride, remote.settingsOverride),
    createdBy: remote.createdBy,
    createdAt: remote.createdAt,
    updatedAt: Math.max(local.updatedAt, remote.updatedAt),
    ...bookkeeping(local, remote, res)
  };
  return { merged, stale: false, fieldResolutions: res };
}

export function mergeUser(
  local: User | undefined,
  remote: User,
  pendingFields: ReadonlySet<string> = new Set()
): MergeResult<User> {
  if (!local) return { merged: remote, stale: false, fieldResolutions: [] };
  if (isStale(local, remote)) return { merged: local, stale: true, fieldResolutions: [] };

  const res: FieldConflictResolution[] = [];
  const merged: User = {
    id: local.id,
    displayName: resolveField('displayName', local.displayName, remote.displayName, pendingFields, res),
    profilePictureUrl: resolveField(
      'profilePictureUrl',
      local.profilePictureUrl,
      remote.profilePictureUrl,
      pendingFields,
      res
    ),
    preferredLanguage: resolveField(
      'preferredLanguage',
      local.preferredLanguage,
      remote.preferredLanguage,
      pendingFields,
      res
    ),
    isOnline: resolveField('isOnline', local.isOnline, remote.isOnline, pendingFields, res),
    lastSeen: resolveField('lastSeen', local.lastSeen, remote.lastSeen, pendingFields, res),
    userLevelDefaults: unionMap(local.userLevelDefaults, remote.userLevelDefaults),
    deactivated: resolveField('deactivated', local.deactivated, remote.deactivated, pendingFields, res),
    ...bookkeeping(local, remote, res)
  };
  return { merged, stale: false, fieldResolutions: res };
}

// =============================================================================
// Conflict History Persistence
// =============================================================================

/**
 * Record the outcomes of a merge that ran against pending local writes.
 * Plain remote updates (no pending writes, nothing overridden) are not
 * conflicts and are not recorded.
 */
export async function storeConflictHistory(
  store: LocalStore,
  entityType: EntityTable,
  entityId: string,
  fieldResolutions: FieldConflictResolution[],
  hadPending: boolean
): Promise<void> {
  const worthRecording = fieldResolutions.filter(
    (fr) => hadPending || fr.strategy !== 'last_write'
  );
  if (worthRecording.length === 0) return;

  const timestamp = new Date().toISOString();
  const entries: ConflictHistoryEntry[] = worthRecording.map((fr) => ({
    entityId,
    entityType,
    field: fr.field,
    localValue: fr.localValue,
    remoteValue: fr.remoteValue,
    resolvedValue: fr.resolvedValue,
    winner: fr.winner,
    strategy: fr.strategy,
    timestamp
  }));

  try {
    await store.db.conflictHistory.bulkAdd(entries);
  } catch (error) {
    /* Audit trail only; the merged record is already stored */
    debugError('[Conflict] Failed to store conflict history:', error);
  }
}

/**
 * Delete conflict history entries older than `maxAgeDays`.
 *
 * @returns The number of entries removed.
 */
export async function cleanupConflictHistory(store: LocalStore, maxAgeDays = 30): Promise<number> {
  const cutoffDate = new Date();
  cutoffDate.setDate(cutoffDate.getDate() - maxAgeDays);
  const cutoffStr = cutoffDate.toISOString();

  try {
    const count = await store.db.conflictHistory.where('timestamp').below(cutoffStr).delete();
    if (count > 0) {
      debugLog(`[Conflict] Cleaned up ${count} old conflict history entries`);
    }
    return count;
  } catch (error) {
    debugError('[Conflict] Failed to cleanup conflict history:', error);
    return 0;
  }
}

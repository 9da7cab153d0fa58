/**
 * @fileoverview Optimistic Write Pipeline
 *
 * Drains the outbox ({@link queue.ts}) into the remote store. Local writes
 * have already happened by the time an operation gets here; this module only
 * decides when and how often to send it, and what the local store shows once
 * the remote store has answered.
 *
 * Per entity key:
 *   - at most one operation is in flight, always the oldest
 *   - the in-flight operation is claimed so later writes do not fold into it
 *
 * Per attempt, by error class:
 *   - **transient** -- wait `retryDelaysMs[n]` and retry; once the delays are
 *     used up the operation is given up
 *   - **permanent** -- given up immediately
 *   - **conflict**  -- re-read the document and reapply the same patch against
 *     the fresh version, up to `maxConflictRetries` times. A guarded create
 *     whose document already exists is done: the reconciler brings the
 *     existing document in.
 *
 * While the network store reports offline, the pipeline parks without
 * spending attempts and resumes on the reconnect edge.
 *
 * Giving up never drops an operation silently: a message create turns the
 * message FAILED (the user can retry it), anything else is reported to the
 * sync status store.
 *
 * An accepted message create queues the conversation's `lastMessageSummary`
 * update, so the summary never points at a message the server does not have.
 */

import { classifyRemoteError, type RemoteStoreError } from './errors';
import { debugError, debugLog, debugWarn } from './debug';
import { delay } from './utils';
import { conversationSetOperation, operationToWrite } from './operations';
import { advanceStatus, canTransition } from './messageStatus';
import type { LocalStore } from './database';
import type { Outbox } from './queue';
import type { RemoteStore, WriteResult } from './remote/types';
import type { NetworkStore } from './stores/network';
import type { SyncStatusStore } from './stores/sync';
import type { Message, SyncOperationItem } from './types';

export interface WritePipelineDeps {
  store: LocalStore;
  outbox: Outbox;
  remote: RemoteStore;
  network: Pick<NetworkStore, 'get' | 'onReconnect'>;
  status?: SyncStatusStore;
  retryDelaysMs: readonly number[];
  maxConflictRetries: number;
  /** Runs once an operation has left the outbox, accepted or given up. */
  onSettled?: (op: SyncOperationItem) => Promise<void>;
}

export interface WritePipeline {
  /** Start (or continue) draining the operations queued for one entity. */
  schedule(entityKey: string): void;
  /** Coalesce the outbox, then schedule every entity that has pending operations. */
  resume(): Promise<void>;
  /** Resolves once no entity is being drained. */
  idle(): Promise<void>;
  /** Stop scheduling; in-flight attempts finish but are not retried. */
  stop(): void;
}

type AttemptOutcome = 'done' | 'gave-up' | 'parked' | 'stopped';

export function createWritePipeline(deps: WritePipelineDeps): WritePipeline {
  const { store, outbox, remote, network, status } = deps;
  const workers = new Map<string, Promise<void>>();
  /* Keys scheduled again while their worker was running */
  const rerun = new Set<string>();
  let stopped = false;

  const offReconnect = network.onReconnect(async () => {
    debugLog('[SYNC] Network back; resuming outbox');
    await resume();
  });

  function schedule(entityKey: string) {
    if (stopped) return;
    if (workers.has(entityKey)) {
      rerun.add(entityKey);
      return;
    }
    if (workers.size === 0) status?.setStatus('syncing');

    const worker = drain(entityKey)
      .catch((e: unknown) => {
        debugError(`[SYNC] Worker for ${entityKey} crashed:`, e);
      })
      .finally(() => {
        workers.delete(entityKey);
        if (rerun.delete(entityKey)) {
          schedule(entityKey);
        } else if (workers.size === 0) {
          settleStatus().catch((e: unknown) => {
            debugError('[SYNC] Failed to settle sync status:', e);
          });
        }
      });
    workers.set(entityKey, worker);
  }

  async function settleStatus() {
    const pending = await outbox.count();
    if (workers.size > 0) return;
    if (pending === 0) status?.setStatus('idle');
    else status?.setStatus(network.get() ? 'error' : 'offline');
  }

  async function drain(entityKey: string): Promise<void> {
    while (!stopped) {
      if (!network.get()) {
        debugLog(`[SYNC] Offline; parking ${entityKey}`);
        return;
      }
      const op = await outbox.claimNext(entityKey);
      if (op?.id === undefined) return;

      let outcome: AttemptOutcome;
      try {
        outcome = await propagate(op, op.id);
      } finally {
        outbox.release(op.id);
      }
      if (outcome === 'parked' || outcome === 'stopped') return;
      await settled(op);
    }
  }

  // ===========================================================================
  // One Operation
  // ===========================================================================

  async function propagate(op: SyncOperationItem, id: number): Promise<AttemptOutcome> {
    const write = operationToWrite(op);
    let options = write.options;
    let conflictRounds = 0;

    for (;;) {
      const result: WriteResult = await remote.write(write.path, write.patch, options);

      if (result.ok) {
        await outbox.remove(id);
        await onDelivered(op);
        return 'done';
      }

      const { error } = result;
      switch (classifyRemoteError(error)) {
        case 'conflict': {
          if (op.operationType === 'create' && options?.expectedVersion === 0) {
            debugLog(`[SYNC] ${op.entityKey} already exists; create dropped`);
            await outbox.remove(id);
            return 'done';
          }
          if (conflictRounds >= deps.maxConflictRetries) {
            await giveUp(op, id, error);
            return 'gave-up';
          }
          conflictRounds++;
          const fresh = await remote.read(write.path);
          if (!fresh.ok) {
            await giveUp(op, id, fresh.error);
            return 'gave-up';
          }
          debugLog(`[SYNC] Version conflict on ${op.entityKey}; reapplying (round ${conflictRounds})`);
          options = { expectedVersion: fresh.doc?.version ?? 0 };
          continue;
        }

        case 'permanent':
          await giveUp(op, id, error);
          return 'gave-up';

        case 'transient': {
          if (!network.get()) return 'parked';
          const retries = await outbox.incrementRetry(id);
          const wait = deps.retryDelaysMs[retries - 1];
          if (wait === undefined) {
            await giveUp(op, id, error);
            return 'gave-up';
          }
          debugWarn(`[SYNC] ${op.entityKey} failed (${error.code}); retrying in ${wait}ms`);
          await delay(wait);
          if (stopped) return 'stopped';
          if (!network.get()) return 'parked';
          continue;
        }
      }
    }
  }

  async function settled(op: SyncOperationItem) {
    if (!deps.onSettled) return;
    try {
      await deps.onSettled(op);
    } catch (e) {
      debugError(`[SYNC] Settle hook for ${op.entityKey} failed:`, e);
    }
  }

  /** SENDING (or FAILED, for a late success) -> SENT once the create is accepted. */
  async function onDelivered(op: SyncOperationItem) {
    status?.setLastSyncTime(new Date().toISOString());
    if (op.table !== 'messages' || op.operationType !== 'create') return;

    const sent: Message[] = [];
    await store.mutate('messages', op.entityId, (current) => {
      if (!current || !canTransition(current.status, 'SENT')) return undefined;
      const next: Message = { ...current, status: advanceStatus(current.status, 'SENT'), uploadError: undefined };
      sent.push(next);
      return next;
    });
    for (const message of sent) await publishSummary(message.id, message.conversationId);
  }

  /** Queue the remote summary update while the local summary still names this message. */
  async function publishSummary(messageId: string, conversationId: string) {
    const conversation = await store.get('conversations', conversationId);
    const summary = conversation?.lastMessageSummary;
    if (!conversation || summary?.messageId !== messageId) return;

    const op = conversationSetOperation(conversationId, {
      lastMessageSummary: { ...summary },
      updatedAt: conversation.updatedAt
    });
    await outbox.enqueue(op);
    schedule(op.entityKey);
  }

  async function giveUp(op: SyncOperationItem, id: number, error: RemoteStoreError) {
    debugError(`[SYNC] Giving up on ${op.operationType} ${op.entityKey}:`, error.message);
    await outbox.remove(id);

    if (op.table === 'messages' && op.operationType === 'create') {
      await store.mutate('messages', op.entityId, (message) => {
        if (!message || !canTransition(message.status, 'FAILED')) return undefined;
        return { ...message, status: advanceStatus(message.status, 'FAILED') };
      });
      return;
    }

    status?.addSyncError({
      entityKey: op.entityKey,
      operation: op.operationType,
      code: error.code,
      message: error.message,
      timestamp: new Date().toISOString()
    });
    status?.setError(`Could not save changes to ${op.table}`, error.message);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async function resume(): Promise<void> {
    if (stopped) return;
    await outbox.coalescePendingOps();
    const pending = await outbox.getPending();
    const keys = new Set(pending.map((op) => op.entityKey));
    if (keys.size > 0) debugLog(`[SYNC] Resuming ${pending.length} pending operations`);
    for (const key of keys) schedule(key);
  }

  return {
    schedule,
    resume,

    async idle() {
      while (workers.size > 0) {
        await Promise.all([...workers.values()]);
      }
    },

    stop() {
      stopped = true;
      offReconnect();
      rerun.clear();
    }
  };
}

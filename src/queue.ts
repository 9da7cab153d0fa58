/**
 * @fileoverview Outbox & Operation Coalescing
 *
 * Every local mutation that has to reach the remote store is recorded as an
 * intent-based operation in the `syncQueue` table, in the same transaction as
 * the local write itself. The write pipeline ({@link pipeline.ts}) drains it.
 *
 * ## Operations
 *
 * - `create` -- the full document, written as an upsert keyed by id
 * - `set`    -- a merge patch; dotted keys address map entries, values may be
 *               array transforms
 *
 * Both are keyed by `entityKey`, the remote document path. The pipeline runs
 * at most one operation per key at a time, always the oldest.
 *
 * ## Coalescing
 *
 * Operations on the same entity are folded together while they wait:
 *
 *   - CREATE + later SETs  = one CREATE with the patches applied to its payload
 *   - SET + SET            = one SET carrying both patches (later keys win)
 *
 * An operation that is already in flight, or that carries an
 * `expectedVersion` guard, is never folded into or out of: the guarded
 * read-modify-write must reach the server exactly as issued.
 *
 * The `id` (auto-increment) preserves enqueue order; `timestamp` is immutable
 * after creation and only `retries`/`lastRetryAt` change on failure.
 */

import { debugLog, debugWarn, isDebugMode } from './debug';
import { applyPatch } from './remote/patch';
import { isFieldTransform } from './remote/types';
import type { LocalStore } from './database';
import type { SyncStatusStore } from './stores/sync';
import type { SyncOperationItem } from './types';

/** Operation as handed to {@link Outbox.enqueue}; bookkeeping fields are stamped there. */
export type NewOperation = Omit<SyncOperationItem, 'id' | 'timestamp' | 'retries' | 'lastRetryAt'>;

export interface Outbox {
  /**
   * Record an operation, folding it into a waiting operation on the same
   * entity when possible. Safe to call inside a {@link LocalStore.transaction}
   * that includes `syncQueue`.
   *
   * @returns The id of the row now carrying the operation.
   */
  enqueue(op: NewOperation): Promise<number>;
  /** Full coalescing pass over the whole queue. Returns the number of rows removed. */
  coalescePendingOps(): Promise<number>;
  /** All pending operations in enqueue order. */
  getPending(): Promise<SyncOperationItem[]>;
  /**
   * Oldest pending operation for an entity, marked in flight in the same
   * transaction that reads it so no concurrent enqueue can fold into it.
   * Pair with {@link release}.
   */
  claimNext(entityKey: string): Promise<SyncOperationItem | undefined>;
  remove(id: number): Promise<void>;
  /** @returns The new retry count. */
  incrementRetry(id: number): Promise<number>;
  /** Top-level fields with a pending local write, per entity key. */
  getPendingFields(entityKey: string): Promise<Set<string>>;
  count(): Promise<number>;
  /** End the in-flight mark set by {@link claimNext}. */
  release(id: number): void;
}

export function createOutbox(store: LocalStore, status?: SyncStatusStore): Outbox {
  const { db } = store;
  const inFlight = new Set<number>();

  async function publishCount() {
    status?.setPendingCount(await db.syncQueue.count());
  }

  function canFold(item: SyncOperationItem): boolean {
    return item.id !== undefined && !inFlight.has(item.id) && item.expectedVersion === undefined;
  }

  async function enqueue(op: NewOperation): Promise<number> {
    const id = await db.transaction('rw', db.syncQueue, async () => {
      const waiting = await db.syncQueue.where('entityKey').equals(op.entityKey).sortBy('id');
      const last = waiting[waiting.length - 1];

      if (last?.id !== undefined && op.expectedVersion === undefined && canFold(last)) {
        const folded = fold(last, op);
        if (folded) {
          await db.syncQueue.update(last.id, { value: folded });
          if (isDebugMode()) {
            debugLog(`[QUEUE] Folded ${op.operationType} into #${last.id} (${op.entityKey})`);
          }
          return last.id;
        }
      }

      return db.syncQueue.add({
        ...op,
        timestamp: new Date().toISOString(),
        retries: 0
      });
    });
    store.notify(['syncQueue']);
    await publishCount();
    return id;
  }

  async function coalescePendingOps(): Promise<number> {
    const removed = await db.transaction('rw', db.syncQueue, async () => {
      const all = await db.syncQueue.orderBy('id').toArray();
      if (all.length <= 1) return 0;

      const byKey = new Map<string, SyncOperationItem[]>();
      for (const item of all) {
        const group = byKey.get(item.entityKey);
        if (group) group.push(item);
        else byKey.set(item.entityKey, [item]);
      }

      const idsToDelete: number[] = [];
      for (const items of byKey.values()) {
        let carrier: SyncOperationItem | null = null;
        for (const item of items) {
          if (carrier?.id !== undefined && canFold(carrier) && item.expectedVersion === undefined) {
            const folded = fold(carrier, item);
            if (folded && item.id !== undefined) {
              await db.syncQueue.update(carrier.id, { value: folded });
              const updated: SyncOperationItem = { ...carrier, value: folded };
              carrier = updated;
              idsToDelete.push(item.id);
              continue;
            }
          }
          carrier = item;
        }
      }

      if (idsToDelete.length > 0) await db.syncQueue.bulkDelete(idsToDelete);
      return idsToDelete.length;
    });

    if (removed > 0) {
      debugLog(`[QUEUE] Coalesced away ${removed} redundant operations`);
      store.notify(['syncQueue']);
      await publishCount();
    }
    return removed;
  }

  return {
    enqueue,
    coalescePendingOps,

    getPending: () => db.syncQueue.orderBy('id').toArray(),

    claimNext(entityKey) {
      return db.transaction('rw', db.syncQueue, async () => {
        const items = await db.syncQueue.where('entityKey').equals(entityKey).sortBy('id');
        const next = items[0];
        if (next?.id !== undefined) inFlight.add(next.id);
        return next;
      });
    },

    async remove(id) {
      inFlight.delete(id);
      await db.syncQueue.delete(id);
      store.notify(['syncQueue']);
      await publishCount();
    },

    async incrementRetry(id) {
      const item = await db.syncQueue.get(id);
      if (!item) return 0;
      const retries = item.retries + 1;
      /* timestamp is preserved to keep enqueue order */
      await db.syncQueue.update(id, { retries, lastRetryAt: new Date().toISOString() });
      debugWarn(`[QUEUE] Retry ${retries} for ${item.operationType} ${item.entityKey}`);
      return retries;
    },

    async getPendingFields(entityKey) {
      const items = await db.syncQueue.where('entityKey').equals(entityKey).toArray();
      const fields = new Set<string>();
      for (const item of items) {
        for (const key of Object.keys(item.value)) fields.add(key.split('.')[0]);
      }
      return fields;
    },

    count: () => db.syncQueue.count(),

    release(id) {
      inFlight.delete(id);
    }
  };
}

// =============================================================================
// Folding
// =============================================================================

/**
 * Combine a waiting operation with a later one on the same entity.
 *
 * @returns The carrier's new `value`, or `null` when the two cannot be merged.
 */
function fold(carrier: SyncOperationItem, next: NewOperation | SyncOperationItem): Record<string, unknown> | null {
  if (next.operationType === 'create') {
    /* A second create supersedes only another create */
    return carrier.operationType === 'create' ? { ...next.value } : null;
  }

  if (carrier.operationType === 'create') {
    return applyPatch(carrier.value, next.value);
  }

  return mergePatches(carrier.value, next.value);
}

/**
 * Merge two `set` patches so that applying the result equals applying `a`
 * then `b`. Returns `null` when a key is transformed in one and touched in the
 * other (array transforms do not compose).
 */
export function mergePatches(
  a: Record<string, unknown>,
  b: Record<string, unknown>
): Record<string, unknown> | null {
  const merged: Record<string, unknown> = { ...a };

  for (const [key, value] of Object.entries(b)) {
    if (key in merged && (isFieldTransform(merged[key]) || isFieldTransform(value))) {
      return null;
    }
    /* Setting `m` supersedes earlier `m.x` entries */
    for (const existing of Object.keys(merged)) {
      if (existing.startsWith(`${key}.`)) delete merged[existing];
    }
    /* Re-insert so key order follows write order */
    delete merged[key];
    merged[key] = value;
  }

  return merged;
}

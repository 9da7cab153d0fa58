/**
 * @fileoverview Remote Store Contract
 *
 * The sync core talks to the remote document store exclusively through the
 * {@link RemoteStore} interface: point reads, merge writes with optional
 * optimistic concurrency, and subscribable change streams keyed by document or
 * collection path.
 *
 * Two implementations ship with the package:
 *   - {@link ./supabase.ts} -- Postgres tables + Realtime channels (production)
 *   - {@link ./memory.ts}   -- in-process store (demo mode and tests)
 *
 * Writes are **merges**: top-level keys replace the stored value, dotted keys
 * (`readBy.u1`) address a single map entry, and {@link FieldTransform}s are
 * applied against the stored value on the server side. This is what lets two
 * participants write different `readBy` entries of the same message without
 * clobbering each other.
 */

import type { RemoteStoreError } from '../errors';

// =============================================================================
// Documents & Patches
// =============================================================================

export type DocumentData = Record<string, unknown>;

/** Array-valued field mutation resolved against the stored value. */
export interface FieldTransform {
  readonly __transform: 'arrayUnion' | 'arrayRemove';
  readonly values: readonly string[];
}

/** Add values to an array field (no duplicates). */
export function arrayUnion(...values: string[]): FieldTransform {
  return { __transform: 'arrayUnion', values };
}

/** Remove values from an array field. */
export function arrayRemove(...values: string[]): FieldTransform {
  return { __transform: 'arrayRemove', values };
}

export function isFieldTransform(value: unknown): value is FieldTransform {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__transform' in value &&
    'values' in value &&
    (value.__transform === 'arrayUnion' || value.__transform === 'arrayRemove') &&
    Array.isArray(value.values)
  );
}

export interface RemoteDocument {
  path: string;
  id: string;
  data: DocumentData;
  version: number;
  /** Server-assigned time of the last accepted write. */
  serverTimestamp: number;
}

// =============================================================================
// Results
// =============================================================================

export type ReadResult =
  | { ok: true; doc: RemoteDocument | null }
  | { ok: false; error: RemoteStoreError };

export type WriteResult =
  | { ok: true; version: number; serverTimestamp: number }
  | { ok: false; error: RemoteStoreError };

export interface WriteOptions {
  /** Reject with `conflict` unless the stored version equals this (0 = must not exist). */
  expectedVersion?: number;
}

// =============================================================================
// Subscriptions
// =============================================================================

/**
 * One document-level change. `data === null` means the document was removed
 * (or left the subscribed query).
 */
export interface RemoteChange {
  path: string;
  id: string;
  data: DocumentData | null;
  version: number;
  serverTimestamp: number;
  /** Replayed from the last known state rather than freshly read from the server. */
  isFromCache: boolean;
}

export interface SubscriptionHandlers {
  /**
   * Receives ordered batches. The first batch after (re)connecting is the full
   * current state of the path (possibly empty).
   */
  onChanges(changes: RemoteChange[]): void;
  /** The subscription is dead; the caller decides whether to reconnect. */
  onError(error: RemoteStoreError): void;
}

/** Filter for collection subscriptions. */
export interface CollectionQuery {
  arrayContains?: { field: string; value: string };
}

export type Unsubscribe = () => void;

// =============================================================================
// Store
// =============================================================================

export interface RemoteStore {
  read(path: string): Promise<ReadResult>;
  write(path: string, patch: DocumentData, options?: WriteOptions): Promise<WriteResult>;
  /**
   * Open a change stream on a document or collection path. Collections of
   * messages are delivered ordered by `timestamp` ascending.
   */
  subscribe(path: string, handlers: SubscriptionHandlers, query?: CollectionQuery): Unsubscribe;
}

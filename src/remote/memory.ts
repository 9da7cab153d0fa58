/**
 * @fileoverview In-Process Remote Store
 *
 * A complete {@link RemoteStore} held in memory. Backs demo mode (no backend
 * configured) and every test that needs a server. Behaves like the real thing
 * where the sync core cares:
 *
 *   - server timestamps come from an injectable clock and strictly increase
 *   - every accepted write bumps the document `version`
 *   - writes are merges (dotted keys, array transforms)
 *   - change delivery is asynchronous (microtask) and ordered per subscriber
 *
 * It also exposes failure controls: {@link MemoryRemoteStore.setOnline} takes
 * the whole server away (writes fail `unavailable`, live subscriptions error),
 * and {@link MemoryRemoteStore.failNextWrites} rejects a number of upcoming
 * writes with a chosen code.
 */

import { RemoteStoreError, type RemoteErrorCode } from '../errors';
import { debugLog } from '../debug';
import { applyPatch } from './patch';
import { isCollection, lastSegment, parentPath, parsePath } from './paths';
import type {
  CollectionQuery,
  DocumentData,
  ReadResult,
  RemoteChange,
  RemoteDocument,
  RemoteStore,
  SubscriptionHandlers,
  Unsubscribe,
  WriteOptions,
  WriteResult
} from './types';

export interface MemoryRemoteStoreOptions {
  /** Server clock in epoch ms. Default: `Date.now`. */
  now?: () => number;
}

/** An accepted write, as recorded by {@link MemoryRemoteStore.writes}. */
export interface AcceptedWrite {
  path: string;
  patch: DocumentData;
  version: number;
  serverTimestamp: number;
}

export interface MemoryRemoteStore extends RemoteStore {
  /** Take the server away (`false`) or bring it back (`true`). */
  setOnline(online: boolean): void;
  isOnline(): boolean;
  /** Reject the next `count` writes with `code` (default `unavailable`). */
  failNextWrites(count: number, code?: RemoteErrorCode): void;
  /** Synchronous view of a stored document. */
  get(path: string): RemoteDocument | null;
  /** Every accepted write, oldest first. */
  writes(): readonly AcceptedWrite[];
}

interface StoredDoc {
  data: DocumentData;
  version: number;
  serverTimestamp: number;
}

interface Subscriber {
  path: string;
  collection: boolean;
  query?: CollectionQuery;
  handlers: SubscriptionHandlers;
  /** Collection members currently inside the query. */
  matched: Set<string>;
  active: boolean;
}

export function createMemoryRemoteStore(options: MemoryRemoteStoreOptions = {}): MemoryRemoteStore {
  const clock = options.now ?? Date.now;
  const docs = new Map<string, StoredDoc>();
  const subscribers = new Set<Subscriber>();
  const accepted: AcceptedWrite[] = [];
  const pendingFailures: RemoteErrorCode[] = [];
  let online = true;
  let lastTimestamp = 0;

  function nextServerTimestamp(): number {
    lastTimestamp = Math.max(clock(), lastTimestamp + 1);
    return lastTimestamp;
  }

  function toDocument(path: string, doc: StoredDoc): RemoteDocument {
    return {
      path,
      id: lastSegment(path),
      data: structuredClone(doc.data),
      version: doc.version,
      serverTimestamp: doc.serverTimestamp
    };
  }

  function toChange(path: string, doc: StoredDoc): RemoteChange {
    return { ...toDocument(path, doc), isFromCache: false };
  }

  function matchesQuery(data: DocumentData, query?: CollectionQuery): boolean {
    if (!query?.arrayContains) return true;
    const value = data[query.arrayContains.field];
    return Array.isArray(value) && value.includes(query.arrayContains.value);
  }

  function deliver(sub: Subscriber, changes: RemoteChange[]) {
    queueMicrotask(() => {
      if (sub.active) sub.handlers.onChanges(changes);
    });
  }

  function fail(sub: Subscriber, error: RemoteStoreError) {
    sub.active = false;
    subscribers.delete(sub);
    queueMicrotask(() => sub.handlers.onError(error));
  }

  function collectionSnapshot(sub: Subscriber): RemoteChange[] {
    const changes: RemoteChange[] = [];
    for (const [path, doc] of docs) {
      if (parentPath(path) !== sub.path || !matchesQuery(doc.data, sub.query)) continue;
      sub.matched.add(lastSegment(path));
      changes.push(toChange(path, doc));
    }
    return changes.sort(compareChanges);
  }

  function notify(path: string, doc: StoredDoc) {
    const collectionPath = parentPath(path);
    const id = lastSegment(path);
    for (const sub of subscribers) {
      if (!sub.active) continue;
      if (!sub.collection) {
        if (sub.path === path) deliver(sub, [toChange(path, doc)]);
        continue;
      }
      if (sub.path !== collectionPath) continue;
      if (matchesQuery(doc.data, sub.query)) {
        sub.matched.add(id);
        deliver(sub, [toChange(path, doc)]);
      } else if (sub.matched.delete(id)) {
        /* Document left the query */
        deliver(sub, [{ ...toChange(path, doc), data: null }]);
      }
    }
  }

  return {
    async read(path: string): Promise<ReadResult> {
      if (!online) return { ok: false, error: new RemoteStoreError('unavailable', 'offline') };
      const invalid = checkDocumentPath(path);
      if (invalid) return { ok: false, error: invalid };
      const doc = docs.get(path);
      return { ok: true, doc: doc ? toDocument(path, doc) : null };
    },

    async write(path: string, patch: DocumentData, options?: WriteOptions): Promise<WriteResult> {
      if (!online) return { ok: false, error: new RemoteStoreError('unavailable', 'offline') };

      const injected = pendingFailures.shift();
      if (injected) {
        debugLog(`[MemoryRemote] Injected ${injected} for ${path}`);
        return { ok: false, error: new RemoteStoreError(injected, `injected ${injected}`) };
      }

      const invalid = checkDocumentPath(path);
      if (invalid) return { ok: false, error: invalid };

      const existing = docs.get(path);
      const currentVersion = existing?.version ?? 0;
      if (options?.expectedVersion !== undefined && options.expectedVersion !== currentVersion) {
        return {
          ok: false,
          error: new RemoteStoreError(
            'conflict',
            `Version mismatch on ${path}: expected ${options.expectedVersion}, found ${currentVersion}`
          )
        };
      }

      const doc: StoredDoc = {
        data: applyPatch(existing?.data ?? null, patch),
        version: currentVersion + 1,
        serverTimestamp: nextServerTimestamp()
      };
      docs.set(path, doc);
      accepted.push({ path, patch, version: doc.version, serverTimestamp: doc.serverTimestamp });
      notify(path, doc);

      return { ok: true, version: doc.version, serverTimestamp: doc.serverTimestamp };
    },

    subscribe(path: string, handlers: SubscriptionHandlers, query?: CollectionQuery): Unsubscribe {
      const sub: Subscriber = {
        path,
        collection: false,
        query,
        handlers,
        matched: new Set(),
        active: true
      };

      try {
        sub.collection = isCollection(parsePath(path));
      } catch (e) {
        fail(sub, e instanceof RemoteStoreError ? e : new RemoteStoreError('invalid-argument', String(e)));
        return () => {};
      }

      if (!online) {
        fail(sub, new RemoteStoreError('unavailable', 'offline'));
        return () => {};
      }

      subscribers.add(sub);
      queueMicrotask(() => {
        if (!sub.active) return;
        if (sub.collection) {
          sub.handlers.onChanges(collectionSnapshot(sub));
        } else {
          const doc = docs.get(path);
          sub.handlers.onChanges(doc ? [toChange(path, doc)] : []);
        }
      });

      return () => {
        sub.active = false;
        subscribers.delete(sub);
      };
    },

    setOnline(value: boolean) {
      if (value === online) return;
      online = value;
      if (!online) {
        for (const sub of [...subscribers]) {
          fail(sub, new RemoteStoreError('unavailable', 'connection lost'));
        }
      }
    },

    isOnline: () => online,

    failNextWrites(count: number, code: RemoteErrorCode = 'unavailable') {
      for (let i = 0; i < count; i++) pendingFailures.push(code);
    },

    get(path: string): RemoteDocument | null {
      const doc = docs.get(path);
      return doc ? toDocument(path, doc) : null;
    },

    writes: () => accepted
  };
}

function checkDocumentPath(path: string): RemoteStoreError | null {
  try {
    return isCollection(parsePath(path))
      ? new RemoteStoreError('invalid-argument', `Not a document path: ${path}`)
      : null;
  } catch (e) {
    if (e instanceof RemoteStoreError) return e;
    throw e;
  }
}

/** Messages order by `timestamp`, then id; everything else by id. */
function compareChanges(a: RemoteChange, b: RemoteChange): number {
  const ta = a.data?.timestamp;
  const tb = b.data?.timestamp;
  if (typeof ta === 'number' && typeof tb === 'number' && ta !== tb) return ta - tb;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

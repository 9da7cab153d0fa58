/**
 * @fileoverview Supabase Remote Store
 *
 * {@link RemoteStore} over Postgres tables (PostgREST) and Realtime
 * `postgres_changes` channels. The DDL lives in `supabase/schema.sql`.
 *
 * Layout:
 *
 * | Path                                 | Table           | Key                        |
 * |--------------------------------------|-----------------|----------------------------|
 * | `users/{id}`                         | `users`         | `id`                       |
 * | `conversations/{id}`                 | `conversations` | `id`                       |
 * | `conversations/{c}/messages/{id}`    | `messages`      | `id` (+ `conversation_id`) |
 * | `conversations/{c}/typing/{userId}`  | `typing`        | `conversation_id, user_id` |
 *
 * Columns are the snake_case form of the document's top-level fields; maps are
 * `jsonb`. Every table carries `version` and a trigger-maintained
 * `server_updated_at`.
 *
 * Writes are merges implemented as read-modify-write: the current row is read,
 * the patch applied in memory, and the row written back guarded by the version
 * that was read. A write that loses the race to another writer is re-run from
 * the read (unless the caller pinned `expectedVersion`, which turns the lost
 * race into a `conflict`).
 *
 * Subscriptions open one channel per path. Changes that arrive before the
 * initial fetch has completed are buffered and delivered after it.
 */

import type {
  RealtimeChannel,
  RealtimePostgresChangesPayload,
  SupabaseClient
} from '@supabase/supabase-js';
import { RemoteStoreError, toRemoteStoreError } from '../errors';
import { debugError, debugLog, debugWarn } from '../debug';
import { camelToSnake, isRecord, snakeToCamel } from '../utils';
import { applyPatch } from './patch';
import { parsePath, type ParsedPath } from './paths';
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

type Row = Record<string, unknown>;

/** Unguarded writes re-run the read-modify-write this many times before giving up. */
const MAX_WRITE_RACES = 5;

/** Columns the server owns; never part of document data. */
const SYSTEM_COLUMNS = new Set(['version', 'server_updated_at']);

// =============================================================================
// Path -> Table Mapping
// =============================================================================

interface DocumentTarget {
  table: string;
  /** Column values identifying the row. */
  keys: Row;
  /** Id as seen by callers (last path segment). */
  id: string;
}

interface CollectionTarget {
  table: string;
  /** Equality constraint on the whole collection, if any. */
  scope: { column: string; value: string } | null;
  orderBy: string | null;
  /** Column that identifies a document inside the collection. */
  idColumn: string;
  /** Builds the document path of a row. */
  pathOf(id: string): string;
}

function documentTarget(parsed: ParsedPath): DocumentTarget | null {
  switch (parsed.kind) {
    case 'user':
      return { table: 'users', keys: { id: parsed.userId }, id: parsed.userId };
    case 'conversation':
      return { table: 'conversations', keys: { id: parsed.conversationId }, id: parsed.conversationId };
    case 'message':
      return {
        table: 'messages',
        keys: { id: parsed.messageId, conversation_id: parsed.conversationId },
        id: parsed.messageId
      };
    case 'typing':
      return {
        table: 'typing',
        keys: { conversation_id: parsed.conversationId, user_id: parsed.userId },
        id: parsed.userId
      };
    default:
      return null;
  }
}

function collectionTarget(parsed: ParsedPath): CollectionTarget | null {
  switch (parsed.kind) {
    case 'users':
      return { table: 'users', scope: null, orderBy: null, idColumn: 'id', pathOf: (id) => `users/${id}` };
    case 'conversations':
      return {
        table: 'conversations',
        scope: null,
        orderBy: null,
        idColumn: 'id',
        pathOf: (id) => `conversations/${id}`
      };
    case 'messages': {
      const { conversationId } = parsed;
      return {
        table: 'messages',
        scope: { column: 'conversation_id', value: conversationId },
        orderBy: 'timestamp',
        idColumn: 'id',
        pathOf: (id) => `conversations/${conversationId}/messages/${id}`
      };
    }
    case 'typingCollection': {
      const { conversationId } = parsed;
      return {
        table: 'typing',
        scope: { column: 'conversation_id', value: conversationId },
        orderBy: null,
        idColumn: 'user_id',
        pathOf: (id) => `conversations/${conversationId}/typing/${id}`
      };
    }
    default:
      return null;
  }
}

// =============================================================================
// Row <-> Document
// =============================================================================

export function rowToData(row: Row): DocumentData {
  const data: DocumentData = {};
  for (const [column, value] of Object.entries(row)) {
    if (SYSTEM_COLUMNS.has(column)) continue;
    data[snakeToCamel(column)] = value;
  }
  return data;
}

export function dataToRow(data: DocumentData): Row {
  const row: Row = {};
  for (const [field, value] of Object.entries(data)) {
    row[camelToSnake(field)] = value;
  }
  return row;
}

function rowVersion(row: Row): number {
  return typeof row.version === 'number' ? row.version : 0;
}

function rowTimestamp(row: Row): number {
  const raw = row.server_updated_at;
  const ts = typeof raw === 'string' ? Date.parse(raw) : NaN;
  return Number.isNaN(ts) ? 0 : ts;
}

function rowId(row: Row, idColumn: string): string | null {
  const id = row[idColumn];
  return typeof id === 'string' ? id : null;
}

function matchesQuery(row: Row, query?: CollectionQuery): boolean {
  if (!query?.arrayContains) return true;
  const value = row[camelToSnake(query.arrayContains.field)];
  return Array.isArray(value) && value.includes(query.arrayContains.value);
}

/** PostgREST error (+ HTTP status) -> {@link RemoteStoreError}. */
function postgrestError(error: { message: string; code?: string }, status?: number): RemoteStoreError {
  return toRemoteStoreError(Object.assign(new Error(error.message), { code: error.code, status }));
}

function rowsOf(data: unknown): Row[] {
  return Array.isArray(data) ? data.filter(isRecord) : [];
}

// =============================================================================
// Store
// =============================================================================

export interface SupabaseRemoteStoreOptions {
  /** Postgres schema holding the tables. Default `'public'`. */
  schema?: string;
  /** Prefix for Realtime channel names. Default `'murmur'`. */
  channelPrefix?: string;
}

export function createSupabaseRemoteStore(
  client: SupabaseClient,
  options: SupabaseRemoteStoreOptions = {}
): RemoteStore {
  const schema = options.schema ?? 'public';
  const channelPrefix = options.channelPrefix ?? 'murmur';
  let channelSeq = 0;

  function resolveDocument(path: string): DocumentTarget | RemoteStoreError {
    try {
      return (
        documentTarget(parsePath(path)) ??
        new RemoteStoreError('invalid-argument', `Not a document path: ${path}`)
      );
    } catch (e) {
      return toRemoteStoreError(e);
    }
  }

  async function fetchRow(target: DocumentTarget): Promise<{ row: Row | null } | { error: RemoteStoreError }> {
    const { data, error, status } = await client.from(target.table).select('*').match(target.keys).maybeSingle();
    if (error) return { error: postgrestError(error, status) };
    return { row: isRecord(data) ? data : null };
  }

  function toDocument(path: string, target: DocumentTarget, row: Row): RemoteDocument {
    return {
      path,
      id: target.id,
      data: rowToData(row),
      version: rowVersion(row),
      serverTimestamp: rowTimestamp(row)
    };
  }

  async function read(path: string): Promise<ReadResult> {
    const target = resolveDocument(path);
    if (target instanceof RemoteStoreError) return { ok: false, error: target };
    try {
      const fetched = await fetchRow(target);
      if ('error' in fetched) return { ok: false, error: fetched.error };
      return { ok: true, doc: fetched.row ? toDocument(path, target, fetched.row) : null };
    } catch (e) {
      return { ok: false, error: toRemoteStoreError(e) };
    }
  }

  /**
   * One read-modify-write round.
   *
   * @returns The written row, `'raced'` when another writer got there first,
   *   or an error.
   */
  async function writeOnce(
    target: DocumentTarget,
    patch: DocumentData,
    expectedVersion: number | undefined
  ): Promise<Row | 'raced' | RemoteStoreError> {
    const fetched = await fetchRow(target);
    if ('error' in fetched) return fetched.error;
    const current = fetched.row;
    const currentVersion = current ? rowVersion(current) : 0;

    if (expectedVersion !== undefined && expectedVersion !== currentVersion) {
      return new RemoteStoreError(
        'conflict',
        `Version mismatch: expected ${expectedVersion}, found ${currentVersion}`
      );
    }

    const merged = applyPatch(current ? rowToData(current) : null, patch);
    const row: Row = { ...dataToRow(merged), ...target.keys, version: currentVersion + 1 };

    if (!current) {
      const { data, error, status } = await client.from(target.table).insert(row).select('*').maybeSingle();
      /* 23505 = unique_violation: someone inserted first */
      if (error?.code === '23505') return 'raced';
      if (error) return postgrestError(error, status);
      return isRecord(data) ? data : 'raced';
    }

    const { data, error, status } = await client
      .from(target.table)
      .update(row)
      .match({ ...target.keys, version: currentVersion })
      .select('*')
      .maybeSingle();
    if (error) return postgrestError(error, status);
    return isRecord(data) ? data : 'raced';
  }

  async function write(path: string, patch: DocumentData, options?: WriteOptions): Promise<WriteResult> {
    const target = resolveDocument(path);
    if (target instanceof RemoteStoreError) return { ok: false, error: target };

    try {
      for (let round = 0; round < MAX_WRITE_RACES; round++) {
        const outcome = await writeOnce(target, patch, options?.expectedVersion);
        if (outcome instanceof RemoteStoreError) return { ok: false, error: outcome };
        if (outcome !== 'raced') {
          return { ok: true, version: rowVersion(outcome), serverTimestamp: rowTimestamp(outcome) };
        }
        if (options?.expectedVersion !== undefined) {
          return { ok: false, error: new RemoteStoreError('conflict', `Concurrent write on ${path}`) };
        }
        debugLog(`[Supabase] Lost write race on ${path}; retrying`);
      }
      return { ok: false, error: new RemoteStoreError('conflict', `Write on ${path} kept losing races`) };
    } catch (e) {
      return { ok: false, error: toRemoteStoreError(e) };
    }
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  function subscribe(path: string, handlers: SubscriptionHandlers, query?: CollectionQuery): Unsubscribe {
    let parsed: ParsedPath;
    try {
      parsed = parsePath(path);
    } catch (e) {
      const error = toRemoteStoreError(e);
      queueMicrotask(() => handlers.onError(error));
      return () => {};
    }

    const doc = documentTarget(parsed);
    const collection = collectionTarget(parsed);
    const table = doc?.table ?? collection?.table;
    if (!table) {
      queueMicrotask(() => handlers.onError(new RemoteStoreError('invalid-argument', `Unknown path: ${path}`)));
      return () => {};
    }

    let closed = false;
    let ready = false;
    let buffered: RemoteChange[] = [];
    /* Collection members currently inside the query */
    const matched = new Set<string>();

    function changeFor(row: Row, deleted: boolean): RemoteChange | null {
      if (doc) {
        const isTarget = Object.entries(doc.keys).every(([k, v]) => row[k] === undefined || row[k] === v);
        if (!isTarget) return null;
        return {
          path,
          id: doc.id,
          data: deleted ? null : rowToData(row),
          version: rowVersion(row),
          serverTimestamp: rowTimestamp(row),
          isFromCache: false
        };
      }
      if (!collection) return null;
      const id = rowId(row, collection.idColumn);
      if (id === null) return null;
      const scoped = collection.scope ? row[collection.scope.column] : undefined;
      if (collection.scope && scoped !== undefined && scoped !== collection.scope.value) return null;

      const inQuery = !deleted && matchesQuery(row, query);
      if (!inQuery && !matched.has(id)) return null;
      if (inQuery) matched.add(id);
      else matched.delete(id);

      return {
        path: collection.pathOf(id),
        id,
        data: inQuery ? rowToData(row) : null,
        version: rowVersion(row),
        serverTimestamp: rowTimestamp(row),
        isFromCache: false
      };
    }

    function emit(changes: RemoteChange[]) {
      if (closed) return;
      if (!ready) {
        buffered.push(...changes);
        return;
      }
      if (changes.length > 0) handlers.onChanges(changes);
    }

    function fail(error: RemoteStoreError) {
      if (closed) return;
      closed = true;
      teardown().catch((e: unknown) => debugError('[Supabase] Channel teardown failed:', e));
      handlers.onError(error);
    }

    async function initialFetch(): Promise<RemoteChange[]> {
      if (doc) {
        const fetched = await fetchRow(doc);
        if ('error' in fetched) throw fetched.error;
        const change = fetched.row ? changeFor(fetched.row, false) : null;
        return change ? [change] : [];
      }
      if (!collection) return [];

      let request = client.from(collection.table).select('*');
      if (collection.scope) request = request.eq(collection.scope.column, collection.scope.value);
      if (query?.arrayContains) {
        request = request.contains(camelToSnake(query.arrayContains.field), [query.arrayContains.value]);
      }
      const { data, error, status } = collection.orderBy
        ? await request.order(collection.orderBy, { ascending: true }).order('id', { ascending: true })
        : await request;
      if (error) throw postgrestError(error, status);

      const changes: RemoteChange[] = [];
      for (const row of rowsOf(data)) {
        const change = changeFor(row, false);
        if (change) changes.push(change);
      }
      return changes;
    }

    /* Realtime filters take a single equality; the rest is checked in changeFor */
    const filter = doc
      ? doc.table === 'typing'
        ? `user_id=eq.${doc.id}`
        : `id=eq.${doc.id}`
      : collection?.scope
        ? `${collection.scope.column}=eq.${collection.scope.value}`
        : undefined;

    const channel: RealtimeChannel = client.channel(`${channelPrefix}:${path}:${++channelSeq}`);

    async function teardown() {
      try {
        await client.removeChannel(channel);
      } catch (e) {
        debugError(`[Supabase] Failed to remove channel for ${path}:`, e);
      }
    }

    channel.on(
      'postgres_changes',
      { event: '*', schema, table, filter },
      (payload: RealtimePostgresChangesPayload<Row>) => {
        const deleted = payload.eventType === 'DELETE';
        const row: Row = deleted ? { ...payload.old } : { ...payload.new };
        const change = changeFor(row, deleted);
        if (change) emit([change]);
      }
    );

    channel.subscribe((status, err) => {
      if (closed) return;
      switch (status) {
        case 'SUBSCRIBED':
          debugLog(`[Supabase] Channel connected for ${path}`);
          initialFetch().then(
            (initial) => {
              if (closed) return;
              const seen = new Map(initial.map((c) => [c.id, c.version]));
              /* Keep buffered events the snapshot does not already include */
              const later = buffered.filter((c) => c.version > (seen.get(c.id) ?? 0) || c.data === null);
              buffered = [];
              ready = true;
              handlers.onChanges(initial);
              if (later.length > 0) handlers.onChanges(later);
            },
            (e: unknown) => fail(toRemoteStoreError(e))
          );
          break;
        case 'TIMED_OUT':
          debugWarn(`[Supabase] Channel timed out for ${path}`);
          fail(new RemoteStoreError('deadline-exceeded', `Realtime channel timed out: ${path}`));
          break;
        case 'CHANNEL_ERROR':
        case 'CLOSED':
          debugWarn(`[Supabase] Channel ${status} for ${path}`, err);
          fail(new RemoteStoreError('unavailable', err?.message ?? `Realtime channel ${status}: ${path}`));
          break;
      }
    });

    return () => {
      if (closed) return;
      closed = true;
      teardown().catch((e: unknown) => debugError('[Supabase] Channel teardown failed:', e));
    };
  }

  return { read, write, subscribe };
}

/**
 * @fileoverview Local Store (IndexedDB via Dexie)
 *
 * Durable cache of users, conversations and messages, plus the engine's own
 * bookkeeping tables:
 *
 * - `syncQueue`       -- Pending outbound operations (the outbox)
 * - `conflictHistory` -- Field-level merge outcomes, kept for auditing
 * - `meta`            -- Schema version and per-sender message clocks
 *
 * Every write made through a {@link LocalStore} notifies change listeners once
 * it has committed. {@link LocalStore.observe} builds svelte stores on top of
 * that: a query re-runs whenever one of the tables it reads changes.
 *
 * Schema guard:
 *   The `meta` row `schema` records {@link SCHEMA_VERSION}. Opening a database
 *   that carries a different version, or one Dexie cannot upgrade, fails with
 *   {@link StoreCorruptError}. The engine answers by destroying the database
 *   and rehydrating it from the remote store.
 *
 * @see {@link engine.ts#initEngine} for the recovery flow
 * @see {@link queries.ts} for the built-in live queries
 */

import Dexie, { type Table } from 'dexie';
import { readable, type Readable } from 'svelte/store';
import { StoreCorruptError } from './errors';
import { debugError, debugLog } from './debug';
import { deepEqual } from './utils';
import type {
  ConflictHistoryEntry,
  EntityByTable,
  EntityTable,
  MetaRow,
  StoreTable,
  SyncOperationItem
} from './types';

// =============================================================================
// Schema
// =============================================================================

/** Bumped whenever a stored record shape changes incompatibly. */
export const SCHEMA_VERSION = 1;

/** Dexie version the stores below are declared at. */
const DEXIE_VERSION = 1;

const STORES: Record<StoreTable, string> = {
  users: 'id',
  conversations: 'id, updatedAt, *participantIds',
  messages: 'id, conversationId, [conversationId+timestamp], senderId',
  syncQueue: '++id, entityKey, table, entityId, timestamp',
  conflictHistory: '++id, entityId, entityType, timestamp',
  meta: 'key'
};

export interface LocalStoreOptions {
  /** IndexedDB database name. */
  name: string;
  /** Alternative IndexedDB implementation. */
  indexedDB?: IDBFactory;
  IDBKeyRange?: typeof IDBKeyRange;
}

export class MurmurDatabase extends Dexie {
  users!: Table<EntityByTable['users'], string>;
  conversations!: Table<EntityByTable['conversations'], string>;
  messages!: Table<EntityByTable['messages'], string>;
  syncQueue!: Table<SyncOperationItem, number>;
  conflictHistory!: Table<ConflictHistoryEntry, number>;
  meta!: Table<MetaRow, string>;

  constructor(options: LocalStoreOptions) {
    /* An explicit undefined would shadow the global IndexedDB */
    super(options.name, {
      ...(options.indexedDB ? { indexedDB: options.indexedDB } : {}),
      ...(options.IDBKeyRange ? { IDBKeyRange: options.IDBKeyRange } : {})
    });
    this.version(DEXIE_VERSION).stores(STORES);
  }
}

// =============================================================================
// Live Queries
// =============================================================================

/**
 * A read that can be observed. `tables` lists every table `run` touches; the
 * query re-runs after any committed change to one of them.
 */
export interface LiveQuery<T> {
  tables: readonly StoreTable[];
  run(db: MurmurDatabase): Promise<T>;
}

type ChangeListener = (tables: ReadonlySet<StoreTable>) => void;

// =============================================================================
// Local Store
// =============================================================================

export interface LocalStore {
  readonly name: string;
  readonly db: MurmurDatabase;

  get<K extends EntityTable>(table: K, id: string): Promise<EntityByTable[K] | undefined>;

  /** Replace the whole record atomically. */
  upsert<K extends EntityTable>(table: K, entity: EntityByTable[K]): Promise<void>;

  /**
   * Read-modify-write one record inside a single `rw` transaction. `fn`
   * returns the new record, or `undefined` to leave it alone. Nothing is
   * written (and nobody is notified) when the result equals the current
   * record.
   *
   * @returns The record as stored afterwards.
   */
  mutate<K extends EntityTable>(
    table: K,
    id: string,
    fn: (current: EntityByTable[K] | undefined) => EntityByTable[K] | undefined
  ): Promise<EntityByTable[K] | undefined>;

  /**
   * Run `fn` in one `rw` transaction over `tables` and notify observers of
   * those tables after commit. `fn` must only await Dexie operations.
   */
  transaction<T>(tables: readonly StoreTable[], fn: () => Promise<T>): Promise<T>;

  /** Announce a committed change made outside {@link transaction}. */
  notify(tables: readonly StoreTable[]): void;

  onChange(listener: ChangeListener): () => void;

  /**
   * Svelte store over a live query. Emits `undefined` until the first run
   * completes, then every result in order. Subscribing again starts a fresh
   * run; the stream ends when the store is closed.
   */
  observe<T>(query: LiveQuery<T>): Readable<T | undefined>;

  close(): void;
  isClosed(): boolean;
  /** Close and delete the underlying database. */
  destroy(): Promise<void>;
}

/**
 * Open the local database and verify its schema.
 *
 * @throws {StoreCorruptError} On a schema version mismatch or a Dexie
 *   `VersionError`/`UpgradeError`.
 */
export async function createLocalStore(options: LocalStoreOptions): Promise<LocalStore> {
  const db = new MurmurDatabase(options);

  try {
    /* Open eagerly so upgrade errors surface here, not on first access. */
    await db.open();
  } catch (e) {
    db.close();
    if (isSchemaError(e)) throw new StoreCorruptError(SCHEMA_VERSION, null, { cause: e });
    throw e;
  }

  const schemaRow = await db.meta.get('schema');
  if (!schemaRow) {
    await db.meta.put({ key: 'schema', value: SCHEMA_VERSION });
  } else if (schemaRow.value !== SCHEMA_VERSION) {
    db.close();
    throw new StoreCorruptError(
      SCHEMA_VERSION,
      typeof schemaRow.value === 'number' ? schemaRow.value : null
    );
  }

  debugLog(`[DB] Opened ${options.name} (schema v${SCHEMA_VERSION})`);
  return wrapDatabase(db);
}

/**
 * Delete a database by name without opening it (used when opening failed).
 */
export async function deleteLocalStore(options: LocalStoreOptions): Promise<void> {
  await new MurmurDatabase(options).delete();
}

function isSchemaError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'VersionError' || e.name === 'UpgradeError');
}

function wrapDatabase(db: MurmurDatabase): LocalStore {
  const listeners = new Set<ChangeListener>();
  const observerEnds = new Set<() => void>();
  let closed = false;

  const entityTables: { [K in EntityTable]: Table<EntityByTable[K], string> } = {
    users: db.users,
    conversations: db.conversations,
    messages: db.messages
  };

  function notify(tables: readonly StoreTable[]) {
    if (closed || tables.length === 0) return;
    const changed: ReadonlySet<StoreTable> = new Set(tables);
    /* Listeners start their own reads; keep them out of the caller's transaction */
    Dexie.ignoreTransaction(() => {
      for (const listener of [...listeners]) {
        try {
          listener(changed);
        } catch (e) {
          debugError('[DB] Change listener error:', e);
        }
      }
    });
  }

  async function transaction<T>(tables: readonly StoreTable[], fn: () => Promise<T>): Promise<T> {
    const result = await db.transaction('rw', [...tables], fn);
    notify(tables);
    return result;
  }

  function observe<T>(query: LiveQuery<T>): Readable<T | undefined> {
    return readable<T | undefined>(undefined, (set) => {
      if (closed) return;

      let issued = 0;
      let emitted = 0;
      let ended = false;

      const rerun = () => {
        const run = ++issued;
        query.run(db).then(
          (value) => {
            /* Drop results overtaken by a newer run */
            if (ended || run <= emitted) return;
            emitted = run;
            set(value);
          },
          (e: unknown) => {
            if (!ended) debugError('[DB] Live query failed:', e);
          }
        );
      };

      const off = onChange((changed) => {
        if (query.tables.some((t) => changed.has(t))) rerun();
      });
      const end = () => {
        ended = true;
        off();
        observerEnds.delete(end);
      };
      observerEnds.add(end);
      rerun();
      return end;
    });
  }

  function onChange(listener: ChangeListener): () => void {
    listeners.add(listener);
    return () => listeners.delete(listener);
  }

  function close() {
    if (closed) return;
    for (const end of [...observerEnds]) end();
    closed = true;
    listeners.clear();
    db.close();
  }

  return {
    name: db.name,
    db,

    get(table, id) {
      return entityTables[table].get(id);
    },

    async upsert(table, entity) {
      await entityTables[table].put(entity);
      notify([table]);
    },

    async mutate(table, id, fn) {
      let changed = false;
      const result = await db.transaction('rw', entityTables[table], async () => {
        const current = await entityTables[table].get(id);
        const next = fn(current);
        if (next === undefined || deepEqual(current, next)) return current;
        await entityTables[table].put(next);
        changed = true;
        return next;
      });
      if (changed) notify([table]);
      return result;
    },

    transaction,
    notify,
    onChange,
    observe,
    close,
    isClosed: () => closed,

    async destroy() {
      close();
      await db.delete();
      debugLog(`[DB] Deleted ${db.name}`);
    }
  };
}

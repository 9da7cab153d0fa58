/**
 * @fileoverview Error Taxonomy
 *
 * Every failure the sync core can observe falls into one of four buckets:
 *
 * - **transient**  -- network unavailable, timeouts, 5xx, rate limits. Retried
 *   with backoff; surfaced only once the retry budget is exhausted.
 * - **permanent**  -- unauthenticated, permission denied, validation failure.
 *   Surfaced immediately, never retried.
 * - **conflict**   -- optimistic-concurrency mismatch. The caller re-reads the
 *   document and reapplies its change; no user-visible error.
 * - **StoreCorrupt** -- the local schema does not match. Triggers a destructive
 *   local rebuild from the remote store (see {@link ./database.ts}).
 *
 * The UI never receives these objects: it observes message status and the sync
 * status store instead.
 */

// =============================================================================
// Remote Store Errors
// =============================================================================

/** Classified failure codes returned by a {@link RemoteStore}. */
export type RemoteErrorCode =
  | 'unauthenticated'
  | 'permission-denied'
  | 'invalid-argument'
  | 'not-found'
  | 'unavailable'
  | 'deadline-exceeded'
  | 'conflict';

export type ErrorClass = 'transient' | 'permanent' | 'conflict';

export class RemoteStoreError extends Error {
  readonly code: RemoteErrorCode;

  constructor(code: RemoteErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = 'RemoteStoreError';
    this.code = code;
  }
}

/**
 * Map a remote error code onto the retry taxonomy.
 */
export function classifyRemoteError(error: RemoteStoreError): ErrorClass {
  switch (error.code) {
    case 'unavailable':
    case 'deadline-exceeded':
      return 'transient';
    case 'conflict':
      return 'conflict';
    case 'unauthenticated':
    case 'permission-denied':
    case 'invalid-argument':
    case 'not-found':
      return 'permanent';
  }
}

/**
 * Normalize an arbitrary throwable into a {@link RemoteStoreError}.
 *
 * Anything that already is one passes through. Otherwise the message and any
 * `status`/`code` properties are inspected: network, timeout, rate-limit and
 * 5xx failures are `unavailable`/`deadline-exceeded` (transient); auth failures
 * map to their codes; everything else is `invalid-argument` (permanent), since
 * an unknown failure will not fix itself by retrying.
 */
export function toRemoteStoreError(error: unknown): RemoteStoreError {
  if (error instanceof RemoteStoreError) return error;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  const status = readNumericProperty(error, 'status');
  const code = readStringProperty(error, 'code');

  // Timeouts first: "timed out" would otherwise match the network check below
  if (msg.includes('timeout') || msg.includes('timed out') || code === '57014') {
    return new RemoteStoreError('deadline-exceeded', msg, { cause: error });
  }

  // Network/connectivity issues
  if (
    msg.includes('fetch') ||
    msg.includes('network') ||
    msg.includes('connection') ||
    msg.includes('offline') ||
    msg.includes('unavailable') ||
    msg.includes('temporarily')
  ) {
    return new RemoteStoreError('unavailable', msg, { cause: error });
  }

  // Rate limiting and server errors - transient
  if (status === 429 || code === '429' || msg.includes('too many')) {
    return new RemoteStoreError('unavailable', msg, { cause: error });
  }
  if (status !== null && status >= 500 && status < 600) {
    return new RemoteStoreError('unavailable', msg, { cause: error });
  }

  if (status === 401 || code === 'PGRST301' || msg.includes('jwt')) {
    return new RemoteStoreError('unauthenticated', msg, { cause: error });
  }
  // 42501 = insufficient_privilege (RLS rejection)
  if (status === 403 || code === '42501' || msg.includes('permission denied')) {
    return new RemoteStoreError('permission-denied', msg, { cause: error });
  }

  return new RemoteStoreError('invalid-argument', msg, { cause: error });
}

function readNumericProperty(value: unknown, key: string): number | null {
  if (typeof value !== 'object' || value === null || !(key in value)) return null;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'number' ? prop : null;
}

function readStringProperty(value: unknown, key: string): string | null {
  if (typeof value !== 'object' || value === null || !(key in value)) return null;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : null;
}

// =============================================================================
// Local Errors
// =============================================================================

/** Rejected user intent (bad participants, unsupported emoji, ...). Permanent. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The local database does not match the expected schema. Callers recover by
 * deleting the database and rehydrating from the remote store.
 */
export class StoreCorruptError extends Error {
  readonly expectedVersion: number;
  readonly foundVersion: number | null;

  constructor(expectedVersion: number, foundVersion: number | null, options?: { cause?: unknown }) {
    super(
      `Local store schema mismatch: expected v${expectedVersion}, found ${
        foundVersion === null ? 'an unreadable schema' : `v${foundVersion}`
      }`,
      options
    );
    this.name = 'StoreCorruptError';
    this.expectedVersion = expectedVersion;
    this.foundVersion = foundVersion;
  }
}

/** Media upload failed; distinct from message-send errors. */
export class UploadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
  }
}

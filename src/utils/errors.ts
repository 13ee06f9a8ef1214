/**
 * Error taxonomy for a sync run. Uniqueness conflicts are never surfaced:
 * they are detected with isUniqueViolation and recovered inside the store.
 */

export type RecordKind = 'track' | 'playlist' | 'album' | 'artist';

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A remote record is missing fields the store needs. The item is skipped. */
export class MalformedRecordError extends SyncError {
  constructor(
    readonly kind: RecordKind,
    readonly ref: string,
    readonly issues: string[]
  ) {
    super(`Malformed ${kind} record ${ref}: ${issues.join('; ')}`);
  }
}

/** A read or write against the remote catalog failed or timed out. */
export class CatalogRequestError extends SyncError {
  constructor(
    readonly operation: string,
    message: string,
    readonly options: { status?: number; transient: boolean; retryAfterMs?: number; cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, { cause: options.cause });
  }

  get status(): number | undefined {
    return this.options.status;
  }

  get transient(): boolean {
    return this.options.transient;
  }

  get retryAfterMs(): number | undefined {
    return this.options.retryAfterMs;
  }
}

/** A storage error other than a uniqueness conflict. The unit was rolled back. */
export class PersistenceError extends SyncError {
  constructor(readonly unit: string, cause: unknown) {
    super(`Persistence failure in ${unit}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class SyncCancelledError extends SyncError {
  constructor() {
    super('Sync run was cancelled');
  }
}

export class SyncInProgressError extends SyncError {
  constructor(readonly runId: string) {
    super(`A sync run is already in progress (${runId})`);
  }
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

// PostgreSQL reports SQLSTATE 23505; better-sqlite3 reports the extended
// SQLite result code.
export function isUniqueViolation(error: unknown): boolean {
  const code = errorCode(error);
  if (code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return true;
  }
  return (
    error instanceof Error &&
    (code === 'SQLITE_CONSTRAINT' || code === undefined) &&
    error.message.includes('UNIQUE constraint failed')
  );
}

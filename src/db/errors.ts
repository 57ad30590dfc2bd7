/**
 * bpfledger — Store error taxonomy
 *
 * Repositories translate better-sqlite3 errors into these classes. The
 * engine error is kept as `cause`. Codec errors raised while decoding a row
 * are already typed and pass through unchanged.
 */

import { UintCodecError } from '../codec/uint-blob.js';

export type StoreTable = 'bpf_programs' | 'bpf_links' | 'bpf_maps' | 'bpf_program_maps';

export class StoreError extends Error {
  readonly table: StoreTable;

  constructor(message: string, table: StoreTable, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
    this.table = table;
  }
}

/** No row with the requested key. */
export class NotFoundError extends StoreError {
  readonly key: string;

  constructor(table: StoreTable, key: string) {
    super(`${table}: no row with key ${key}`, table);
    this.name = 'NotFoundError';
    this.key = key;
  }
}

/** Duplicate primary key. */
export class ConflictError extends StoreError {
  readonly key: string;

  constructor(table: StoreTable, key: string, cause: unknown) {
    super(`${table}: a row with key ${key} already exists`, table, { cause });
    this.name = 'ConflictError';
    this.key = key;
  }
}

/** The row references a program or map that does not exist. */
export class ForeignKeyViolationError extends StoreError {
  readonly key: string;

  constructor(table: StoreTable, key: string, cause: unknown) {
    super(`${table}: row ${key} references a missing parent row`, table, { cause });
    this.name = 'ForeignKeyViolationError';
    this.key = key;
  }
}

/** Any other engine failure: CHECK / NOT NULL constraints, I/O, busy. */
export class StorageFailureError extends StoreError {
  readonly code?: string;

  constructor(table: StoreTable, message: string, cause: unknown, code?: string) {
    super(`${table}: ${message}`, table, { cause });
    this.name = 'StorageFailureError';
    this.code = code;
  }
}

// ============================================================
// Translation
// ============================================================

function isSqliteError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Map an error thrown by better-sqlite3 to the store taxonomy.
 *
 * StoreError and codec errors are returned as they are.
 */
export function translateSqliteError(err: unknown, table: StoreTable, key: string): Error {
  if (err instanceof StoreError || err instanceof UintCodecError) {
    return err;
  }
  if (isSqliteError(err)) {
    switch (err.code) {
      case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      case 'SQLITE_CONSTRAINT_UNIQUE':
        return new ConflictError(table, key, err);
      case 'SQLITE_CONSTRAINT_FOREIGNKEY':
        return new ForeignKeyViolationError(table, key, err);
      default:
        return new StorageFailureError(table, err.message, err, err.code);
    }
  }
  if (err instanceof Error) {
    return new StorageFailureError(table, err.message, err);
  }
  return new StorageFailureError(table, String(err), err);
}

/** Run `fn` and rethrow anything it throws through translateSqliteError(). */
export function withStoreErrors<T>(table: StoreTable, key: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw translateSqliteError(err, table, key);
  }
}

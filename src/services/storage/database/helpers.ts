/**
 * Helper functions for RepositoryStore
 *
 * Path resolution and translation of SQLite failures into StoreError.
 */

import { join } from 'path';
import { DATABASE_FILE_NAME } from '../migrations/index.js';
import { StoreError, StoreErrorCode } from './types.js';

/**
 * SQLite result codes meaning the file is not a usable database
 */
const CORRUPTION_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT']);

/**
 * Get the store file path under a repository root
 */
export function getDatabasePath(root: string): string {
  return join(root, DATABASE_FILE_NAME);
}

/**
 * Extended result code of a better-sqlite3 error (e.g. `SQLITE_NOTADB`)
 */
export function getSqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isCorruptionError(error: unknown): boolean {
  const code = getSqliteCode(error);
  return code !== undefined && CORRUPTION_CODES.has(code);
}

/**
 * True when `error` is a UNIQUE violation on `table.column`
 */
export function isUniqueViolation(error: unknown, table: string, column: string): boolean {
  return (
    error instanceof Error &&
    error.message.includes(`UNIQUE constraint failed: ${table}.${column}`)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a query failure as STORE_IO_ERROR. StoreErrors pass through unchanged.
 * @param context - what was being done, e.g. "reading collections"
 */
export function toStoreError(error: unknown, context: string): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  return new StoreError(
    `Failed ${context}: ${errorMessage(error)}`,
    StoreErrorCode.STORE_IO_ERROR,
    error
  );
}

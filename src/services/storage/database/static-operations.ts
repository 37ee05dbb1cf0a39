/**
 * Static operations for RepositoryStore - store lifecycle: create, open, connect.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, statSync, unlinkSync, writeFileSync, chmodSync } from 'fs';
import { dirname } from 'path';
import {
  bootstrapSchema,
  configurePragmas,
  verifySchema,
  MigrationError,
  type SchemaVerification,
} from '../migrations/index.js';
import { StoreError, StoreErrorCode } from './types.js';
import { errorMessage, isCorruptionError } from './helpers.js';

export interface StoreConnection {
  db: Database.Database;
  path: string;
}

function removeHalfCreated(dbPath: string, stage: string): void {
  try {
    unlinkSync(dbPath);
  } catch (cleanupErr) {
    console.error(
      `[RepositoryStore] Failed to clean up store file after ${stage} error:`,
      errorMessage(cleanupErr)
    );
  }
}

/**
 * Map a failure to read an existing store onto a store error code.
 * A file SQLite rejects as a database counts as corrupted.
 */
function readFailure(error: unknown, dbPath: string): StoreError {
  if (isCorruptionError(error)) {
    return new StoreError(
      `Store at ${dbPath} is not a valid database: ${errorMessage(error)}`,
      StoreErrorCode.STORE_CORRUPTED,
      error
    );
  }
  return new StoreError(
    `Failed to read store at ${dbPath}: ${errorMessage(error)}`,
    StoreErrorCode.STORE_IO_ERROR,
    error
  );
}

function applyPragmas(db: Database.Database): void {
  try {
    configurePragmas(db);
  } catch (error) {
    db.close();
    throw error;
  }
}

/**
 * Create and bootstrap a new store file
 * @throws StoreError(STORE_IO_ERROR) if the file cannot be created
 * @throws MigrationError if bootstrap or the self-check fails
 */
export function createDatabase(dbPath: string): StoreConnection {
  try {
    mkdirSync(dirname(dbPath), { recursive: true });
    writeFileSync(dbPath, '', { mode: 0o600 });
    chmodSync(dbPath, 0o600);
  } catch (error) {
    throw new StoreError(
      `Failed to create store file at ${dbPath}: ${errorMessage(error)}`,
      StoreErrorCode.STORE_IO_ERROR,
      error
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeHalfCreated(dbPath, 'open');
    throw new StoreError(
      `Failed to open new store at ${dbPath}: ${errorMessage(error)}`,
      StoreErrorCode.STORE_IO_ERROR,
      error
    );
  }

  try {
    bootstrapSchema(db);
    const verification = verifySchema(db);
    if (!verification.valid) {
      throw new MigrationError(
        `Bootstrapped store failed verification: ${verification.reason}`,
        'verify',
        verification.phase
      );
    }
  } catch (error) {
    db.close();
    removeHalfCreated(dbPath, 'bootstrap');
    throw error;
  }

  applyPragmas(db);
  console.error(`[RepositoryStore] Created store at ${dbPath}`);
  return { db, path: dbPath };
}

/**
 * Open an existing store and validate its structure
 * @throws StoreError(STORE_CORRUPTED) on any structural mismatch
 * @throws StoreError(STORE_IO_ERROR) if the file cannot be opened
 */
export function openDatabase(dbPath: string): StoreConnection {
  let isRegularFile: boolean;
  try {
    isRegularFile = statSync(dbPath).isFile();
  } catch (error) {
    throw readFailure(error, dbPath);
  }
  if (!isRegularFile) {
    throw new StoreError(
      `Store path ${dbPath} is not a regular file`,
      StoreErrorCode.STORE_IO_ERROR
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath, { fileMustExist: true });
  } catch (error) {
    throw readFailure(error, dbPath);
  }

  let verification: SchemaVerification;
  try {
    verification = verifySchema(db);
  } catch (error) {
    db.close();
    throw readFailure(error, dbPath);
  }
  if (!verification.valid) {
    db.close();
    throw new StoreError(verification.reason, StoreErrorCode.STORE_CORRUPTED);
  }

  applyPragmas(db);
  return { db, path: dbPath };
}

/**
 * Create the store if absent, otherwise open and validate it
 */
export function connectDatabase(dbPath: string): StoreConnection {
  if (!existsSync(dbPath)) {
    return createDatabase(dbPath);
  }
  return openDatabase(dbPath);
}

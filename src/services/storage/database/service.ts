/**
 * RepositoryStore class for all store operations
 *
 * Owns one better-sqlite3 connection to a validated store and exposes the
 * collection and item queries over it. Calls are synchronous; one instance
 * is used by one process.
 */

import type Database from 'better-sqlite3';
import type { Collection } from '../../../models/collection.js';
import type { ItemRecord } from '../../../models/item.js';
import type { ImportFileResult } from './types.js';
import { connectDatabase } from './static-operations.js';
import * as collectionOps from './collection-operations.js';

/**
 * RepositoryStore class for all store operations
 */
export class RepositoryStore {
  private readonly db: Database.Database;
  private readonly path: string;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Create the store at `path` if absent, otherwise open and validate it
   * @throws StoreError(STORE_CORRUPTED) if an existing store fails validation
   * @throws StoreError(STORE_IO_ERROR) if the file cannot be created or opened
   */
  static connect(path: string): RepositoryStore {
    const result = connectDatabase(path);
    return new RepositoryStore(result.db, result.path);
  }

  close(): void {
    this.db.close();
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== COLLECTION OPERATIONS ====================

  getCollections(): Collection[] {
    return collectionOps.getCollections(this.db);
  }

  getItems(): ItemRecord[] {
    return collectionOps.getItems(this.db);
  }

  importFile(input: unknown): ImportFileResult {
    return collectionOps.importFile(this.db, input);
  }
}

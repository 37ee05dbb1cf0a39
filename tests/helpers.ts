/**
 * Shared Test Helpers
 *
 * Temp directories, raw database handles and sample data used across the
 * unit and integration suites.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { bootstrapSchema } from '../src/services/storage/migrations/index.js';

/** Every temp directory created by tests starts with this, see global-teardown */
export const TEMP_DIR_PREFIX = 'vorg-test-';

/**
 * Create a unique test directory
 */
export function createTestDir(prefix: string): string {
  const testDir = path.join(
    os.tmpdir(),
    `${TEMP_DIR_PREFIX}${prefix}-${String(Date.now())}-${String(process.pid)}-${Math.random().toString(36).slice(2)}`
  );
  fs.mkdirSync(testDir, { recursive: true });
  return testDir;
}

/**
 * Clean up test directory
 */
export function cleanupTestDir(testDir: string): void {
  try {
    fs.rmSync(testDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Unique database path inside a test directory
 */
export function uniqueDbPath(testDir: string): string {
  return path.join(testDir, `test-${String(Date.now())}-${Math.random().toString(36).slice(2)}.db`);
}

/**
 * Fresh database with the bootstrap script applied, not yet closed
 */
export function createBootstrappedDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  bootstrapSchema(db);
  return db;
}

/**
 * Close database safely
 */
export function closeDb(db: Database.Database | undefined): void {
  if (db) {
    try {
      db.close();
    } catch {
      // Ignore close errors
    }
  }
}

/**
 * Run SQL against a store file through a separate connection
 */
export function mutateDb(dbPath: string, sql: string): void {
  const db = new Database(dbPath);
  try {
    db.exec(sql);
  } finally {
    db.close();
  }
}

export const HASH_MP4 = 'a1'.repeat(32);
export const HASH_AVI = 'b2'.repeat(32);
export const HASH_WMV = 'c3'.repeat(32);

/**
 * Two collections: "abc" holding an mp4 and an avi item, "def" holding a
 * wmv item. Collection ids are 1 and 2, item ids 1 to 3.
 */
export function insertSampleData(db: Database.Database): void {
  db.exec(`
    INSERT INTO collections (collection_id, title) VALUES (1, 'abc'), (2, 'def');
    INSERT INTO items (collection_id, item_id, hash, ext) VALUES
      (1, 1, '${HASH_MP4}', 'mp4'),
      (1, 2, '${HASH_AVI}', 'avi'),
      (2, 3, '${HASH_WMV}', 'wmv');
  `);
}

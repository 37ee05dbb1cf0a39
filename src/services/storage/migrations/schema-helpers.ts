/**
 * Schema Helper Functions
 *
 * Pragma configuration and the one-shot bootstrap of a fresh store.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  TABLE_DEFINITIONS,
  CREATE_TITLE_FTS_TABLE,
  CREATE_TITLE_FTS_TRIGGERS,
  CREATE_INDEXES,
  FTS_TABLE_PREFIX,
} from './schema-definitions.js';

/**
 * Configure per-connection pragmas
 * @param db - Database instance
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create all tables in dependency order
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(
        `Failed to create table: ${table.name}`,
        'create_table',
        table.name,
        error
      );
    }
  }
}

/**
 * Create the title FTS5 table and the triggers feeding it
 */
export function createFTSTables(db: Database.Database): void {
  try {
    db.exec(CREATE_TITLE_FTS_TABLE);
    for (const trigger of CREATE_TITLE_FTS_TRIGGERS) {
      db.exec(trigger);
    }
  } catch (error) {
    throw new MigrationError('Failed to create FTS5 table', 'create_table', FTS_TABLE_PREFIX, error);
  }
}

export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = indexSql.match(/CREATE UNIQUE INDEX (\w+)/);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(
        `Failed to create index: ${indexName}`,
        'create_index',
        indexName,
        error
      );
    }
  }
}

/**
 * Run the complete bootstrap script in a single transaction.
 * Nothing is left behind when any step fails.
 * @param db - Database instance opened on an empty file
 */
export function bootstrapSchema(db: Database.Database): void {
  const bootstrap = db.transaction(() => {
    createTables(db);
    createFTSTables(db);
    createIndexes(db);
  });
  bootstrap();
}

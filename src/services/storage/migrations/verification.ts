/**
 * Schema Verification Functions
 *
 * Verifies that a persisted store matches the expected manifest exactly:
 * extra objects are treated the same as missing ones.
 *
 * Phases run in a fixed order (tables, columns, fts, indexes, triggers) and
 * verification stops at the first mismatch. Table shape is confirmed before
 * indexes and triggers because their definitions reference table columns.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import {
  EXPECTED_TABLES,
  EXPECTED_COLUMNS,
  EXPECTED_INDEXES,
  EXPECTED_TRIGGERS,
  EXPECTED_FTS_TABLE_COUNT,
  FTS_TABLE_PREFIX,
  type ExpectedColumn,
} from './schema-definitions.js';
import type { SchemaVerification } from './types.js';

/**
 * Outcome of comparing two name-sorted lists position by position
 */
type ListComparison<T> =
  | { kind: 'identical' }
  | { kind: 'missing'; expected: T }
  | { kind: 'unexpected'; actual: T }
  | { kind: 'mismatch'; expected: T; actual: T };

/**
 * Compare `actual` against `expected` positionally.
 * Both lists must already be sorted the same way.
 */
function compareLists<T>(
  actual: readonly T[],
  expected: readonly T[],
  equals: (a: T, b: T) => boolean
): ListComparison<T> {
  for (let i = 0; i < expected.length; i++) {
    if (i >= actual.length) {
      return { kind: 'missing', expected: expected[i] };
    }
    if (!equals(actual[i], expected[i])) {
      return { kind: 'mismatch', expected: expected[i], actual: actual[i] };
    }
  }
  if (actual.length > expected.length) {
    return { kind: 'unexpected', actual: actual[expected.length] };
  }
  return { kind: 'identical' };
}

function describeNameMismatch(kind: string, comparison: ListComparison<string>): string | null {
  switch (comparison.kind) {
    case 'identical':
      return null;
    case 'missing':
      return `${kind} "${comparison.expected}" is missing from the database.`;
    case 'unexpected':
      return `Unexpected ${kind.toLowerCase()} "${comparison.actual}" exists in the database.`;
    case 'mismatch':
      return `Expected ${kind.toLowerCase()} "${comparison.expected}" but found "${comparison.actual}".`;
  }
}

function describeColumnMismatch(
  table: string,
  comparison: ListComparison<ExpectedColumn>
): string | null {
  switch (comparison.kind) {
    case 'identical':
      return null;
    case 'missing':
      return `Column "${comparison.expected.name}" is missing from table "${table}".`;
    case 'unexpected':
      return `Unexpected column "${comparison.actual.name}" in table "${table}".`;
    case 'mismatch':
      if (comparison.actual.name !== comparison.expected.name) {
        return `Expected column "${comparison.expected.name}" in table "${table}" but found "${comparison.actual.name}".`;
      }
      return `Column "${comparison.expected.name}" in table "${table}" should have type "${comparison.expected.type}" but has "${comparison.actual.type}".`;
  }
}

function listNames(db: Database.Database, sql: string, ...params: unknown[]): string[] {
  return db
    .prepare<unknown[], { name: string }>(sql)
    .all(...params)
    .map((row) => row.name);
}

/** Names SQLite reserves for its own objects */
const SQLITE_INTERNAL_PREFIX = 'sqlite_';

/**
 * Base tables, excluding the FTS table family and SQLite internal tables.
 * Prefixes are matched with substr() since LIKE treats `_` as a wildcard
 * and ignores case.
 */
export function getBaseTableNames(db: Database.Database): string[] {
  return listNames(
    db,
    `SELECT tbl_name AS name FROM sqlite_master
     WHERE type = 'table'
       AND substr(tbl_name, 1, ?) <> ?
       AND substr(tbl_name, 1, ?) <> ?
     ORDER BY tbl_name`,
    FTS_TABLE_PREFIX.length,
    FTS_TABLE_PREFIX,
    SQLITE_INTERNAL_PREFIX.length,
    SQLITE_INTERNAL_PREFIX
  );
}

/**
 * (name, declared type) pairs of a table, sorted by column name
 */
export function getTableColumns(db: Database.Database, table: string): ExpectedColumn[] {
  return db
    .prepare<[string], ExpectedColumn>('SELECT name, type FROM pragma_table_info(?) ORDER BY name')
    .all(table);
}

export function countFtsTables(db: Database.Database): number {
  const row = db
    .prepare<[number, string], { fts_count: number }>(
      `SELECT count(tbl_name) AS fts_count FROM sqlite_master
       WHERE type = 'table' AND substr(tbl_name, 1, ?) = ?`
    )
    .get(FTS_TABLE_PREFIX.length, FTS_TABLE_PREFIX);
  return row?.fts_count ?? 0;
}

export function getIndexNames(db: Database.Database): string[] {
  return listNames(
    db,
    `SELECT name FROM sqlite_master
     WHERE type = 'index' AND substr(name, 1, ?) <> ?
     ORDER BY name`,
    SQLITE_INTERNAL_PREFIX.length,
    SQLITE_INTERNAL_PREFIX
  );
}

export function getTriggerNames(db: Database.Database): string[] {
  return listNames(db, `SELECT name FROM sqlite_master WHERE type = 'trigger' ORDER BY name`);
}

/**
 * Verify the store structure against the expected manifest
 * @param db - Database instance
 * @returns `{ valid: true }` or the phase and reason of the first mismatch
 */
export function verifySchema(db: Database.Database): SchemaVerification {
  const sameName = (a: string, b: string): boolean => a === b;

  // Phase 1: base tables
  const tableReason = describeNameMismatch(
    'Table',
    compareLists(getBaseTableNames(db), EXPECTED_TABLES, sameName)
  );
  if (tableReason) {
    return { valid: false, phase: 'tables', reason: tableReason };
  }

  // Phase 2: columns of every expected table
  for (const table of EXPECTED_TABLES) {
    const columnReason = describeColumnMismatch(
      table,
      compareLists(
        getTableColumns(db, table),
        EXPECTED_COLUMNS[table],
        (a, b) => a.name === b.name && a.type === b.type
      )
    );
    if (columnReason) {
      return { valid: false, phase: 'columns', reason: columnReason };
    }
  }

  // Phase 3: FTS shadow tables
  const ftsCount = countFtsTables(db);
  if (ftsCount !== EXPECTED_FTS_TABLE_COUNT) {
    return {
      valid: false,
      phase: 'fts',
      reason: `Expected ${EXPECTED_FTS_TABLE_COUNT} full-text tables but found ${ftsCount}.`,
    };
  }

  // Phase 4: indexes
  const indexReason = describeNameMismatch(
    'Index',
    compareLists(getIndexNames(db), EXPECTED_INDEXES, sameName)
  );
  if (indexReason) {
    return { valid: false, phase: 'indexes', reason: indexReason };
  }

  // Phase 5: triggers
  const triggerReason = describeNameMismatch(
    'Trigger',
    compareLists(getTriggerNames(db), EXPECTED_TRIGGERS, sameName)
  );
  if (triggerReason) {
    return { valid: false, phase: 'triggers', reason: triggerReason };
  }

  return { valid: true };
}

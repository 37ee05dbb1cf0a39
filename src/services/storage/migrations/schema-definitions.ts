/**
 * SQL Schema Definitions for the vorg repository store
 *
 * Contains the bootstrap SQL and the manifest the verifier compares a
 * persisted store against. The declared column types are part of the
 * on-disk format: existing stores are validated against these exact strings.
 *
 * @module migrations/schema-definitions
 */

/** Database file name under a repository root */
export const DATABASE_FILE_NAME = 'vorg.db';

/**
 * Per-connection pragmas. SQLite does not persist these (except
 * journal_mode), so they are applied on every open.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_TAGS_TABLE = `
CREATE TABLE tags (
  tag_id INTEGER PRIMARY KEY NOT NULL,
  name TEXT NOT NULL
)`;

export const CREATE_COLLECTIONS_TABLE = `
CREATE TABLE collections (
  collection_id INTEGER PRIMARY KEY NOT NULL,
  title TEXT NOT NULL
)`;

export const CREATE_ITEMS_TABLE = `
CREATE TABLE items (
  collection_id INTEGER NOT NULL,
  item_id INTEGER PRIMARY KEY NOT NULL,
  hash VARCHAR(64) NOT NULL,
  ext TEXT NOT NULL,
  FOREIGN KEY (collection_id) REFERENCES collections(collection_id)
)`;

export const CREATE_COLLECTION_TAG_TABLE = `
CREATE TABLE collection_tag (
  collection_id INTEGER NOT NULL,
  tag_id INTEGER NOT NULL,
  PRIMARY KEY (collection_id, tag_id),
  FOREIGN KEY (collection_id) REFERENCES collections(collection_id),
  FOREIGN KEY (tag_id) REFERENCES tags(tag_id)
)`;

/**
 * Base tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'tags', sql: CREATE_TAGS_TABLE },
  { name: 'collections', sql: CREATE_COLLECTIONS_TABLE },
  { name: 'items', sql: CREATE_ITEMS_TABLE },
  { name: 'collection_tag', sql: CREATE_COLLECTION_TAG_TABLE },
] as const;

/**
 * External-content FTS5 index over collection titles.
 * Spawns four shadow tables: title_fts_config, _data, _docsize, _idx.
 */
export const CREATE_TITLE_FTS_TABLE = `
CREATE VIRTUAL TABLE title_fts USING fts5(
  title,
  content='collections',
  content_rowid='collection_id'
)`;

/**
 * Triggers keeping title_fts in sync with collections
 */
export const CREATE_TITLE_FTS_TRIGGERS = [
  `CREATE TRIGGER title_insert AFTER INSERT ON collections BEGIN
    INSERT INTO title_fts(rowid, title) VALUES (new.collection_id, new.title);
  END`,
  `CREATE TRIGGER title_delete AFTER DELETE ON collections BEGIN
    INSERT INTO title_fts(title_fts, rowid, title)
      VALUES ('delete', old.collection_id, old.title);
  END`,
  `CREATE TRIGGER title_update AFTER UPDATE ON collections BEGIN
    INSERT INTO title_fts(title_fts, rowid, title)
      VALUES ('delete', old.collection_id, old.title);
    INSERT INTO title_fts(rowid, title) VALUES (new.collection_id, new.title);
  END`,
] as const;

export const CREATE_INDEXES = [
  'CREATE UNIQUE INDEX hash_index ON items (hash)',
  'CREATE UNIQUE INDEX tag_index ON tags (name)',
] as const;

// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION MANIFEST
// ═══════════════════════════════════════════════════════════════════════════════

/** Name prefix shared by the FTS table and its shadow tables */
export const FTS_TABLE_PREFIX = 'title_fts';

/** title_fts itself plus its four shadow tables */
export const EXPECTED_FTS_TABLE_COUNT = 5;

/**
 * Base tables, sorted by name
 */
export const EXPECTED_TABLES = ['collection_tag', 'collections', 'items', 'tags'] as const;

export type ExpectedTable = (typeof EXPECTED_TABLES)[number];

export interface ExpectedColumn {
  name: string;
  /** Declared type, compared verbatim */
  type: string;
}

/**
 * Columns per table, sorted by column name
 */
export const EXPECTED_COLUMNS: Record<ExpectedTable, readonly ExpectedColumn[]> = {
  collection_tag: [
    { name: 'collection_id', type: 'INTEGER' },
    { name: 'tag_id', type: 'INTEGER' },
  ],
  collections: [
    { name: 'collection_id', type: 'INTEGER' },
    { name: 'title', type: 'TEXT' },
  ],
  items: [
    { name: 'collection_id', type: 'INTEGER' },
    { name: 'ext', type: 'TEXT' },
    { name: 'hash', type: 'VARCHAR(64)' },
    { name: 'item_id', type: 'INTEGER' },
  ],
  tags: [
    { name: 'name', type: 'TEXT' },
    { name: 'tag_id', type: 'INTEGER' },
  ],
};

/**
 * Non-system indexes, sorted by name
 */
export const EXPECTED_INDEXES = ['hash_index', 'tag_index'] as const;

/**
 * Triggers, sorted by name
 */
export const EXPECTED_TRIGGERS = ['title_delete', 'title_insert', 'title_update'] as const;

/**
 * Collection Operations for RepositoryStore
 *
 * Reads collections with their items, lists items joined with their
 * collection, and imports a file as a new collection.
 *
 * @module database/collection-operations
 */

import type Database from 'better-sqlite3';
import type { Collection } from '../../../models/collection.js';
import type { Item, ItemRecord } from '../../../models/item.js';
import { validateInput, ImportFileInput } from '../../../utils/validation.js';
import { isUniqueViolation, toStoreError } from './helpers.js';
import {
  StoreError,
  StoreErrorCode,
  type CollectionRow,
  type ImportFileResult,
  type ItemRecordRow,
  type ItemRow,
} from './types.js';

/** Tag attached to every freshly imported collection */
export const INCOMPLETE_TAG = 'meta:Incomplete';

/** Separator used when aggregating tag names in SQL (ASCII unit separator) */
const TAG_SEPARATOR = '\u001f';

function rowToItem(row: ItemRow): Item {
  return { hash: row.hash, ext: row.ext };
}

function splitTags(tags: string | null): string[] {
  if (tags === null || tags === '') {
    return [];
  }
  return tags.split(TAG_SEPARATOR).sort();
}

// ═══════════════════════════════════════════════════════════════════════════════
// READS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * All collections ordered by id, each with its items ordered by item id.
 * Runs in one read transaction so the result is a consistent snapshot.
 * @throws StoreError(STORE_IO_ERROR) on any query failure
 */
export function getCollections(db: Database.Database): Collection[] {
  const read = db.transaction((): Collection[] => {
    const collections = db
      .prepare<[], CollectionRow>('SELECT collection_id, title FROM collections ORDER BY collection_id')
      .all();
    const itemsStmt = db.prepare<[number], ItemRow>(
      'SELECT item_id, hash, ext FROM items WHERE collection_id = ? ORDER BY item_id'
    );

    return collections.map((row) => ({
      id: row.collection_id,
      title: row.title,
      items: itemsStmt.all(row.collection_id).map(rowToItem),
    }));
  });

  try {
    return read();
  } catch (error) {
    throw toStoreError(error, 'reading collections');
  }
}

/**
 * Every item with its collection title and tag names, ordered by hash
 * @throws StoreError(STORE_IO_ERROR) on any query failure
 */
export function getItems(db: Database.Database): ItemRecord[] {
  try {
    const rows = db
      .prepare<[string], ItemRecordRow>(
        `SELECT i.hash, i.ext, c.title, c.collection_id,
                (SELECT group_concat(t.name, ?)
                   FROM collection_tag ct JOIN tags t ON t.tag_id = ct.tag_id
                  WHERE ct.collection_id = c.collection_id) AS tags
           FROM items i
           JOIN collections c ON c.collection_id = i.collection_id
          ORDER BY i.hash`
      )
      .all(TAG_SEPARATOR);

    return rows.map((row) => ({
      hash: row.hash,
      ext: row.ext,
      title: row.title,
      collectionId: row.collection_id,
      tags: splitTags(row.tags),
    }));
  } catch (error) {
    throw toStoreError(error, 'reading items');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// WRITES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Import one file as a new collection holding a single item, tagged
 * `meta:Incomplete`. All rows are written in one transaction.
 *
 * @throws ValidationError if the input is malformed
 * @throws StoreError(DUPLICATE_ITEM) if an item with the same hash exists
 * @throws StoreError(STORE_IO_ERROR) on any other failure
 */
export function importFile(db: Database.Database, input: unknown): ImportFileResult {
  const file = validateInput(ImportFileInput, input);

  const write = db.transaction((): ImportFileResult => {
    const collection = db
      .prepare<[string]>('INSERT INTO collections (title) VALUES (?)')
      .run(file.title);
    const collectionId = Number(collection.lastInsertRowid);

    const item = db
      .prepare<[number, string, string]>(
        'INSERT INTO items (collection_id, hash, ext) VALUES (?, ?, ?)'
      )
      .run(collectionId, file.hash, file.ext);

    db.prepare<[string]>('INSERT OR IGNORE INTO tags (name) VALUES (?)').run(INCOMPLETE_TAG);
    db.prepare<[number, string]>(
      `INSERT INTO collection_tag (collection_id, tag_id)
       SELECT ?, tag_id FROM tags WHERE name = ?`
    ).run(collectionId, INCOMPLETE_TAG);

    return { collectionId, itemId: Number(item.lastInsertRowid) };
  });

  try {
    return write();
  } catch (error) {
    if (isUniqueViolation(error, 'items', 'hash')) {
      throw new StoreError(
        'The item to import already exists in the database.',
        StoreErrorCode.DUPLICATE_ITEM,
        error
      );
    }
    throw toStoreError(error, 'importing file');
  }
}

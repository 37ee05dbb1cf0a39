/**
 * Collection Operations Tests
 *
 * Tests for getCollections, getItems and importFile against a real store.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  RepositoryStore,
  StoreError,
  StoreErrorCode,
  INCOMPLETE_TAG,
} from '../../../src/services/storage/index.js';
import { ValidationError } from '../../../src/utils/validation.js';
import {
  HASH_AVI,
  HASH_MP4,
  HASH_WMV,
  cleanupTestDir,
  createTestDir,
  insertSampleData,
  uniqueDbPath,
} from '../../helpers.js';

function storeErrorOf(fn: () => unknown): StoreError {
  try {
    fn();
  } catch (error) {
    if (error instanceof StoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a StoreError');
}

describe('RepositoryStore - Collections', () => {
  let testDir: string;
  let store: RepositoryStore | undefined;

  beforeAll(() => {
    testDir = createTestDir('db-collections');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    store = RepositoryStore.connect(uniqueDbPath(testDir));
  });

  afterEach(() => {
    store?.close();
    store = undefined;
  });

  function openStore(): RepositoryStore {
    if (!store) {
      throw new Error('store not initialized');
    }
    return store;
  }

  describe('getCollections()', () => {
    it('returns an empty list for an empty store', () => {
      expect(openStore().getCollections()).toEqual([]);
    });

    it('returns collections by id with their items by item id', () => {
      const s = openStore();
      insertSampleData(s.getConnection());

      expect(s.getCollections()).toEqual([
        {
          id: 1,
          title: 'abc',
          items: [
            { hash: HASH_MP4, ext: 'mp4' },
            { hash: HASH_AVI, ext: 'avi' },
          ],
        },
        { id: 2, title: 'def', items: [{ hash: HASH_WMV, ext: 'wmv' }] },
      ]);
    });

    it('includes collections without items', () => {
      const s = openStore();
      s.getConnection().exec("INSERT INTO collections (collection_id, title) VALUES (5, 'empty')");
      expect(s.getCollections()).toEqual([{ id: 5, title: 'empty', items: [] }]);
    });

    it('maps query failures to STORE_IO_ERROR and leaves no transaction open', () => {
      const s = openStore();
      const conn = s.getConnection();
      conn.pragma('foreign_keys = OFF');
      conn.exec('DROP TABLE items');

      const error = storeErrorOf(() => s.getCollections());
      expect(error.code).toBe(StoreErrorCode.STORE_IO_ERROR);
      expect(error.message).toBe('Failed reading collections: no such table: items');
      expect(conn.inTransaction).toBe(false);
    });
  });

  describe('importFile()', () => {
    it('creates a collection holding one item', () => {
      const s = openStore();
      const result = s.importFile({ title: 'holiday', hash: HASH_MP4, ext: 'mp4' });

      expect(result).toEqual({ collectionId: 1, itemId: 1 });
      expect(s.getCollections()).toEqual([
        { id: 1, title: 'holiday', items: [{ hash: HASH_MP4, ext: 'mp4' }] },
      ]);
    });

    it('tags the new collection as incomplete, creating the tag once', () => {
      const s = openStore();
      s.importFile({ title: 'first', hash: HASH_MP4, ext: 'mp4' });
      s.importFile({ title: 'second', hash: HASH_AVI, ext: 'avi' });

      const conn = s.getConnection();
      const tags = conn.prepare<[], { name: string }>('SELECT name FROM tags').all();
      expect(tags).toEqual([{ name: INCOMPLETE_TAG }]);
      const links = conn
        .prepare<[], { collection_id: number }>(
          'SELECT collection_id FROM collection_tag ORDER BY collection_id'
        )
        .all();
      expect(links).toEqual([{ collection_id: 1 }, { collection_id: 2 }]);
    });

    it('rejects a duplicate hash and writes nothing', () => {
      const s = openStore();
      s.importFile({ title: 'original', hash: HASH_MP4, ext: 'mp4' });

      const error = storeErrorOf(() => s.importFile({ title: 'copy', hash: HASH_MP4, ext: 'mkv' }));
      expect(error.code).toBe(StoreErrorCode.DUPLICATE_ITEM);
      expect(error.message).toBe('The item to import already exists in the database.');
      expect(s.getCollections().map((c) => c.title)).toEqual(['original']);
    });

    it('rejects malformed input with every issue listed', () => {
      const s = openStore();
      expect(() => s.importFile({ title: '', hash: 'XYZ', ext: 'mp4' })).toThrow(
        new ValidationError(
          'title: Title is required; hash: Hash must be 3 to 64 lowercase hexadecimal characters'
        )
      );
      expect(s.getCollections()).toEqual([]);
    });

    it('makes imported titles searchable', () => {
      const s = openStore();
      s.importFile({ title: 'summer trip', hash: HASH_MP4, ext: 'mp4' });
      const rows = s
        .getConnection()
        .prepare<[string], { rowid: number }>('SELECT rowid FROM title_fts WHERE title_fts MATCH ?')
        .all('summer');
      expect(rows).toEqual([{ rowid: 1 }]);
    });
  });

  describe('getItems()', () => {
    it('lists items by hash with title and sorted tags', () => {
      const s = openStore();
      const conn = s.getConnection();
      insertSampleData(conn);
      conn.exec(`
        INSERT INTO tags (tag_id, name) VALUES (1, 'zebra'), (2, 'apple');
        INSERT INTO collection_tag (collection_id, tag_id) VALUES (1, 1), (1, 2);
      `);

      expect(s.getItems()).toEqual([
        { hash: HASH_MP4, ext: 'mp4', title: 'abc', collectionId: 1, tags: ['apple', 'zebra'] },
        { hash: HASH_AVI, ext: 'avi', title: 'abc', collectionId: 1, tags: ['apple', 'zebra'] },
        { hash: HASH_WMV, ext: 'wmv', title: 'def', collectionId: 2, tags: [] },
      ]);
    });

    it('includes the tag attached on import', () => {
      const s = openStore();
      s.importFile({ title: 'new', hash: HASH_WMV, ext: 'wmv' });
      expect(s.getItems()).toEqual([
        { hash: HASH_WMV, ext: 'wmv', title: 'new', collectionId: 1, tags: [INCOMPLETE_TAG] },
      ]);
    });
  });

  describe('transaction()', () => {
    it('rolls back every write when the callback throws', () => {
      const s = openStore();
      expect(() =>
        s.transaction(() => {
          s.importFile({ title: 'rolled back', hash: HASH_MP4, ext: 'mp4' });
          throw new Error('abort');
        })
      ).toThrow('abort');
      expect(s.getCollections()).toEqual([]);
    });
  });
});

/**
 * Item interfaces for the vorg repository
 *
 * An item is one content-addressed file. Its location inside the object
 * store is derived from `(hash, ext)` alone.
 */

import { posix } from 'path';

/**
 * A stored file, as listed under its collection
 */
export interface Item {
  /** Lowercase hex content hash, unique across the store */
  hash: string;
  /** Original file extension, without the dot */
  ext: string;
}

/**
 * An item joined with its owning collection
 */
export interface ItemRecord extends Item {
  collectionId: number;
  title: string;
  /** Tag names attached to the collection, sorted */
  tags: string[];
}

/**
 * Relative path of an item inside the object store: the first two hash
 * characters form the shard directory, the rest names the file.
 *
 * @example storePath({ hash: 'abcdef', ext: 'mp4' }) === 'ab/cdef.mp4'
 */
export function storePath(item: Item): string {
  return posix.join(item.hash.slice(0, 2), `${item.hash.slice(2)}.${item.ext}`);
}

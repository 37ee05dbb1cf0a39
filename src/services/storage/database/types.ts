/**
 * Type definitions for RepositoryStore
 *
 * Contains the error class, its codes and the row shapes read by the store.
 */

/**
 * Error codes for store operations
 */
export enum StoreErrorCode {
  /** Persisted structure does not match the manifest, or the file is not a database */
  STORE_CORRUPTED = 'STORE_CORRUPTED',
  STORE_IO_ERROR = 'STORE_IO_ERROR',
  DUPLICATE_ITEM = 'DUPLICATE_ITEM',
  STORE_FOLDER_INVALID = 'STORE_FOLDER_INVALID',
  THUMBNAIL_FOLDER_INVALID = 'THUMBNAIL_FOLDER_INVALID',
}

/**
 * Custom error class for store operations
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Row type for collections
 */
export interface CollectionRow {
  collection_id: number;
  title: string;
}

/**
 * Row type for items
 */
export interface ItemRow {
  item_id: number;
  hash: string;
  ext: string;
}

/**
 * Row type for the item listing join. `tags` is a comma-free
 * group_concat using the unit separator, null when the collection has no tags.
 */
export interface ItemRecordRow {
  hash: string;
  ext: string;
  title: string;
  collection_id: number;
  tags: string | null;
}

/**
 * Input accepted by importFile
 */
export interface ImportFileInput {
  title: string;
  hash: string;
  ext: string;
}

/**
 * Identifiers assigned by importFile
 */
export interface ImportFileResult {
  collectionId: number;
  itemId: number;
}

/**
 * Repository - the on-disk root of a vorg repository
 *
 * Layout under the root:
 *   vorg.db     the repository store
 *   store/      imported files, sharded by hash (see storePath)
 *   thumbnail/  generated previews
 *
 * @module repository/repository
 */

import { mkdirSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { storePath, type Item } from '../../models/item.js';
import {
  RepositoryStore,
  StoreError,
  StoreErrorCode,
  getDatabasePath,
} from '../storage/index.js';
import { reconcileStore, scanStoreFolder } from './integrity.js';

export const STORE_FOLDER = 'store';
export const THUMBNAIL_FOLDER = 'thumbnail';

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function makeDirectory(path: string): void {
  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    throw new StoreError(
      `Failed to create directory ${path}: ${error instanceof Error ? error.message : String(error)}`,
      StoreErrorCode.STORE_IO_ERROR,
      error
    );
  }
}

export class Repository {
  private constructor(
    private readonly root: string,
    private readonly store: RepositoryStore
  ) {}

  /**
   * Create the repository at `root` if it has no store yet, otherwise
   * check its folders and open (and so validate) the store.
   *
   * @throws StoreError(STORE_FOLDER_INVALID | THUMBNAIL_FOLDER_INVALID) for an
   *   existing repository whose folders are missing or not directories
   * @throws StoreError(STORE_CORRUPTED | STORE_IO_ERROR) from the store
   */
  static open(root: string): Repository {
    const absoluteRoot = resolve(root);
    makeDirectory(absoluteRoot);

    const storeFolder = join(absoluteRoot, STORE_FOLDER);
    const thumbnailFolder = join(absoluteRoot, THUMBNAIL_FOLDER);
    const dbPath = getDatabasePath(absoluteRoot);

    if (isFile(dbPath)) {
      if (!isDirectory(storeFolder)) {
        throw new StoreError(
          `File store does not exist or is not a directory at ${storeFolder}.`,
          StoreErrorCode.STORE_FOLDER_INVALID
        );
      }
      if (!isDirectory(thumbnailFolder)) {
        throw new StoreError(
          `Thumbnail store does not exist or is not a directory at ${thumbnailFolder}.`,
          StoreErrorCode.THUMBNAIL_FOLDER_INVALID
        );
      }
    } else {
      makeDirectory(storeFolder);
      makeDirectory(thumbnailFolder);
    }

    return new Repository(absoluteRoot, RepositoryStore.connect(dbPath));
  }

  getRoot(): string {
    return this.root;
  }

  getStore(): RepositoryStore {
    return this.store;
  }

  /**
   * Absolute path of an item's file inside the object store
   */
  objectPath(item: Item): string {
    return join(this.root, STORE_FOLDER, ...storePath(item).split('/'));
  }

  /**
   * Compare the object store with the recorded items.
   *
   * @returns one line per problem (see integrity.ts); empty when consistent
   * @throws StoreError(STORE_IO_ERROR) if the store or a file cannot be read
   */
  checkDataIntegrity(): string[] {
    const scan = scanStoreFolder(join(this.root, STORE_FOLDER));
    const report = [
      ...reconcileStore(this.store.getItems(), scan.files),
      ...scan.wrongHashes.map((problem) => `hash: ${problem}`),
    ];
    console.error(`[Repository] Integrity check of ${this.root}: ${report.length} problem(s)`);
    return report;
  }

  close(): void {
    this.store.close();
  }
}

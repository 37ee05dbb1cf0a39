/**
 * Object store integrity check
 *
 * Reconciles the files under store/ with the items recorded in the
 * repository store. Report lines:
 *
 *   store: file not found in store: <hash>
 *   store: redundant file in store: <hash>
 *   ext: different extensions: <db ext> in db but <store ext> in store
 *   hash: Expected <hash from path>, but real hash is <content hash>
 *
 * @module repository/integrity
 */

import { readdirSync, type Dirent } from 'fs';
import { basename, extname, join } from 'path';
import type { Item } from '../../models/item.js';
import { StoreError, StoreErrorCode } from '../storage/index.js';
import { computeFileHashSync } from '../../utils/hash.js';

export interface StoreScan {
  /** Files found, keyed by the hash their path encodes */
  files: Item[];
  /** Files whose content does not hash to the name they are stored under */
  wrongHashes: string[];
}

function ioFailure(action: string, path: string, error: unknown): StoreError {
  return new StoreError(
    `Failed to ${action} ${path}: ${error instanceof Error ? error.message : String(error)}`,
    StoreErrorCode.STORE_IO_ERROR,
    error
  );
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function byHashThenExt(a: Item, b: Item): number {
  if (a.hash !== b.hash) {
    return a.hash < b.hash ? -1 : 1;
  }
  return a.ext < b.ext ? -1 : a.ext > b.ext ? 1 : 0;
}

function scanFolder(dir: string, scan: StoreScan): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw ioFailure('read store folder', dir, error);
  }

  for (const entry of entries.sort(byName)) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      scanFolder(path, scan);
      continue;
    }

    // ab/cdef.mp4 holds the item with hash "abcdef"
    const dotExt = extname(entry.name);
    const expectedHash = basename(dir) + basename(entry.name, dotExt);

    let realHash: string;
    try {
      realHash = computeFileHashSync(path);
    } catch (error) {
      throw ioFailure('hash', path, error);
    }
    if (realHash !== expectedHash) {
      scan.wrongHashes.push(`Expected ${expectedHash}, but real hash is ${realHash}`);
    }
    scan.files.push({ hash: expectedHash, ext: dotExt.slice(1) });
  }
}

/**
 * Walk a store folder, hashing every file
 * @throws StoreError(STORE_IO_ERROR) if a folder or file cannot be read
 */
export function scanStoreFolder(storeFolder: string): StoreScan {
  const scan: StoreScan = { files: [], wrongHashes: [] };
  scanFolder(storeFolder, scan);
  return scan;
}

/**
 * Merge recorded items with found files. Both are walked in hash order;
 * `recorded` must already be sorted by hash.
 */
export function reconcileStore(recorded: readonly Item[], found: readonly Item[]): string[] {
  const files = [...found].sort(byHashThenExt);
  const report: string[] = [];

  let i = 0;
  let j = 0;
  while (i < recorded.length && j < files.length) {
    const item = recorded[i];
    const file = files[j];
    if (item.hash === file.hash) {
      if (item.ext !== file.ext) {
        report.push(`ext: different extensions: ${item.ext} in db but ${file.ext} in store`);
      }
      i++;
      j++;
    } else if (item.hash < file.hash) {
      report.push(`store: file not found in store: ${item.hash}`);
      i++;
    } else {
      report.push(`store: redundant file in store: ${file.hash}`);
      j++;
    }
  }
  for (; i < recorded.length; i++) {
    report.push(`store: file not found in store: ${recorded[i].hash}`);
  }
  for (; j < files.length; j++) {
    report.push(`store: redundant file in store: ${files[j].hash}`);
  }
  return report;
}

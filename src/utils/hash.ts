/**
 * Content hashing for the object store
 *
 * A stored file is named after the SHA-224 digest of its content, as
 * lowercase hex.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';

export const HASH_ALGORITHM = 'sha224';

/**
 * Hash in-memory content
 */
export function computeHash(content: string | Buffer): string {
  return crypto.createHash(HASH_ALGORITHM).update(content).digest('hex');
}

/**
 * Hash a file synchronously in 64KB chunks
 *
 * @throws Error if the file cannot be read
 */
export function computeFileHashSync(filePath: string): string {
  const CHUNK_SIZE = 65536;
  const hash = crypto.createHash(HASH_ALGORITHM);
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.allocUnsafe(CHUNK_SIZE);
    let bytesRead: number;
    while ((bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null)) > 0) {
      hash.update(bytesRead === CHUNK_SIZE ? buffer : buffer.subarray(0, bytesRead));
    }
  } finally {
    fs.closeSync(fd);
  }
  return hash.digest('hex');
}

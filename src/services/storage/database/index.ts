/**
 * Database Module - Public API
 *
 * Re-exports the store class, its errors and row types.
 */

export { MigrationError } from '../migrations/index.js';

export type { ImportFileInput, ImportFileResult } from './types.js';
export { StoreErrorCode, StoreError } from './types.js';

export { RepositoryStore } from './service.js';

export { getDatabasePath } from './helpers.js';
export { INCOMPLETE_TAG } from './collection-operations.js';

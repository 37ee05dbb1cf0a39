/**
 * Storage Service Module
 *
 * Schema bootstrap, structural verification and the repository store.
 */

export { verifySchema, MigrationError, type SchemaVerification } from './migrations/index.js';

export {
  RepositoryStore,
  StoreError,
  StoreErrorCode,
  getDatabasePath,
  INCOMPLETE_TAG,
  type ImportFileInput,
  type ImportFileResult,
} from './database/index.js';

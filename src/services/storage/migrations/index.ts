/**
 * Schema bootstrap and structural verification for the repository store
 *
 * Uses better-sqlite3 with an FTS5 index over collection titles.
 *
 * @module migrations
 */

export { MigrationError } from './types.js';
export type { SchemaVerification, VerificationPhase } from './types.js';

export { configurePragmas, bootstrapSchema } from './schema-helpers.js';

export { verifySchema } from './verification.js';

export { DATABASE_FILE_NAME } from './schema-definitions.js';

/**
 * Type definitions and error classes for schema bootstrap
 *
 * @module migrations/types
 */

/**
 * Error class for schema bootstrap failures
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly objectName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * Verification phases, in execution order
 */
export type VerificationPhase = 'tables' | 'columns' | 'fts' | 'indexes' | 'triggers';

/**
 * Result of verifying a store against the expected manifest.
 * `reason` names the first mismatch found.
 */
export type SchemaVerification =
  | { valid: true }
  | { valid: false; phase: VerificationPhase; reason: string };

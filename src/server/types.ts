/**
 * Server Type Definitions
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration, resolved from the environment at startup
 */
export interface ServerConfig {
  /** Repository root holding vorg.db, store/ and thumbnail/ */
  repositoryPath: string;

  /** Interface to bind (default: localhost) */
  host: string;

  /** TCP port (default: 8000; 0 picks an ephemeral port) */
  port: number;

  /** Per-iteration session deadline in milliseconds (default: 30000) */
  sessionTimeoutMs: number;

  /** Largest accepted request body (default: 1 MiB) */
  maxBodyBytes: number;
}

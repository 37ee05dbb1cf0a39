/**
 * Shared Startup Configuration
 *
 * Resolves the server configuration from VORG_* environment variables and
 * the command line, and reports it before anything binds.
 *
 * CRITICAL: NEVER use console.log() - stderr only.
 *
 * @module server/startup
 */

import { resolve } from 'path';
import { ServerEnv, validateInput } from '../utils/validation.js';
import type { ServerConfig } from './types.js';

/**
 * Build the server configuration.
 *
 * The repository root comes from VORG_REPOSITORY, else the first
 * command-line argument, else the working directory.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  args: readonly string[] = process.argv.slice(2)
): ServerConfig {
  const values = validateInput(ServerEnv, env);

  return {
    repositoryPath: resolve(values.VORG_REPOSITORY ?? args[0] ?? process.cwd()),
    host: values.VORG_HTTP_HOST,
    port: values.VORG_HTTP_PORT,
    sessionTimeoutMs: Math.round(values.VORG_SESSION_TIMEOUT * 1000),
    maxBodyBytes: values.VORG_MAX_BODY_BYTES,
  };
}

/**
 * Log the effective configuration
 */
export function reportStartupConfig(config: ServerConfig): void {
  console.error(`[Startup] Repository: ${config.repositoryPath}`);
  console.error(
    `[Startup] HTTP ${config.host}:${config.port}, session timeout ${config.sessionTimeoutMs}ms, ` +
      `max body ${config.maxBodyBytes} bytes`
  );
}

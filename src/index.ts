/**
 * vorg Server
 *
 * Entry point: loads configuration, opens the repository and serves it
 * over HTTP. One process and one event loop serve every connection, so the
 * store has exactly one connection.
 *
 * CRITICAL: NEVER use console.log() for logging. Use console.error().
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. VORG_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.VORG_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { Repository } from './services/repository/index.js';
import { loadServerConfig, reportStartupConfig } from './server/startup.js';
import { registerRoutes } from './server/register-routes.js';
import { HandlerRegistryBuilder } from './server/router.js';
import { ProtocolEngine } from './server/transports/index.js';
import { EngineError } from './server/errors.js';

// =============================================================================
// STARTUP
// =============================================================================

/**
 * Open (and so validate) the repository. Any failure is fatal: nothing
 * binds to a port with an unusable store.
 */
function openRepositoryOrExit(root: string): Repository {
  try {
    return Repository.open(root);
  } catch (error) {
    const failure = EngineError.fromUnknown(error);
    console.error(`[FATAL] Cannot open repository at ${root}: ${failure.category}: ${failure.message}`);
    process.exit(1);
  }
}

function installShutdown(stop: () => Promise<void>): void {
  let stopping = false;
  const handleShutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
    stop()
      .then(() => {
        console.error('[Shutdown] Server closed successfully');
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error(`[Shutdown] Error closing server: ${String(err)}`);
        process.exit(1);
      });
    // Force exit after 5s if graceful shutdown hangs
    setTimeout(() => {
      console.error('[Shutdown] Forced exit after timeout');
      process.exit(1);
    }, 5000).unref();
  };

  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));
}

async function main(): Promise<void> {
  const config = loadServerConfig();
  reportStartupConfig(config);

  const repository = openRepositoryOrExit(config.repositoryPath);
  const registry = registerRoutes(new HandlerRegistryBuilder(), repository.getStore()).build();
  const engine = new ProtocolEngine(registry, {
    host: config.host,
    port: config.port,
    sessionTimeoutMs: config.sessionTimeoutMs,
    maxBodyBytes: config.maxBodyBytes,
  });

  try {
    await engine.listen();
  } catch (error) {
    repository.close();
    throw error;
  }
  console.error(`[Startup] Routes registered: ${registry.routes().join(', ')}`);

  installShutdown(async () => {
    await engine.stop();
    repository.close();
  });
}

main().catch((error: unknown) => {
  const failure = EngineError.fromUnknown(error, 'CONFIGURATION_ERROR');
  console.error(`[FATAL] Error starting vorg server: ${failure.category}: ${failure.message}`);
  process.exit(1);
});

/**
 * Vitest Global Teardown
 *
 * Cleans up leaked temporary directories from test runs.
 * Test cleanup hooks don't execute when processes are killed,
 * so this ensures temp dirs are cleaned up after all tests complete.
 *
 * @module tests/global-teardown
 */

import { readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { TEMP_DIR_PREFIX } from './helpers.js';

export function teardown(): void {
  const tmp = tmpdir();
  let entries: string[];

  try {
    entries = readdirSync(tmp);
  } catch (error) {
    console.error(
      `[global-teardown] Cannot read ${tmp}: ${error instanceof Error ? error.message : String(error)}`
    );
    return;
  }

  let cleaned = 0;
  for (const entry of entries) {
    if (entry.startsWith(TEMP_DIR_PREFIX)) {
      rmSync(join(tmp, entry), { recursive: true, force: true });
      cleaned++;
    }
  }

  if (cleaned > 0) {
    console.error(`[global-teardown] Cleaned ${cleaned} leaked temp directories`);
  }
}

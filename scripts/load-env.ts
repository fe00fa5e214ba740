/**
 * Environment bootstrap for scripts
 *
 * Reads .env.local, then .env, into process.env without overriding values
 * that are already set (CI secrets, shell exports). The backfill reads its
 * CANDLES_* settings and UPSTOX_ACCESS_TOKEN from here.
 *
 * Runs on import: ESM evaluates imports before top-level code, so this must be
 * the first import of every script (import './load-env';).
 */

import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * @returns the env files that were found and applied, in load order
 */
export function loadEnv(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ENV_FILES) {
    const path = resolve(cwd, file);
    if (!existsSync(path)) continue;
    const result = config({ path, override: false });
    if (result.error) {
      console.warn(`⚠️  Could not read ${file}: ${result.error.message}`);
      continue;
    }
    loaded.push(file);
  }
  return loaded;
}

loadEnv();

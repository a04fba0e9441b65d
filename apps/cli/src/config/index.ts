/**
 * CLI Configuration
 *
 * Reads the same `.env` as the relay. Album commands only need the album
 * root; `send` and `config` need the full relay configuration.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseRelayConfig, type ParsedRelayConfig } from '@capture-relay/core';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const monorepoRoot = resolve(__dirname, '../../../..');

dotenvConfig({ path: resolve(monorepoRoot, '.env') });

/**
 * Album root from `--root`, then ALBUM_ROOT, then ./album
 */
export function resolveAlbumRoot(override?: string): string {
  const root = override ?? process.env['ALBUM_ROOT'] ?? './album';
  if (override !== undefined) {
    return isAbsolute(root) ? root : resolve(process.cwd(), root);
  }
  return isAbsolute(root) ? root : resolve(monorepoRoot, root);
}

/**
 * Full relay configuration; throws ConfigError
 */
export function loadRelayConfig(): ParsedRelayConfig {
  return parseRelayConfig(process.env, { baseDir: monorepoRoot });
}

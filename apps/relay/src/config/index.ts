/**
 * Relay Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError, parseRelayConfig } from '@capture-relay/core';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
export const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

function load() {
  try {
    return parseRelayConfig(process.env, { baseDir: monorepoRoot });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}:`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

const parsed = load();

export const config = parsed.config;

// Reported once the logger exists
export const configWarnings = parsed.warnings;

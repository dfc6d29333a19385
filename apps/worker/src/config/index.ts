/**
 * Worker Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseWorkerEnv, type WorkerConfig } from './env.js';

// Get monorepo root
const moduleDir = dirname(fileURLToPath(import.meta.url));
export const monorepoRoot = resolve(moduleDir, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const parseResult = parseWorkerEnv(process.env, monorepoRoot);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  for (const issue of parseResult.issues) {
    console.error(`  - ${issue}`);
  }
  process.exit(1);
}

export const config: WorkerConfig = parseResult.config;

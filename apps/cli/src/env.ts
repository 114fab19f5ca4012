/**
 * Loads .env from the monorepo root. Imported first so that LOG_LEVEL
 * and NODE_ENV are in place before any logger is created.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../..');

dotenvConfig({ path: resolve(monorepoRoot, '.env') });

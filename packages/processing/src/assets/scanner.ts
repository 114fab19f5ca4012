/**
 * Asset Scanner
 *
 * Builds asset pools from directories on disk. Top-level only;
 * a missing directory is an empty pool, never an error.
 */

import { extname, join } from 'node:path';
import { createLogger, listFiles } from '@ytp-forge/utils';
import {
  MEDIA_EXTENSIONS,
  POOL_MEDIA_KINDS,
  POOL_NAMES,
  type AssetPools,
  type PoolName,
} from './pools.js';

const log = createLogger({ module: 'asset-scanner' });

/**
 * List the files in `dirPath` that belong in `pool`, sorted by path.
 */
export async function scanAssetDirectory(
  dirPath: string | undefined,
  pool: PoolName
): Promise<string[]> {
  if (!dirPath) return [];

  const accepted = new Set(
    POOL_MEDIA_KINDS[pool].flatMap((kind) => MEDIA_EXTENSIONS[kind])
  );
  const files = await listFiles(dirPath);
  return files.filter((file) => accepted.has(extname(file).toLowerCase())).sort();
}

/**
 * Scan every configured pool directory. Unconfigured pools stay empty.
 */
export async function scanAssetPools(
  directories: Partial<Record<PoolName, string>>
): Promise<AssetPools> {
  const pools: AssetPools = {};

  for (const pool of POOL_NAMES) {
    const files = await scanAssetDirectory(directories[pool], pool);
    pools[pool] = files;
    if (directories[pool]) {
      log.debug({ pool, dir: directories[pool], count: files.length }, 'Scanned asset pool');
    }
  }

  return pools;
}

/**
 * Conventional layout: one sub-directory per pool under a root.
 */
export function poolDirectories(root: string): Record<PoolName, string> {
  return {
    images: join(root, 'images'),
    sounds: join(root, 'sounds'),
    adverts: join(root, 'adverts'),
    errors: join(root, 'errors'),
    memes: join(root, 'memes'),
    meme_sounds: join(root, 'meme_sounds'),
    overlay_videos: join(root, 'overlay_videos'),
  };
}

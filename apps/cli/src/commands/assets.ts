/**
 * Assets Command
 *
 * Scans the asset pools under a root directory and shows what each holds.
 */

import { resolve } from 'node:path';
import { ValidationError } from '@ytp-forge/core';
import { POOL_NAMES, poolDirectories, scanAssetPools } from '@ytp-forge/processing';
import { loadCliConfig } from '../config/index.js';
import { printFailure, printHeader, printKeyValue, printWarning } from '../lib/output.js';

export async function assetsCommand(dir: string | undefined): Promise<void> {
  try {
    const config = loadCliConfig();
    const root = dir ? resolve(dir) : config.assetsDir;
    if (!root) {
      throw new ValidationError('assets', 'Pass a directory or set YTP_ASSETS_DIR');
    }

    const pools = await scanAssetPools(poolDirectories(root));

    printHeader('Asset Pools');
    printKeyValue('Root', root);
    console.log();

    let total = 0;
    for (const pool of POOL_NAMES) {
      const count = pools[pool]?.length ?? 0;
      total += count;
      printKeyValue(pool, `${count} file${count === 1 ? '' : 's'}`);
    }

    if (total === 0) {
      console.log();
      printWarning(`No assets found. Expected sub-directories such as ${poolDirectories(root).images}`);
    }
  } catch (error) {
    printFailure(error);
    process.exit(1);
  }
}

/**
 * Asset Pool Selector
 */

import type { RandomSource } from '../random.js';

/**
 * Pick one path uniformly at random.
 * An empty pool returns undefined without consuming a random draw.
 */
export function chooseAsset(
  pool: readonly string[] | undefined,
  random: RandomSource
): string | undefined {
  if (!pool || pool.length === 0) {
    return undefined;
  }
  const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
  return pool[index];
}

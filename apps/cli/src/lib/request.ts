/**
 * Request Assembly
 *
 * Merges environment config, an optional recipe and command-line flags
 * into one generation request. Flags win over the recipe, the recipe
 * wins over the environment.
 */

import { join, resolve } from 'node:path';
import { ValidationError, type AppConfig } from '@ytp-forge/core';
import {
  poolDirectories,
  scanAssetPools,
  type EffectSelections,
  type GenerationRequest,
  type PoolName,
} from '@ytp-forge/processing';
import { getBasename, isNonEmptyString, sanitizeFilename } from '@ytp-forge/utils';
import { z } from 'zod';
import { loadRecipe, type Recipe } from '../config/index.js';
import { parseEffectSpecs } from './selection.js';

export interface RenderOptions {
  effect?: string[];
  recipe?: string;
  overlay?: string;
  assets?: string;
  seed?: string;
  ffmpeg?: string;
  duration?: string;
  output?: string;
  verbose?: boolean;
  open?: boolean;
}

export interface ResolvedRun {
  request: GenerationRequest;
  seed?: number;
  ffmpegPath?: string;
  previewDurationSeconds: number;
  outputPath: string;
}

const seedSchema = z.coerce.number().int();
const durationSchema = z.coerce.number().positive().max(600);

function parseOption<T>(schema: z.ZodType<T>, field: string, value: string | undefined): T | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(field, parsed.error.issues[0]?.message ?? `invalid value "${value}"`);
  }
  return parsed.data;
}

/**
 * Default output: <outputDir>/<source name>_ytp_<unix seconds>.mp4
 */
export function defaultOutputPath(outputDir: string, source: string, now: number = Date.now()): string {
  const name = sanitizeFilename(getBasename(source)) || 'output';
  return join(outputDir, `${name}_ytp_${Math.floor(now / 1000)}.mp4`);
}

function poolDirectoriesFor(
  root: string | undefined,
  overrides: Partial<Record<PoolName, string>>
): Partial<Record<PoolName, string>> {
  const base: Partial<Record<PoolName, string>> = root ? poolDirectories(root) : {};
  return { ...base, ...overrides };
}

export async function resolveRun(
  source: string | undefined,
  options: RenderOptions,
  config: AppConfig
): Promise<ResolvedRun> {
  const recipe: Recipe = options.recipe
    ? await loadRecipe(options.recipe)
    : { assets: {}, effects: {} };

  const sourcePath = isNonEmptyString(source) ? resolve(source) : recipe.source;
  if (!sourcePath) {
    throw new ValidationError('source', 'A source video is required, as an argument or in the recipe');
  }

  const effects: EffectSelections = {
    ...recipe.effects,
    ...parseEffectSpecs(options.effect ?? []),
  };

  const assetsRoot = options.assets ? resolve(options.assets) : recipe.assetsDir ?? config.assetsDir;
  const assets = await scanAssetPools(poolDirectoriesFor(assetsRoot, recipe.assets));

  return {
    request: {
      source: sourcePath,
      overlay: options.overlay ? resolve(options.overlay) : recipe.overlay,
      effects,
      assets,
    },
    seed: parseOption(seedSchema, 'seed', options.seed) ?? recipe.seed,
    ffmpegPath: options.ffmpeg ?? config.ffmpegPath,
    previewDurationSeconds:
      parseOption(durationSchema, 'duration', options.duration)
      ?? recipe.previewDuration
      ?? config.previewDurationSeconds,
    outputPath: options.output
      ? resolve(options.output)
      : defaultOutputPath(config.outputDir, sourcePath),
  };
}

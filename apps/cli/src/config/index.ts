/**
 * CLI Configuration
 *
 * Environment settings plus optional JSON recipe files.
 */

import { dirname, isAbsolute, resolve } from 'node:path';
import { loadConfig, ValidationError, type AppConfig } from '@ytp-forge/core';
import {
  isEffectKey,
  isPoolName,
  type EffectSelections,
  type PoolName,
} from '@ytp-forge/processing';
import { safeReadFile } from '@ytp-forge/utils';
import { z } from 'zod';

export function loadCliConfig(): AppConfig {
  return loadConfig(process.env, process.cwd());
}

// Recipe file schema
const selectionSchema = z.object({
  enabled: z.boolean().default(true),
  probability: z.number().min(0).max(1).optional(),
  intensity: z.number().optional(),
}).strict();

const recipeSchema = z.object({
  source: z.string().min(1).optional(),
  overlay: z.string().min(1).optional(),
  previewDuration: z.number().positive().max(600).optional(),
  seed: z.number().int().optional(),
  assetsDir: z.string().min(1).optional(),
  assets: z.record(z.string(), z.string().min(1)).default({}),
  effects: z.record(z.string(), selectionSchema).default({}),
}).strict().superRefine((recipe, ctx) => {
  for (const pool of Object.keys(recipe.assets)) {
    if (!isPoolName(pool)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['assets', pool],
        message: `Unknown asset pool "${pool}"`,
      });
    }
  }
  for (const key of Object.keys(recipe.effects)) {
    if (!isEffectKey(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['effects', key],
        message: `Unknown effect "${key}"`,
      });
    }
  }
});

export interface Recipe {
  source?: string;
  overlay?: string;
  previewDuration?: number;
  seed?: number;
  assetsDir?: string;
  assets: Partial<Record<PoolName, string>>;
  effects: EffectSelections;
}

function resolveFrom(baseDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(baseDir, p);
}

/**
 * Validate a parsed recipe. Relative paths are taken relative to `baseDir`.
 */
export function parseRecipe(raw: unknown, baseDir: string): Recipe {
  const parsed = recipeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ['recipe', ...(issue?.path ?? [])].join('.');
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const data = parsed.data;
  const assets: Partial<Record<PoolName, string>> = {};
  for (const [pool, dir] of Object.entries(data.assets)) {
    if (isPoolName(pool)) assets[pool] = resolveFrom(baseDir, dir);
  }
  const effects: EffectSelections = {};
  for (const [key, selection] of Object.entries(data.effects)) {
    if (isEffectKey(key)) effects[key] = selection;
  }

  return {
    source: data.source && resolveFrom(baseDir, data.source),
    overlay: data.overlay && resolveFrom(baseDir, data.overlay),
    previewDuration: data.previewDuration,
    seed: data.seed,
    assetsDir: data.assetsDir && resolveFrom(baseDir, data.assetsDir),
    assets,
    effects,
  };
}

export async function loadRecipe(filePath: string): Promise<Recipe> {
  let content: string | null;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('recipe', `cannot read ${filePath}: ${reason}`);
  }
  if (content === null) {
    throw new ValidationError('recipe', `${filePath} does not exist`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('recipe', `${filePath} is not valid JSON: ${reason}`);
  }

  return parseRecipe(raw, dirname(resolve(filePath)));
}

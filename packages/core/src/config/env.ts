/**
 * Environment Configuration
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),

  // Output and assets (relative to the working directory)
  YTP_OUTPUT_DIR: z.string().min(1).default('./outputs'),
  YTP_ASSETS_DIR: z.string().min(1).optional(),

  // Preview length in seconds
  YTP_PREVIEW_DURATION: z.coerce.number().int().min(1).max(600).default(10),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: EnvConfig['LOG_LEVEL'];
  ffmpegPath: string | undefined;
  outputDir: string;
  assetsDir: string | undefined;
  previewDurationSeconds: number;
}

function resolvePath(p: string, cwd: string): string {
  return isAbsolute(p) ? p : resolve(cwd, p);
}

/**
 * Validate environment variables into the application config.
 * Throws ValidationError naming the first offending variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'environment';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    ffmpegPath: data.FFMPEG_PATH,
    outputDir: resolvePath(data.YTP_OUTPUT_DIR, cwd),
    assetsDir: data.YTP_ASSETS_DIR ? resolvePath(data.YTP_ASSETS_DIR, cwd) : undefined,
    previewDurationSeconds: data.YTP_PREVIEW_DURATION,
  };
}

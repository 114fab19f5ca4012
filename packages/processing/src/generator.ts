/**
 * Effect Generator
 *
 * Compile -> build command -> run, for previews and full renders.
 * Every call compiles a fresh plan, so random picks and probability
 * gates are re-drawn per run.
 */

import { dirname, join } from 'node:path';
import { resolveFfmpeg, type BinaryConfig } from '@ytp-forge/core';
import { createLogger, createTempDir, ensureDir } from '@ytp-forge/utils';
import { buildArguments, type GenerationMode } from './commandBuilder.js';
import { compileEffects, type GraphComposer } from './compiler.js';
import { defaultRandom, type RandomSource } from './random.js';
import { ProcessRunner, type CommandRunner, type LineSink } from './runner.js';
import type { CompiledPlan, GenerationRequest } from './types.js';

const log = createLogger({ module: 'generator' });

export const PREVIEW_DIR_PREFIX = 'ytp_preview_';
export const PREVIEW_FILE_NAME = 'preview.mp4';

export interface GeneratorOptions {
  ffmpegPath?: string;
  env?: Record<string, string | undefined>;
  random?: RandomSource;
  runner?: CommandRunner;
  composer?: GraphComposer;
}

export class EffectGenerator {
  readonly ffmpeg: BinaryConfig;
  private readonly random: RandomSource;
  private readonly runner: CommandRunner;
  private readonly composer?: GraphComposer;

  constructor(options: GeneratorOptions = {}) {
    this.ffmpeg = resolveFfmpeg({ override: options.ffmpegPath, env: options.env });
    this.random = options.random ?? defaultRandom;
    this.runner = options.runner ?? new ProcessRunner();
    this.composer = options.composer;

    if (!this.ffmpeg.isAvailable) {
      log.warn({ ffmpeg: this.ffmpeg.resolvedPath }, 'ffmpeg could not be located; runs will fail');
    }
  }

  compile(request: GenerationRequest): CompiledPlan {
    return compileEffects(request.source, request.overlay, request.effects, request.assets, {
      random: this.random,
      composer: this.composer,
    });
  }

  /**
   * Render the first `durationSeconds` into a fresh temp directory.
   * Resolves to the preview file path.
   */
  async preview(
    request: GenerationRequest,
    durationSeconds: number,
    sink: LineSink
  ): Promise<string> {
    const dir = await createTempDir(PREVIEW_DIR_PREFIX);
    const outputPath = join(dir, PREVIEW_FILE_NAME);
    await this.execute({ kind: 'preview', durationSeconds }, request, outputPath, sink);
    return outputPath;
  }

  /**
   * Render the whole source to `outputPath`
   */
  async generate(
    request: GenerationRequest,
    outputPath: string,
    sink: LineSink
  ): Promise<string> {
    await ensureDir(dirname(outputPath));
    await this.execute({ kind: 'full' }, request, outputPath, sink);
    return outputPath;
  }

  private async execute(
    mode: GenerationMode,
    request: GenerationRequest,
    outputPath: string,
    sink: LineSink
  ): Promise<void> {
    const plan = this.compile(request);
    const args = buildArguments(mode, request.source, plan, outputPath);

    log.info(
      { mode: mode.kind, effects: plan.applied.map((effect) => effect.key), output: outputPath },
      'Starting render'
    );

    await this.runner.run(
      {
        executable: this.ffmpeg.resolvedPath,
        args,
        primaryInput: request.source,
        extraInputs: plan.orderedExtraInputs,
      },
      sink
    );
  }
}

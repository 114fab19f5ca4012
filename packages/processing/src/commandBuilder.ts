/**
 * FFmpeg Command Builder
 *
 * Fluent API for building FFmpeg argument vectors, plus the mapping from
 * a compiled effect plan to the preview / full-generation command.
 */

import { ValidationError } from '@ytp-forge/core';
import { AUDIO_OUTPUT_LABEL, VIDEO_OUTPUT_LABEL } from './compiler.js';
import { getPreset, type EncodingPreset } from './presets.js';
import type { CompiledPlan } from './types.js';

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
}

export interface OutputOptions {
  extraArgs?: string[];   // Additional output args
}

export interface VideoCodecOptions {
  codec: 'copy' | 'libx264';
  preset?: string;
  crf?: number;
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private outputLabels: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private complexFilter: string | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add input with seeking
   */
  addInputWithSeek(file: string, seekSeconds: number, duration?: number): this {
    return this.addInput(file, { seekTo: seekSeconds, duration });
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Keep a labelled filter graph output
   */
  mapLabel(label: string): this {
    this.outputLabels.push(label);
    return this;
  }

  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Apply codecs and output arguments of an encoding preset
   */
  applyPreset(preset: EncodingPreset): this {
    return this.setVideoCodec({ ...preset.video })
      .setAudioCodec({ ...preset.audio })
      .setOutputOptions({ extraArgs: preset.outputArgs ? [...preset.outputArgs] : undefined });
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', input.options.seekTo.toString());
      }
      if (input.options.duration !== undefined) {
        args.push('-t', input.options.duration.toString());
      }
      args.push('-i', input.file);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    for (const label of this.outputLabels) {
      args.push('-map', `[${label}]`);
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);

      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      }
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);

      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    // Output options
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Render a command so it can be pasted into a shell
 */
export function formatCommandLine(executable: string, args: readonly string[]): string {
  return [executable, ...args].map((a) => (/\s/.test(a) ? `"${a}"` : a)).join(' ');
}

export type GenerationMode =
  | { kind: 'preview'; durationSeconds: number }
  | { kind: 'full' };

/**
 * Arguments for one run: primary input, then every extra input in slot
 * order, then the graph and its two terminal outputs, then encoding.
 * An empty graph description passes the primary streams through.
 */
export function buildArguments(
  mode: GenerationMode,
  primaryInput: string,
  plan: Pick<CompiledPlan, 'orderedExtraInputs' | 'graphDescription'>,
  outputPath: string
): string[] {
  const builder = new FFmpegCommandBuilder().addGlobalArg('-y');

  if (mode.kind === 'preview') {
    if (!Number.isFinite(mode.durationSeconds) || mode.durationSeconds <= 0) {
      throw new ValidationError('durationSeconds', 'preview duration must be a positive number');
    }
    builder.addInputWithSeek(primaryInput, 0, mode.durationSeconds);
  } else {
    builder.addInput(primaryInput);
  }

  for (const input of plan.orderedExtraInputs) {
    builder.addInput(input);
  }

  if (plan.graphDescription) {
    builder
      .setComplexFilter(plan.graphDescription)
      .mapLabel(VIDEO_OUTPUT_LABEL)
      .mapLabel(AUDIO_OUTPUT_LABEL);
  }

  return builder
    .applyPreset(getPreset(mode.kind))
    .setOutput(outputPath)
    .build();
}

/**
 * Encoding Presets
 *
 * Preview trades quality for turnaround; full generation keeps quality
 * and a higher audio bitrate.
 */

import type { VideoCodecOptions, AudioCodecOptions } from './commandBuilder.js';

export interface EncodingPreset {
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
  outputArgs?: string[];
}

export type PresetKind = 'preview' | 'full';

export const PRESETS: Record<PresetKind, EncodingPreset> = {
  preview: {
    video: {
      codec: 'libx264',
      preset: 'veryfast',
      crf: 28,
    },
    audio: {
      codec: 'aac',
    },
    outputArgs: ['-shortest'],
  },

  full: {
    video: {
      codec: 'libx264',
      preset: 'fast',
      crf: 20,
    },
    audio: {
      codec: 'aac',
      bitrate: '192k',
    },
  },
};

export function getPreset(kind: PresetKind): EncodingPreset {
  return PRESETS[kind];
}

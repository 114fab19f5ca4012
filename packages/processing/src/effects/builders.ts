/**
 * Effect Builders
 *
 * One pure builder per catalog key. A builder never fails: when the
 * asset it needs is unavailable it returns the no-op fragment.
 */

import { chooseAsset } from '../assets/selector.js';
import type { AssetPools, PoolName } from '../assets/pools.js';
import { defaultRandom, type RandomSource } from '../random.js';
import type { EffectFragment } from '../types.js';
import { clampIntensity, getDescriptor, type EffectKey } from './catalog.js';
import { clamp, decomposeTempo, formatNumber } from './tempo.js';

export interface BuildContext {
  intensity: number;
  overridePath?: string;
  pools: AssetPools;
  random: RandomSource;
}

export type EffectBuilder = (context: BuildContext) => EffectFragment;

export const NOOP_GRAPH_FRAGMENTS: readonly string[] = ['{0v}copy[vout]', '{0a}anull[aout]'];

export function noopFragment(): EffectFragment {
  return { extraInputs: [], graphFragments: [...NOOP_GRAPH_FRAGMENTS] };
}

function audioOnly(audioChain: string): EffectFragment {
  return { extraInputs: [], graphFragments: ['{0v}copy[vout]', `{0a}${audioChain}[aout]`] };
}

function videoOnly(videoChain: string): EffectFragment {
  return { extraInputs: [], graphFragments: [`{0v}${videoChain}[vout]`, '{0a}anull[aout]'] };
}

function pick(context: BuildContext, pool: PoolName): string | undefined {
  return chooseAsset(context.pools[pool], context.random);
}

function mixSound(asset: string | undefined, mixOptions: string): EffectFragment {
  if (!asset) return noopFragment();
  return {
    extraInputs: [asset],
    graphFragments: ['{0v}copy[vout]', `{0a}{1a}amix=inputs=2:${mixOptions}[aout]`],
  };
}

// Overlay through an intermediate label, then promote it to [vout]
function timedOverlay(asset: string | undefined, overlayArgs: string): EffectFragment {
  if (!asset) return noopFragment();
  return {
    extraInputs: [asset],
    graphFragments: [`{0v}{1v}overlay=${overlayArgs}[vtmp]`, '[vtmp]copy[vout]', '{0a}anull[aout]'],
  };
}

/**
 * Image + sound combination. Inputs are numbered in the order they
 * were actually picked, so the sound is {2a} only when an image precedes it.
 */
function memeCombo(
  image: string | undefined,
  sound: string | undefined,
  overlayArgs: string
): EffectFragment {
  if (!image && !sound) return noopFragment();

  const extraInputs: string[] = [];
  const graphFragments: string[] = [];

  if (image) {
    extraInputs.push(image);
    graphFragments.push(`{0v}{${extraInputs.length}v}overlay=${overlayArgs}[vtmp]`);
  } else {
    graphFragments.push('{0v}copy[vtmp]');
  }

  if (sound) {
    extraInputs.push(sound);
    graphFragments.push(`{0a}{${extraInputs.length}a}amix=inputs=2:duration=shortest[aout]`);
  } else {
    graphFragments.push('{0a}anull[aout]');
  }

  graphFragments.push('[vtmp]copy[vout]');
  return { extraInputs, graphFragments };
}

export const EFFECT_BUILDERS: Record<EffectKey, EffectBuilder> = {
  // Legacy: no external asset
  random_sound: () => audioOnly('volume=1.0'),

  sounds: (context) =>
    mixSound(pick(context, 'sounds'), 'duration=shortest:dropout_transition=2'),

  reverse: () => ({
    extraInputs: [],
    graphFragments: [
      '{0v}reverse[vrev]',
      '{0a}areverse[arev]',
      '[vrev]setpts=PTS-STARTPTS[vout]',
      '[arev]asetpts=PTS-STARTPTS[aout]',
    ],
  }),

  speed: ({ intensity }) => {
    const factor = clamp(intensity, 0.125, 4);
    const tempos = decomposeTempo(factor).map((tempo) => `atempo=${formatNumber(tempo)}`);
    return {
      extraInputs: [],
      graphFragments: [
        `{0v}setpts=${1 / factor}*PTS[vout]`,
        `{0a}${tempos.join(',')}[aout]`,
      ],
    };
  },

  chorus: ({ intensity }) => {
    const delay = Math.floor(20 + intensity * 60);
    const decay = clamp(0.2 + intensity * 0.2, 0.1, 0.9);
    return audioOnly(
      `aecho=0.8:0.9:${delay}|${delay * 2}:${formatNumber(decay)}|${formatNumber(decay * 0.6)}`
    );
  },

  vibrato: ({ intensity }) => {
    const pitch = clamp(intensity, 0.5, 2);
    const tempo = clamp(1 / pitch, 0.5, 2);
    return audioOnly(
      `asetrate=44100*${formatNumber(pitch)},aresample=44100,atempo=${formatNumber(tempo)}`
    );
  },

  stutter: ({ intensity }) => {
    const loopCount = Math.max(2, Math.floor(intensity * 3));
    return {
      extraInputs: [],
      graphFragments: [
        '{0v}trim=0:0.15,setpts=PTS-STARTPTS[vst]',
        `[vst]loop=${loopCount}:1:0[vstl]`,
        '{0a}atrim=0:0.15,asetpts=PTS-STARTPTS[ast]',
        `[ast]aloop=loop=${loopCount}:size=2[astl]`,
        '[vstl]scale=iw:ih[vout]',
        '[astl]anull[aout]',
      ],
    };
  },

  earrape: ({ intensity }) => {
    const gain = clamp(intensity, 2, 30);
    return {
      extraInputs: [],
      graphFragments: [
        '{0v}eq=contrast=1.1:saturation=1.4[vout]',
        `{0a}volume=${formatNumber(gain)}[aout]`,
      ],
    };
  },

  autotune: noopFragment,

  dance_squid: ({ intensity }) => {
    const zoom = formatNumber(1 + 0.05 * intensity);
    return {
      extraInputs: [],
      graphFragments: [
        `{0v}scale=iw*${zoom}:ih*${zoom},transpose=1,transpose=2,format=yuv420p[vout]`,
        '{0a}atempo=1.0[aout]',
      ],
    };
  },

  invert: () => videoOnly('negate'),

  // The override wins over the pool
  rainbow: (context) => {
    const asset = context.overridePath || pick(context, 'images');
    if (!asset) return noopFragment();
    return {
      extraInputs: [asset],
      graphFragments: ['{0v}{1v}overlay=10:10:shortest=1[vout]', '{0a}anull[aout]'],
    };
  },

  mirror: () => videoOnly('hflip'),

  sus: noopFragment,

  // The pool wins over the override
  explosion_spam: (context) =>
    timedOverlay(
      pick(context, 'images') ?? (context.overridePath || undefined),
      "enable='between(t,0,0.6)':x=10:y=10"
    ),

  frame_shuffle: () => videoOnly("tblend=all_mode='addition',framestep=1"),

  meme_injection: (context) => {
    const image = pick(context, 'memes') ?? (context.overridePath || undefined);
    const sound = pick(context, 'meme_sounds');
    return memeCombo(image, sound, 'W-w-10:H-h-10');
  },

  meme_sounds: (context) =>
    mixSound(pick(context, 'meme_sounds'), 'duration=shortest'),

  memes: (context) => {
    const image = pick(context, 'memes');
    const sound = pick(context, 'meme_sounds');
    return memeCombo(image, sound, '10:10:shortest=1');
  },

  sentence_mix: noopFragment,

  adverts: (context) =>
    timedOverlay(pick(context, 'adverts'), "enable='between(t,0,3)':x=W-w-10:y=10"),

  errors: (context) =>
    timedOverlay(pick(context, 'errors'), "enable='gt(mod(t,0.8),0.0)':x=0:y=0"),

  images: (context) =>
    timedOverlay(
      pick(context, 'images'),
      "enable='between(t,1,4)':x=main_w/4:y=main_h/4:alpha='if(lt(t,2),0,1)'"
    ),

  overlay_videos: (context) =>
    timedOverlay(pick(context, 'overlay_videos'), '10:10:shortest=1'),
};

/**
 * Produce the fragment for one effect. The intensity is clamped to the
 * effect's range first, so any number is accepted.
 */
export function buildFragment(
  key: EffectKey,
  intensity: number | undefined,
  overridePath: string | undefined,
  pools: AssetPools,
  random: RandomSource = defaultRandom
): EffectFragment {
  const builder = EFFECT_BUILDERS[key];
  return builder({
    intensity: clampIntensity(getDescriptor(key), intensity),
    overridePath,
    pools,
    random,
  });
}

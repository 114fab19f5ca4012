import { describe, expect, it, vi } from 'vitest';
import { NOOP_GRAPH_FRAGMENTS, buildFragment } from '../effects/builders.js';
import { EFFECT_CATALOG, EFFECT_KEYS, clampIntensity, getDescriptor, isEffectKey } from '../effects/catalog.js';
import type { EffectKey } from '../effects/catalog.js';
import { sequence } from './helpers.js';

const noop = { extraInputs: [], graphFragments: [...NOOP_GRAPH_FRAGMENTS] };

describe('effect catalog', () => {
  it('declares 24 effects in a fixed order', () => {
    expect(EFFECT_KEYS).toHaveLength(24);
    expect(EFFECT_KEYS[0]).toBe('random_sound');
    expect(EFFECT_KEYS[2]).toBe('reverse');
    expect(EFFECT_KEYS[23]).toBe('overlay_videos');
  });

  it('keeps every default within its range', () => {
    for (const effect of EFFECT_CATALOG) {
      expect(effect.defaultIntensity).toBeGreaterThanOrEqual(effect.minIntensity);
      expect(effect.defaultIntensity).toBeLessThanOrEqual(effect.maxIntensity);
    }
  });

  it('recognises effect keys', () => {
    expect(isEffectKey('earrape')).toBe(true);
    expect(isEffectKey('vaporwave')).toBe(false);
  });

  it('clamps intensity and falls back to the default', () => {
    const speed = getDescriptor('speed');
    expect(clampIntensity(speed, 10)).toBe(4);
    expect(clampIntensity(speed, 0)).toBe(0.125);
    expect(clampIntensity(speed, Number.NaN)).toBe(1);
    expect(clampIntensity(speed, undefined)).toBe(1);
  });
});

describe('buildFragment', () => {
  const assetEffects: EffectKey[] = [
    'sounds',
    'rainbow',
    'explosion_spam',
    'meme_injection',
    'meme_sounds',
    'memes',
    'adverts',
    'errors',
    'images',
    'overlay_videos',
  ];

  it.each(assetEffects)('%s falls back to the no-op fragment with empty pools', (key) => {
    const random = vi.fn(() => 0.5);
    expect(buildFragment(key, undefined, undefined, {}, random)).toEqual(noop);
    expect(random).not.toHaveBeenCalled();
  });

  it.each<EffectKey>(['autotune', 'sus', 'sentence_mix'])('%s is a pass-through', (key) => {
    expect(buildFragment(key, 2, undefined, { images: ['a.png'] })).toEqual(noop);
  });

  it('reverses both streams and resets timestamps', () => {
    expect(buildFragment('reverse', 1, undefined, {})).toEqual({
      extraInputs: [],
      graphFragments: [
        '{0v}reverse[vrev]',
        '{0a}areverse[arev]',
        '[vrev]setpts=PTS-STARTPTS[vout]',
        '[arev]asetpts=PTS-STARTPTS[aout]',
      ],
    });
  });

  it('speeds up video and audio together', () => {
    expect(buildFragment('speed', 2, undefined, {}).graphFragments).toEqual([
      '{0v}setpts=0.5*PTS[vout]',
      '{0a}atempo=2[aout]',
    ]);
  });

  it('keeps the video rate at full precision next to a chained tempo', () => {
    expect(buildFragment('speed', 3, undefined, {}).graphFragments).toEqual([
      '{0v}setpts=0.3333333333333333*PTS[vout]',
      '{0a}atempo=2,atempo=1.5[aout]',
    ]);
  });

  it('chains atempo when slowing below half speed', () => {
    expect(buildFragment('speed', 0.25, undefined, {}).graphFragments).toEqual([
      '{0v}setpts=4*PTS[vout]',
      '{0a}atempo=0.5,atempo=0.5[aout]',
    ]);
  });

  it('clamps speed to its maximum', () => {
    expect(buildFragment('speed', 10, undefined, {}).graphFragments).toEqual([
      '{0v}setpts=0.25*PTS[vout]',
      '{0a}atempo=2,atempo=2[aout]',
    ]);
  });

  it('uses the default speed for a non-finite intensity', () => {
    expect(buildFragment('speed', Number.NaN, undefined, {}).graphFragments).toEqual([
      '{0v}setpts=1*PTS[vout]',
      '{0a}atempo=1[aout]',
    ]);
  });

  it('derives chorus delay and decay from intensity', () => {
    expect(buildFragment('chorus', 1, undefined, {}).graphFragments).toEqual([
      '{0v}copy[vout]',
      '{0a}aecho=0.8:0.9:80|160:0.4|0.24[aout]',
    ]);
  });

  it('compensates vibrato pitch with tempo', () => {
    expect(buildFragment('vibrato', 2, undefined, {}).graphFragments).toEqual([
      '{0v}copy[vout]',
      '{0a}asetrate=44100*2,aresample=44100,atempo=0.5[aout]',
    ]);
  });

  it('loops at least twice when stuttering', () => {
    const fragment = buildFragment('stutter', 0.5, undefined, {});
    expect(fragment.graphFragments).toContain('[vst]loop=2:1:0[vstl]');
    expect(fragment.graphFragments).toContain('[ast]aloop=loop=2:size=2[astl]');
  });

  it('caps earrape gain', () => {
    expect(buildFragment('earrape', 100, undefined, {}).graphFragments).toEqual([
      '{0v}eq=contrast=1.1:saturation=1.4[vout]',
      '{0a}volume=30[aout]',
    ]);
  });

  it('zooms dance mode by intensity', () => {
    expect(buildFragment('dance_squid', 1, undefined, {}).graphFragments[0]).toBe(
      '{0v}scale=iw*1.05:ih*1.05,transpose=1,transpose=2,format=yuv420p[vout]'
    );
  });

  it('mixes a pooled sound into the primary audio', () => {
    expect(buildFragment('sounds', 1, undefined, { sounds: ['a.wav', 'b.wav'] }, sequence(0.99))).toEqual({
      extraInputs: ['b.wav'],
      graphFragments: [
        '{0v}copy[vout]',
        '{0a}{1a}amix=inputs=2:duration=shortest:dropout_transition=2[aout]',
      ],
    });
  });

  describe('rainbow', () => {
    it('prefers the override without drawing', () => {
      const random = vi.fn(() => 0);
      const fragment = buildFragment('rainbow', 1, 'rainbow.gif', { images: ['a.png'] }, random);

      expect(fragment).toEqual({
        extraInputs: ['rainbow.gif'],
        graphFragments: ['{0v}{1v}overlay=10:10:shortest=1[vout]', '{0a}anull[aout]'],
      });
      expect(random).not.toHaveBeenCalled();
    });

    it('falls back to the image pool', () => {
      expect(buildFragment('rainbow', 1, undefined, { images: ['a.png'] }).extraInputs).toEqual(['a.png']);
    });
  });

  describe('explosion_spam', () => {
    it('prefers the image pool over the override', () => {
      expect(
        buildFragment('explosion_spam', 2, 'override.png', { images: ['boom.png'] }).extraInputs
      ).toEqual(['boom.png']);
    });

    it('uses the override when the pool is empty', () => {
      expect(buildFragment('explosion_spam', 2, 'override.png', {})).toEqual({
        extraInputs: ['override.png'],
        graphFragments: [
          "{0v}{1v}overlay=enable='between(t,0,0.6)':x=10:y=10[vtmp]",
          '[vtmp]copy[vout]',
          '{0a}anull[aout]',
        ],
      });
    });
  });

  describe('memes', () => {
    it('overlays the image and mixes the sound from the second input', () => {
      const pools = { memes: ['a.png', 'b.png'], meme_sounds: ['x.wav', 'y.wav'] };

      expect(buildFragment('memes', 1, undefined, pools, sequence(0.99, 0))).toEqual({
        extraInputs: ['b.png', 'x.wav'],
        graphFragments: [
          '{0v}{1v}overlay=10:10:shortest=1[vtmp]',
          '{0a}{2a}amix=inputs=2:duration=shortest[aout]',
          '[vtmp]copy[vout]',
        ],
      });
    });

    it('references the sound as the first input when no image was picked', () => {
      expect(buildFragment('memes', 1, undefined, { meme_sounds: ['x.wav'] })).toEqual({
        extraInputs: ['x.wav'],
        graphFragments: [
          '{0v}copy[vtmp]',
          '{0a}{1a}amix=inputs=2:duration=shortest[aout]',
          '[vtmp]copy[vout]',
        ],
      });
    });

    it('keeps the audio untouched when only an image was picked', () => {
      expect(buildFragment('memes', 1, undefined, { memes: ['a.png'] })).toEqual({
        extraInputs: ['a.png'],
        graphFragments: [
          '{0v}{1v}overlay=10:10:shortest=1[vtmp]',
          '{0a}anull[aout]',
          '[vtmp]copy[vout]',
        ],
      });
    });
  });

  it('lets meme injection fall back to the override image', () => {
    expect(buildFragment('meme_injection', 1, 'face.png', { meme_sounds: ['x.wav'] })).toEqual({
      extraInputs: ['face.png', 'x.wav'],
      graphFragments: [
        '{0v}{1v}overlay=W-w-10:H-h-10[vtmp]',
        '{0a}{2a}amix=inputs=2:duration=shortest[aout]',
        '[vtmp]copy[vout]',
      ],
    });
  });

  it('shows adverts during the first three seconds', () => {
    expect(buildFragment('adverts', 1, undefined, { adverts: ['ad.mp4'] }).graphFragments[0]).toBe(
      "{0v}{1v}overlay=enable='between(t,0,3)':x=W-w-10:y=10[vtmp]"
    );
  });
});

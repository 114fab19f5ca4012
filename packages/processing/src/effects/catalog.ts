/**
 * Effect Catalog
 *
 * Declaration order is compilation order: it fixes both the order of
 * graph fragments and the order of random draws.
 */

export interface EffectDescriptor {
  key: string;
  displayName: string;
  defaultIntensity: number;
  minIntensity: number;
  maxIntensity: number;
}

export const EFFECT_CATALOG = [
  { key: 'random_sound', displayName: 'Add Random Sound (legacy)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 5 },
  { key: 'sounds', displayName: 'Add Sound from Assets', defaultIntensity: 1, minIntensity: 0, maxIntensity: 5 },
  { key: 'reverse', displayName: 'Reverse Clip (video & audio)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'speed', displayName: 'Speed Up / Slow Down', defaultIntensity: 1, minIntensity: 0.125, maxIntensity: 4 },
  { key: 'chorus', displayName: 'Chorus Effect (aecho)', defaultIntensity: 0.6, minIntensity: 0, maxIntensity: 2 },
  { key: 'vibrato', displayName: 'Vibrato / Pitch Bend (asetrate+atempo)', defaultIntensity: 1, minIntensity: 0.5, maxIntensity: 2 },
  { key: 'stutter', displayName: 'Stutter Loop', defaultIntensity: 0.5, minIntensity: 0, maxIntensity: 3 },
  { key: 'earrape', displayName: 'Earrape Mode (gain)', defaultIntensity: 6, minIntensity: 2, maxIntensity: 30 },
  { key: 'autotune', displayName: 'Auto-Tune Chaos (placeholder)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'dance_squid', displayName: 'Dance & Squidward Mode', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'invert', displayName: 'Invert Colors', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'rainbow', displayName: 'Rainbow Overlay (user PNG/GIF)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'mirror', displayName: 'Mirror Mode', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'sus', displayName: 'Sus Effect (random pitch/tempo)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'explosion_spam', displayName: 'Explosion Spam (repetitive overlays)', defaultIntensity: 2, minIntensity: 0, maxIntensity: 10 },
  { key: 'frame_shuffle', displayName: 'Frame Shuffle (placeholder)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 1 },
  { key: 'meme_injection', displayName: 'Meme Injection (overlay image/audio)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'meme_sounds', displayName: 'Meme Sounds (assets)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'memes', displayName: 'Memes (images + sounds)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'sentence_mix', displayName: 'Sentence Mixing / Random Cuts', defaultIntensity: 1, minIntensity: 0, maxIntensity: 5 },
  { key: 'adverts', displayName: 'Adverts (overlay ad video)', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'errors', displayName: 'Error / Glitch Overlays', defaultIntensity: 1, minIntensity: 0, maxIntensity: 3 },
  { key: 'images', displayName: 'Image Montage / Injection', defaultIntensity: 1, minIntensity: 0, maxIntensity: 5 },
  { key: 'overlay_videos', displayName: 'Overlay Short Videos', defaultIntensity: 1, minIntensity: 0, maxIntensity: 5 },
] as const satisfies readonly EffectDescriptor[];

export type EffectKey = typeof EFFECT_CATALOG[number]['key'];

export const EFFECT_KEYS: readonly EffectKey[] = EFFECT_CATALOG.map((effect) => effect.key);

export function isEffectKey(value: string): value is EffectKey {
  return (EFFECT_KEYS as readonly string[]).includes(value);
}

export function getDescriptor(key: EffectKey): EffectDescriptor {
  const descriptor = EFFECT_CATALOG.find((effect) => effect.key === key);
  if (!descriptor) {
    throw new Error(`Unknown effect: ${key}`);
  }
  return descriptor;
}

/**
 * Bring a requested intensity into the effect's range.
 * Non-finite values fall back to the default.
 */
export function clampIntensity(descriptor: EffectDescriptor, value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return descriptor.defaultIntensity;
  }
  return Math.min(descriptor.maxIntensity, Math.max(descriptor.minIntensity, value));
}

/**
 * Asset Pools
 *
 * Named lists of media files that effects draw from.
 */

export const POOL_NAMES = [
  'images',
  'sounds',
  'adverts',
  'errors',
  'memes',
  'meme_sounds',
  'overlay_videos',
] as const;

export type PoolName = typeof POOL_NAMES[number];

/** Pool name -> file paths. Absent pools behave as empty. */
export type AssetPools = Partial<Record<PoolName, readonly string[]>>;

export type MediaKind = 'image' | 'audio' | 'video';

export const MEDIA_EXTENSIONS: Record<MediaKind, readonly string[]> = {
  image: ['.png', '.jpg', '.jpeg', '.gif', '.webp', '.bmp'],
  audio: ['.mp3', '.wav', '.aac', '.m4a', '.ogg'],
  video: ['.mp4', '.mov', '.mkv', '.webm', '.avi'],
};

export const POOL_MEDIA_KINDS: Record<PoolName, readonly MediaKind[]> = {
  images: ['image'],
  sounds: ['audio'],
  adverts: ['video', 'image'],
  errors: ['image', 'video'],
  memes: ['image'],
  meme_sounds: ['audio'],
  overlay_videos: ['video'],
};

export function isPoolName(value: string): value is PoolName {
  return (POOL_NAMES as readonly string[]).includes(value);
}

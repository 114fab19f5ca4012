import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { isPoolName } from '../assets/pools.js';
import { poolDirectories, scanAssetDirectory, scanAssetPools } from '../assets/scanner.js';

describe('asset scanner', () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'ytp-assets-'));
    const dirs = poolDirectories(root);
    await mkdir(dirs.images, { recursive: true });
    await mkdir(dirs.sounds, { recursive: true });
    await mkdir(dirs.adverts, { recursive: true });
    await mkdir(join(dirs.images, 'nested'), { recursive: true });

    await writeFile(join(dirs.images, 'b.PNG'), '');
    await writeFile(join(dirs.images, 'a.jpg'), '');
    await writeFile(join(dirs.images, 'notes.txt'), '');
    await writeFile(join(dirs.images, 'nested', 'c.png'), '');
    await writeFile(join(dirs.sounds, 'boom.mp3'), '');
    await writeFile(join(dirs.sounds, 'clip.mp4'), '');
    await writeFile(join(dirs.adverts, 'ad.mp4'), '');
    await writeFile(join(dirs.adverts, 'banner.png'), '');
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('keeps matching top-level files, sorted', async () => {
    const dirs = poolDirectories(root);
    expect(await scanAssetDirectory(dirs.images, 'images')).toEqual([
      join(dirs.images, 'a.jpg'),
      join(dirs.images, 'b.PNG'),
    ]);
  });

  it('accepts both video and image adverts', async () => {
    const dirs = poolDirectories(root);
    expect(await scanAssetDirectory(dirs.adverts, 'adverts')).toEqual([
      join(dirs.adverts, 'ad.mp4'),
      join(dirs.adverts, 'banner.png'),
    ]);
  });

  it('treats missing or unset directories as empty', async () => {
    expect(await scanAssetDirectory(join(root, 'nope'), 'memes')).toEqual([]);
    expect(await scanAssetDirectory(undefined, 'memes')).toEqual([]);
  });

  it('scans every pool', async () => {
    const pools = await scanAssetPools(poolDirectories(root));

    expect(pools.sounds).toEqual([join(root, 'sounds', 'boom.mp3')]);
    expect(pools.memes).toEqual([]);
    expect(pools.overlay_videos).toEqual([]);
  });

  it('recognises pool names', () => {
    expect(isPoolName('meme_sounds')).toBe(true);
    expect(isPoolName('overlays_videos')).toBe(false);
  });
});

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createTempDir, isRegularFile, listFiles, safeReadFile } from '../file.js';

describe('file utilities', () => {
  let root: string;

  beforeAll(async () => {
    root = await createTempDir('ytp_utils_');
    await writeFile(join(root, 'b.txt'), 'bee');
    await writeFile(join(root, 'a.txt'), 'ay');
    await mkdir(join(root, 'nested'));
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('recognizes regular files only', async () => {
    expect(await isRegularFile(join(root, 'a.txt'))).toBe(true);
    expect(await isRegularFile(join(root, 'nested'))).toBe(false);
    expect(await isRegularFile(join(root, 'missing.txt'))).toBe(false);
    expect(await isRegularFile('')).toBe(false);
  });

  it('lists files without descending into directories', async () => {
    const files = await listFiles(root);
    expect(files.sort()).toEqual([join(root, 'a.txt'), join(root, 'b.txt')]);
  });

  it('returns an empty list for a missing directory', async () => {
    expect(await listFiles(join(root, 'does-not-exist'))).toEqual([]);
  });

  it('reads null for a missing file', async () => {
    expect(await safeReadFile(join(root, 'missing.txt'))).toBeNull();
    expect(await safeReadFile(join(root, 'b.txt'))).toBe('bee');
  });
});

/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, mkdtemp, readdir, readFile, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Create a fresh directory under the OS temp dir
 */
export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * True when the path exists and is a regular file (symlinks followed)
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  if (!filePath) return false;
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * List the regular files directly inside a directory.
 * A missing or unreadable directory yields an empty list.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dirPath);
  } catch {
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dirPath, entry);
    if (await isRegularFile(fullPath)) {
      files.push(fullPath);
    }
  }
  return files;
}

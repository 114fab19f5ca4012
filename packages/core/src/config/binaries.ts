/**
 * Binary Configuration
 *
 * Locates the external encoder binary.
 * Supports both Windows and Linux binaries with automatic OS detection.
 *
 * Priority order:
 * 1. Explicit override (CLI flag / caller option)
 * 2. Environment variable (FFMPEG_PATH)
 * 3. Custom binary folder (packages/core/binaries/<os>/)
 * 4. System PATH
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

type Env = Record<string, string | undefined>;

/**
 * OS-specific subfolder
 */
function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export type BinarySource = 'override' | 'env' | 'bundled' | 'path' | 'unresolved';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
  isAvailable: boolean;
}

export interface ResolveOptions {
  override?: string;
  env?: Env;
  platform?: NodeJS.Platform;
  binaryRoot?: string;
}

function isExecutableFile(candidate: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    // Windows has no execute bit; the extension decides
    if (platform !== 'win32') accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search for an executable the way the shell would.
 * Names containing a path separator are checked as-is.
 * Returns null when nothing matches.
 */
export function findExecutable(
  name: string,
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform
): string | null {
  if (!name) return null;

  const extensions = platform === 'win32'
    ? ['', ...(env['PATHEXT'] ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
    : [''];

  if (name.includes('/') || name.includes('\\')) {
    for (const ext of extensions) {
      if (isExecutableFile(name + ext, platform)) return name + ext;
    }
    return null;
  }

  const pathValue = env['PATH'] ?? env['Path'] ?? '';
  const separator = platform === 'win32' ? ';' : delimiter;
  for (const dir of pathValue.split(separator)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, name + ext);
      if (isExecutableFile(candidate, platform)) return candidate;
    }
  }
  return null;
}

/**
 * Resolve a binary following the priority order above.
 * An unresolved binary keeps its bare name so that the spawn
 * reports it as missing.
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  options: ResolveOptions = {}
): BinaryConfig {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const binaryRoot = options.binaryRoot ?? BINARY_ROOT;

  const candidates: { value: string | undefined; source: BinarySource }[] = [
    { value: options.override, source: 'override' },
    { value: env[envVar], source: 'env' },
  ];

  for (const { value, source } of candidates) {
    if (!value) continue;
    const found = findExecutable(value, env, platform);
    if (found) {
      return { name, envVar, resolvedPath: found, source, isAvailable: true };
    }
  }

  const exeName = platform === 'win32' ? `${name}.exe` : name;
  const bundled = join(binaryRoot, getOsFolder(platform), exeName);
  if (isExecutableFile(bundled, platform)) {
    return { name, envVar, resolvedPath: bundled, source: 'bundled', isAvailable: true };
  }

  const onPath = findExecutable(name, env, platform);
  if (onPath) {
    return { name, envVar, resolvedPath: onPath, source: 'path', isAvailable: true };
  }

  return {
    name,
    envVar,
    resolvedPath: options.override ?? env[envVar] ?? name,
    source: 'unresolved',
    isAvailable: false,
  };
}

/**
 * Resolve ffmpeg
 */
export function resolveFfmpeg(options: ResolveOptions = {}): BinaryConfig {
  return resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', options);
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(platform: NodeJS.Platform = process.platform): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder(platform)),
  };
}

/**
 * Default Application Opener
 *
 * Hands a finished render to the platform's opener and returns as soon as
 * the opener has started. The opener is detached and never awaited.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';

export interface OpenerCommand {
  command: string;
  args: string[];
}

export interface DetachedProcess extends EventEmitter {
  unref(): void;
}

export type OpenerSpawn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => DetachedProcess;

export interface OpenOptions {
  platform?: NodeJS.Platform;
  spawn?: OpenerSpawn;
}

const defaultSpawn: OpenerSpawn = (command, args, options) => spawn(command, [...args], options);

export function openerCommand(target: string, platform: NodeJS.Platform = process.platform): OpenerCommand {
  switch (platform) {
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', target] };
    case 'darwin':
      return { command: 'open', args: [target] };
    default:
      return { command: 'xdg-open', args: [target] };
  }
}

export function openWithDefaultApp(target: string, options: OpenOptions = {}): Promise<void> {
  const { command, args } = openerCommand(target, options.platform);
  const child = (options.spawn ?? defaultSpawn)(command, args, {
    detached: true,
    stdio: 'ignore',
    windowsHide: true,
  });

  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('spawn', () => {
      child.off('error', reject);
      child.unref();
      resolve();
    });
  });
}

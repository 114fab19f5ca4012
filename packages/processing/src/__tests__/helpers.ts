import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { vi, type Mock } from 'vitest';
import type { RandomSource } from '../random.js';
import type { SpawnFunction } from '../runner.js';

/** Replays the given values, cycling when they run out */
export function sequence(...values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

/**
 * In-process stand-in for a spawned encoder. The script runs on the
 * next turn after start(), once the runner has attached its listeners.
 */
export class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((_signal?: NodeJS.Signals | number) => true);

  constructor(private readonly script: (child: FakeChild) => void) {
    super();
  }

  start(): this {
    setImmediate(() => this.script(this));
    return this;
  }
}

export interface ChildScript {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
}

/**
 * Child that starts, prints its lines, closes both pipes and exits
 */
export function scriptedChild(script: ChildScript): FakeChild {
  return new FakeChild((child) => {
    child.emit('spawn');
    for (const line of script.stdout ?? []) child.stdout.write(`${line}\n`);
    for (const line of script.stderr ?? []) child.stderr.write(`${line}\n`);
    child.stdout.end();
    child.stderr.end();
    setTimeout(() => {
      child.emit('close', script.exitCode === undefined ? 0 : script.exitCode, script.signal ?? null);
    }, 5);
  });
}

export function fakeSpawn(child: FakeChild): Mock<SpawnFunction> {
  return vi.fn<SpawnFunction>(() => child.start());
}

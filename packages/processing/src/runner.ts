/**
 * Process Runner
 *
 * Runs an encoder command while streaming its combined stdout/stderr to a
 * line sink. Inputs are checked before anything is spawned. If reading the
 * output fails the child is killed before the error propagates, so no run
 * leaves an orphaned encoder behind.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import { PassThrough, type Readable } from 'node:stream';
import {
  ExecutableNotFoundError,
  MissingInputError,
  ProcessExitError,
  ProcessStartError,
  StreamInterruptedError,
  type MissingInput,
} from '@ytp-forge/core';
import { createLogger, isDefined, isRegularFile, type Logger } from '@ytp-forge/utils';
import { formatCommandLine } from './commandBuilder.js';

export type LineSink = (line: string) => void;

export interface RunRequest {
  executable: string;
  args: readonly string[];
  primaryInput: string;
  extraInputs: readonly string[];
}

/** The part of ChildProcess the runner relies on */
export interface SpawnedProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

export interface CommandRunner {
  run(request: RunRequest, sink: LineSink): Promise<void>;
}

export interface ProcessRunnerOptions {
  spawn?: SpawnFunction;
  logger?: Logger;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const INT32_LIMIT = 2 ** 31;
const UINT32_RANGE = 2 ** 32;

/**
 * Reinterpret an unsigned 32-bit wraparound as the signed value it
 * stands for, e.g. 4294967294 -> -2.
 */
export function normalizeExitCode(raw: number): number {
  return raw >= INT32_LIMIT ? raw - UINT32_RANGE : raw;
}

const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, [...args], options);

export class ProcessRunner implements CommandRunner {
  private readonly spawnProcess: SpawnFunction;
  private readonly log: Logger;

  constructor(options: ProcessRunnerOptions = {}) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.log = options.logger ?? createLogger({ module: 'process-runner' });
  }

  async run(request: RunRequest, sink: LineSink): Promise<void> {
    await this.verifyInputs(request.primaryInput, request.extraInputs);

    const command = formatCommandLine(request.executable, request.args);
    this.log.info({ command }, 'Running encoder');

    let child: SpawnedProcess;
    try {
      child = this.spawnProcess(request.executable, request.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      throw toStartError(request.executable, error);
    }

    // Listen before the first await so an early exit is not missed
    const exited = waitForExit(child);
    child.on('error', (error: Error) => {
      this.log.warn({ err: error, command }, 'Encoder process error');
    });

    await waitForSpawn(child, request.executable);

    try {
      await forwardLines(child, sink);
    } catch (error) {
      child.kill('SIGKILL');
      this.log.error({ err: error, command }, 'Output stream failed, encoder killed');
      throw new StreamInterruptedError(command, error);
    }

    const { code, signal } = await exited;
    const exitCode = code ?? (signal ? 128 : 1);
    const normalized = normalizeExitCode(exitCode);

    if (exitCode !== 0) {
      this.log.error({ command, exitCode, normalized, signal }, 'Encoder exited with an error');
      throw new ProcessExitError(command, exitCode, normalized, signal);
    }

    this.log.debug({ command }, 'Encoder finished');
  }

  /**
   * Fail with every missing path at once, before spawning
   */
  private async verifyInputs(primaryInput: string, extraInputs: readonly string[]): Promise<void> {
    const missing: MissingInput[] = [];

    if (!(await isRegularFile(primaryInput))) {
      missing.push({ role: 'primary', path: primaryInput });
    }
    for (const path of extraInputs) {
      if (!(await isRegularFile(path))) {
        missing.push({ role: 'extra', path });
      }
    }

    if (missing.length > 0) {
      throw new MissingInputError(missing);
    }
  }
}

function toStartError(executable: string, error: unknown): Error {
  if (error instanceof Error && (error as NodeJS.ErrnoException).code === 'ENOENT') {
    return new ExecutableNotFoundError(executable);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ProcessStartError(executable, reason, error);
}

function waitForSpawn(child: SpawnedProcess, executable: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(toStartError(executable, error));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function waitForExit(child: SpawnedProcess): Promise<ExitStatus> {
  return new Promise((resolve) => {
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal });
    });
  });
}

/**
 * Merge both pipes into one stream and hand each line to the sink as it
 * arrives. Rejects if either pipe errors or the sink throws.
 */
async function forwardLines(child: SpawnedProcess, sink: LineSink): Promise<void> {
  const combined = new PassThrough();
  const sources = [child.stdout, child.stderr].filter(isDefined);
  const state: { open: number; failure?: Error } = { open: sources.length };

  const detach = (): void => {
    for (const source of sources) source.unpipe(combined);
  };
  const finish = (): void => {
    if (!combined.writableEnded) combined.end();
  };

  if (state.open === 0) finish();

  for (const source of sources) {
    source.on('error', (error: Error) => {
      state.failure ??= error;
      detach();
      finish();
    });
    source.once('end', () => {
      state.open -= 1;
      if (state.open === 0) finish();
    });
    source.pipe(combined, { end: false });
  }

  const lines = createInterface({ input: combined, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (state.failure) break;
      sink(line);
    }
  } finally {
    lines.close();
    detach();
    combined.destroy();
  }

  if (state.failure) {
    throw state.failure;
  }
}

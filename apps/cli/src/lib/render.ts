/**
 * Render Runner
 *
 * Shows encoder progress while a render runs: the latest encoder line
 * as spinner text, or every line when verbose.
 */

import chalk from 'chalk';
import ora from 'ora';
import { EffectGenerator, createSeededRandom, type LineSink } from '@ytp-forge/processing';
import { openWithDefaultApp } from './opener.js';
import { printHeader, printInfo, printKeyValue, printWarning } from './output.js';
import type { ResolvedRun } from './request.js';

const MAX_STATUS_LENGTH = 70;

export function createGenerator(run: ResolvedRun): EffectGenerator {
  const generator = new EffectGenerator({
    ffmpegPath: run.ffmpegPath,
    random: run.seed !== undefined ? createSeededRandom(run.seed) : undefined,
  });
  if (!generator.ffmpeg.isAvailable) {
    printWarning(`ffmpeg not found, trying "${generator.ffmpeg.resolvedPath}" anyway`);
  }
  return generator;
}

export function printRunSummary(title: string, run: ResolvedRun): void {
  const enabled = Object.entries(run.request.effects)
    .filter(([, selection]) => selection?.enabled)
    .map(([key]) => key);

  printHeader(title);
  printKeyValue('Source', run.request.source);
  printKeyValue('Effects', enabled.length > 0 ? enabled.join(', ') : 'none');
  if (run.request.overlay) printKeyValue('Overlay', run.request.overlay);
  if (run.seed !== undefined) printKeyValue('Seed', run.seed);
  console.log();
}

export async function withProgress<T>(
  label: string,
  verbose: boolean,
  task: (sink: LineSink) => Promise<T>
): Promise<T> {
  const spinner = ora(label).start();

  const sink: LineSink = (line) => {
    if (verbose) {
      spinner.clear();
      console.log(chalk.gray(line));
      spinner.render();
      return;
    }
    const status = line.trim();
    if (status) {
      spinner.text = `${label} ${chalk.gray(status.slice(0, MAX_STATUS_LENGTH))}`;
    }
  };

  try {
    const result = await task(sink);
    spinner.succeed(`${label} done`);
    return result;
  } catch (error) {
    spinner.fail(`${label} failed`);
    throw error;
  }
}

/**
 * Open a finished render. Failing to open is reported, never fatal.
 */
export async function openResult(outputPath: string): Promise<void> {
  try {
    await openWithDefaultApp(outputPath);
    printInfo(`Opened ${outputPath}`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    printWarning(`Could not open ${outputPath}: ${reason}`);
  }
}

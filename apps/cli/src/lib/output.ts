/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { ExecutableNotFoundError, YtpForgeError, getBinaryFolders } from '@ytp-forge/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  console.log(`  ${chalk.gray(key + ':')} ${text}`);
}

/**
 * Print an error with its code and details
 */
export function printFailure(error: unknown): void {
  if (!(error instanceof YtpForgeError)) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    return;
  }

  printError(`${chalk.bold(error.code)} ${error.message}`);
  for (const [key, value] of Object.entries(error.details ?? {})) {
    printKeyValue(key, value);
  }

  if (error instanceof ExecutableNotFoundError) {
    printInfo(`Set FFMPEG_PATH or pass --ffmpeg. Bundled binaries are looked up in ${getBinaryFolders().os}`);
  }
}

#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for ytp-forge.
 */

import './env.js';

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { effectsCommand } from './commands/effects.js';
import { assetsCommand } from './commands/assets.js';
import { previewCommand } from './commands/preview.js';
import { generateCommand } from './commands/generate.js';

const program = new Command();

program
  .name('ytp-forge')
  .description('Randomised video effect generator built on ffmpeg')
  .version('1.0.0');

// ============================================
// CATALOG COMMANDS
// ============================================

program
  .command('effects')
  .description('List available effects')
  .option('--json', 'Output in JSON format')
  .action(effectsCommand);

program
  .command('assets [dir]')
  .description('Scan asset pools under a directory (default: YTP_ASSETS_DIR)')
  .action(assetsCommand);

// ============================================
// RENDER COMMANDS
// ============================================

function withRenderOptions(command: Command): Command {
  return command
    .option('-e, --effect <spec...>', 'Effect as key[:intensity][@probability], repeatable')
    .option('-r, --recipe <file>', 'JSON recipe with source, assets and effects')
    .option('--overlay <file>', 'Override image for overlay effects')
    .option('-a, --assets <dir>', 'Asset pool root directory')
    .option('--seed <number>', 'Seed for reproducible random picks')
    .option('--ffmpeg <path>', 'Path to the ffmpeg executable')
    .option('-v, --verbose', 'Print every encoder line')
    .option('--open', 'Open the result with the default application');
}

withRenderOptions(
  program
    .command('preview [source]')
    .description('Render a short low-quality preview')
    .option('-d, --duration <seconds>', 'Preview length in seconds (default: YTP_PREVIEW_DURATION)')
).action(previewCommand);

withRenderOptions(
  program
    .command('generate [source]')
    .description('Render the full video')
    .option('-o, --output <file>', 'Output file (default: <outputDir>/<source>_ytp_<timestamp>.mp4)')
).action(generateCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('ytp-forge --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();

/**
 * Generate Command
 *
 * Renders the whole source with the selected effects.
 */

import { loadCliConfig } from '../config/index.js';
import { printFailure, printKeyValue, printSuccess } from '../lib/output.js';
import { createGenerator, openResult, printRunSummary, withProgress } from '../lib/render.js';
import { resolveRun, type RenderOptions } from '../lib/request.js';

export async function generateCommand(
  source: string | undefined,
  options: RenderOptions
): Promise<void> {
  try {
    const run = await resolveRun(source, options, loadCliConfig());
    const generator = createGenerator(run);

    printRunSummary('Generating Video', run);
    printKeyValue('Output', run.outputPath);
    console.log();

    const outputPath = await withProgress('Generating', Boolean(options.verbose), (sink) =>
      generator.generate(run.request, run.outputPath, sink)
    );

    printSuccess(`Video written to ${outputPath}`);
    if (options.open) {
      await openResult(outputPath);
    }
  } catch (error) {
    printFailure(error);
    process.exit(1);
  }
}

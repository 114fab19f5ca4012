/**
 * Preview Command
 *
 * Renders the first seconds of the source into a temporary file.
 */

import { loadCliConfig } from '../config/index.js';
import { printFailure, printKeyValue, printSuccess } from '../lib/output.js';
import { createGenerator, openResult, printRunSummary, withProgress } from '../lib/render.js';
import { resolveRun, type RenderOptions } from '../lib/request.js';

export async function previewCommand(
  source: string | undefined,
  options: RenderOptions
): Promise<void> {
  try {
    const run = await resolveRun(source, options, loadCliConfig());
    const generator = createGenerator(run);

    printRunSummary('Rendering Preview', run);
    printKeyValue('Duration', `${run.previewDurationSeconds}s`);
    console.log();

    const outputPath = await withProgress('Rendering preview', Boolean(options.verbose), (sink) =>
      generator.preview(run.request, run.previewDurationSeconds, sink)
    );

    printSuccess(`Preview written to ${outputPath}`);
    if (options.open) {
      await openResult(outputPath);
    }
  } catch (error) {
    printFailure(error);
    process.exit(1);
  }
}

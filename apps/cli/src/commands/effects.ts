/**
 * Effects Command
 *
 * Lists the effect catalog.
 */

import { EFFECT_CATALOG } from '@ytp-forge/processing';
import { printHeader, printJson, printTable } from '../lib/output.js';

interface EffectsOptions {
  json?: boolean;
}

export function effectsCommand(options: EffectsOptions): void {
  if (options.json) {
    printJson(EFFECT_CATALOG);
    return;
  }

  printHeader('Available Effects');
  printTable(
    EFFECT_CATALOG.map((effect) => ({
      key: effect.key,
      name: effect.displayName,
      default: effect.defaultIntensity,
      range: `${effect.minIntensity} - ${effect.maxIntensity}`,
    }))
  );
}

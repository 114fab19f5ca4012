/**
 * Fragment Compiler
 *
 * Turns effect selections into one filter graph plus the ordered list of
 * extra inputs. Slot 0 is the primary input; extra inputs take slots
 * 1..n in compilation order, which is exactly the order they must be
 * passed to ffmpeg with -i.
 *
 * Fragments are not chained: every effect reads from [0:v]/[0:a] and
 * declares [vout]/[aout] itself. With several effects enabled the graph
 * declares those labels more than once and ffmpeg rejects it. Callers
 * that want chaining supply their own GraphComposer.
 */

import { InvalidFragmentError } from '@ytp-forge/core';
import { createLogger } from '@ytp-forge/utils';
import type { AssetPools } from './assets/pools.js';
import { buildFragment } from './effects/builders.js';
import { EFFECT_CATALOG, clampIntensity, type EffectKey } from './effects/catalog.js';
import { defaultRandom, type RandomSource } from './random.js';
import type { AppliedEffect, CompiledPlan, EffectSelections } from './types.js';

const log = createLogger({ module: 'compiler' });

export const FRAGMENT_SEPARATOR = '; ';

export const VIDEO_OUTPUT_LABEL = 'vout';
export const AUDIO_OUTPUT_LABEL = 'aout';

/** Used when no effect contributed anything */
export const GLOBAL_NOOP_GRAPH = `[0:v]copy[${VIDEO_OUTPUT_LABEL}]${FRAGMENT_SEPARATOR}[0:a]anull[${AUDIO_OUTPUT_LABEL}]`;

/** A fragment after its placeholders were rewritten to global slots */
export interface ResolvedFragment {
  key: EffectKey;
  firstSlot: number;
  inputs: readonly string[];
  filters: readonly string[];
}

/**
 * Decides how resolved fragments become one graph description.
 */
export interface GraphComposer {
  compose(fragments: readonly ResolvedFragment[]): string;
}

/** Concatenates every fragment as-is, in compilation order */
export const independentComposer: GraphComposer = {
  compose: (fragments) =>
    fragments.flatMap((fragment) => fragment.filters).join(FRAGMENT_SEPARATOR),
};

export interface CompileOptions {
  random?: RandomSource;
  composer?: GraphComposer;
}

const PLACEHOLDER = /\{(\d+)([va])\}/g;

/**
 * Rewrite {0v}/{0a} to the primary input and {jv}/{ja} to global slot
 * firstSlot + j - 1. Referencing an undeclared input throws.
 */
export function resolvePlaceholders(
  template: string,
  firstSlot: number,
  inputCount: number
): string {
  return template.replace(PLACEHOLDER, (placeholder: string, index: string, stream: string) => {
    const local = Number(index);
    if (local === 0) {
      return `[0:${stream}]`;
    }
    if (local > inputCount) {
      throw new InvalidFragmentError(template, placeholder, inputCount);
    }
    return `[${firstSlot + local - 1}:${stream}]`;
  });
}

export function compileEffects(
  primaryInput: string,
  overridePath: string | undefined,
  selections: EffectSelections,
  pools: AssetPools,
  options: CompileOptions = {}
): CompiledPlan {
  const random = options.random ?? defaultRandom;
  const composer = options.composer ?? independentComposer;

  const orderedExtraInputs: string[] = [];
  const resolved: ResolvedFragment[] = [];
  const applied: AppliedEffect[] = [];
  let nextSlot = 1;

  for (const descriptor of EFFECT_CATALOG) {
    const key = descriptor.key;
    const selection = selections[key];
    if (!selection?.enabled) continue;

    const probability = selection.probability ?? 1;
    if (probability < 1 && random() > probability) {
      log.debug({ effect: key, probability }, 'Effect skipped by probability gate');
      continue;
    }

    const intensity = clampIntensity(descriptor, selection.intensity);
    const fragment = buildFragment(key, intensity, overridePath, pools, random);

    const firstSlot = nextSlot;
    for (const input of fragment.extraInputs) {
      orderedExtraInputs.push(input);
      nextSlot += 1;
    }

    const inputCount = fragment.extraInputs.length;
    resolved.push({
      key,
      firstSlot,
      inputs: [...fragment.extraInputs],
      filters: fragment.graphFragments.map((template) =>
        resolvePlaceholders(template, firstSlot, inputCount)
      ),
    });
    applied.push({ key, intensity, firstSlot, inputs: [...fragment.extraInputs] });
  }

  const graphDescription = resolved.length === 0
    ? GLOBAL_NOOP_GRAPH
    : composer.compose(resolved);

  log.debug(
    { effects: applied.map((effect) => effect.key), extraInputs: orderedExtraInputs.length },
    'Compiled effect plan'
  );

  return { primaryInput, orderedExtraInputs, graphDescription, applied };
}

/**
 * Effect Selection Parsing
 *
 * Command-line form: key[:intensity][@probability], e.g. "speed:2@0.5".
 */

import { ValidationError } from '@ytp-forge/core';
import { isEffectKey, type EffectKey, type EffectSelection, type EffectSelections } from '@ytp-forge/processing';

const SPEC_PATTERN = /^([a-z_]+)(?::([^@]+))?(?:@(.+))?$/;

export interface ParsedSelection {
  key: EffectKey;
  selection: EffectSelection;
}

export function parseEffectSpec(spec: string): ParsedSelection {
  const match = SPEC_PATTERN.exec(spec.trim());
  if (!match) {
    throw new ValidationError('effect', `"${spec}" is not of the form key[:intensity][@probability]`);
  }

  const [, key = '', intensityText, probabilityText] = match;
  if (!isEffectKey(key)) {
    throw new ValidationError('effect', `Unknown effect "${key}"`);
  }

  const selection: EffectSelection = { enabled: true };

  if (intensityText !== undefined) {
    const intensity = Number(intensityText);
    if (!Number.isFinite(intensity)) {
      throw new ValidationError('effect', `Intensity of ${key} must be a number, got "${intensityText}"`);
    }
    selection.intensity = intensity;
  }

  if (probabilityText !== undefined) {
    const probability = Number(probabilityText);
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      throw new ValidationError('effect', `Probability of ${key} must be between 0 and 1, got "${probabilityText}"`);
    }
    selection.probability = probability;
  }

  return { key, selection };
}

/**
 * Parse several specs. A later spec for the same key replaces the earlier one.
 */
export function parseEffectSpecs(specs: readonly string[]): EffectSelections {
  const selections: EffectSelections = {};
  for (const spec of specs) {
    const { key, selection } = parseEffectSpec(spec);
    selections[key] = selection;
  }
  return selections;
}

/**
 * Processing Types
 */

import type { AssetPools } from './assets/pools.js';
import type { EffectKey } from './effects/catalog.js';

/** Caller's choice for one effect */
export interface EffectSelection {
  enabled: boolean;
  probability?: number;  // 0..1, default 1
  intensity?: number;    // clamped per effect, default = descriptor default
}

export type EffectSelections = Partial<Record<EffectKey, EffectSelection>>;

/**
 * Builder output. Templates use {0v}/{0a} for the primary input and
 * {1v}/{1a}, {2v}/{2a}, ... for this fragment's own extraInputs (1-based).
 */
export interface EffectFragment {
  extraInputs: string[];
  graphFragments: string[];
}

export interface AppliedEffect {
  key: EffectKey;
  intensity: number;
  firstSlot: number;
  inputs: string[];
}

export interface CompiledPlan {
  primaryInput: string;
  orderedExtraInputs: string[];
  graphDescription: string;
  applied: AppliedEffect[];
}

export interface GenerationRequest {
  source: string;
  overlay?: string;
  effects: EffectSelections;
  assets: AssetPools;
}

/**
 * @ytp-forge/processing
 * 
 * Effect compilation and encoder execution.
 * 
 * RULES:
 * - Slot i >= 1 is the i-th extra input passed with -i
 * - Catalog order is compilation order
 * - Every encoder run is validated, streamed and logged
 */

// Types
export type {
  EffectSelection,
  EffectSelections,
  EffectFragment,
  AppliedEffect,
  CompiledPlan,
  GenerationRequest,
} from './types.js';

// Randomness
export { defaultRandom, createSeededRandom, type RandomSource } from './random.js';

// Assets
export {
  POOL_NAMES,
  MEDIA_EXTENSIONS,
  POOL_MEDIA_KINDS,
  isPoolName,
  type PoolName,
  type AssetPools,
  type MediaKind,
} from './assets/pools.js';
export { chooseAsset } from './assets/selector.js';
export { scanAssetDirectory, scanAssetPools, poolDirectories } from './assets/scanner.js';

// Effect Catalog
export {
  EFFECT_CATALOG,
  EFFECT_KEYS,
  isEffectKey,
  getDescriptor,
  clampIntensity,
  type EffectDescriptor,
  type EffectKey,
} from './effects/catalog.js';
export {
  EFFECT_BUILDERS,
  NOOP_GRAPH_FRAGMENTS,
  buildFragment,
  noopFragment,
  type BuildContext,
  type EffectBuilder,
} from './effects/builders.js';
export { decomposeTempo, formatNumber } from './effects/tempo.js';

// Fragment Compiler
export {
  compileEffects,
  resolvePlaceholders,
  independentComposer,
  FRAGMENT_SEPARATOR,
  GLOBAL_NOOP_GRAPH,
  VIDEO_OUTPUT_LABEL,
  AUDIO_OUTPUT_LABEL,
  type GraphComposer,
  type ResolvedFragment,
  type CompileOptions,
} from './compiler.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  buildArguments,
  formatCommandLine,
  type GenerationMode,
  type InputOptions,
  type OutputOptions,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// Encoding Presets
export { PRESETS, getPreset, type EncodingPreset, type PresetKind } from './presets.js';

// Process Runner
export {
  ProcessRunner,
  normalizeExitCode,
  type CommandRunner,
  type LineSink,
  type RunRequest,
  type SpawnFunction,
  type SpawnedProcess,
  type ProcessRunnerOptions,
} from './runner.js';

// Generator
export {
  EffectGenerator,
  PREVIEW_DIR_PREFIX,
  PREVIEW_FILE_NAME,
  type GeneratorOptions,
} from './generator.js';

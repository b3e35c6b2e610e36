/**
 * Batch Yield Model
 *
 * Converts tea-base ml into brew batches, leaf grams and vendor bags:
 *   batches_needed  = tea_ml_total / batch_yield_ml
 *   leaf_grams_used = batches_needed × leaf_grams_per_batch
 *   bags_used       = leaf_grams_used / bag_grams
 *
 * Values stay fractional; rounding is left to whoever presents them.
 * A zero, negative or missing constant is a configuration error, never a
 * silent zero.
 *
 * Brewed yield itself (no-squeeze, leaves drained but not pressed):
 *   yield_ml = hot_water_ml + ice_grams − leaf_grams × absorb_ml_per_g − process_loss_ml
 */

import { ConfigurationError, ErrorCode, type BatchConstants } from "@teabase/contracts";

export type BatchYieldInput = {
  teaMlTotal: number;
  batchYieldMl: number | null | undefined;
  leafGramsPerBatch: number | null | undefined;
  bagGrams: number | null | undefined;
};

export type BatchYieldRecord = {
  teaMlTotal: number;
  batchYieldMl: number;
  leafGramsPerBatch: number;
  bagGrams: number;
  batchesNeeded: number;
  leafGramsUsed: number;
  bagsUsed: number;
};

export type BrewProfile = {
  absorbMlPerG: number;
  defaultLeafGrams: number;
};

/** ml of water retained per gram of leaf, drained without squeezing. */
export const BREW_PROFILES: Record<string, BrewProfile> = {
  four_seasons: { absorbMlPerG: 3.2, defaultLeafGrams: 160 },
  green_tea: { absorbMlPerG: 3.0, defaultLeafGrams: 160 },
  tie_guan_yin: { absorbMlPerG: 3.8, defaultLeafGrams: 160 },
  matured_black: { absorbMlPerG: 2.7, defaultLeafGrams: 140 },
  buckwheat: { absorbMlPerG: 2.4, defaultLeafGrams: 120 },
  barley: { absorbMlPerG: 2.8, defaultLeafGrams: 240 },
  toasted_rice: { absorbMlPerG: 2.8, defaultLeafGrams: 120 },
};

/** Blend component -> brew batch key. Empty string: not brewed in batches (matcha). */
export const TEA_COMPONENT_TO_BATCH_KEY: Record<string, string> = {
  tie_guan_yin: "tie_guan_yin",
  four_seasons: "four_seasons",
  green: "green_tea",
  genmai: "genmai",
  black: "matured_black",
  buckwheat_barley: "buckwheat",
  matcha: "",
};

export const DEFAULT_BATCH_YIELD_ML = 800;

function requirePositive(name: string, value: number | null | undefined): number {
  if (value === null || value === undefined) {
    throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `${name} is required`);
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `${name} must be a positive number, got ${value}`);
  }
  return value;
}

export function computeBatchYield(input: BatchYieldInput): BatchYieldRecord {
  const batchYieldMl = requirePositive("batch_yield_ml", input.batchYieldMl);
  const leafGramsPerBatch = requirePositive("leaf_grams_per_batch", input.leafGramsPerBatch);
  const bagGrams = requirePositive("bag_grams", input.bagGrams);
  if (!Number.isFinite(input.teaMlTotal) || input.teaMlTotal < 0) {
    throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `tea_ml_total must be non-negative, got ${input.teaMlTotal}`);
  }

  const batchesNeeded = input.teaMlTotal / batchYieldMl;
  const leafGramsUsed = batchesNeeded * leafGramsPerBatch;
  return {
    teaMlTotal: input.teaMlTotal,
    batchYieldMl,
    leafGramsPerBatch,
    bagGrams,
    batchesNeeded,
    leafGramsUsed,
    bagsUsed: leafGramsUsed / bagGrams,
  };
}

export function batchYieldFor(teaMlTotal: number, constants: BatchConstants): BatchYieldRecord {
  return computeBatchYield({
    teaMlTotal,
    batchYieldMl: constants.batchYieldMl,
    leafGramsPerBatch: constants.leafGramsPerBatch,
    bagGrams: constants.bagGrams,
  });
}

export type BrewYieldOptions = {
  leafGrams?: number;
  hotWaterMl?: number;
  iceGrams?: number;
  processLossMl?: number;
};

export type BrewYieldEstimate = {
  teaKey: string;
  leafGrams: number;
  absorbMlPerG: number;
  absorbedMl: number;
  yieldMl: number;
};

export function estimateBrewYieldMl(teaKey: string, options: BrewYieldOptions = {}): BrewYieldEstimate {
  const profile = BREW_PROFILES[teaKey];
  if (!profile) {
    throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `Unknown tea key for brew yield: ${teaKey}`);
  }
  const leafGrams = options.leafGrams ?? profile.defaultLeafGrams;
  const hotWaterMl = options.hotWaterMl ?? 4200;
  const iceGrams = options.iceGrams ?? 2800;
  const processLossMl = options.processLossMl ?? 0;

  for (const [name, value] of Object.entries({ leafGrams, hotWaterMl, iceGrams, processLossMl })) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `${name} must be non-negative, got ${value}`);
    }
  }

  const absorbedMl = leafGrams * profile.absorbMlPerG;
  return {
    teaKey,
    leafGrams,
    absorbMlPerG: profile.absorbMlPerG,
    absorbedMl,
    yieldMl: hotWaterMl + iceGrams - absorbedMl - processLossMl,
  };
}

/** Batch yield for a blend component; unmapped components use the 800 ml default. */
export function batchYieldMlForComponent(component: string, yieldsByBatchKey: Record<string, number>): number {
  const batchKey = TEA_COMPONENT_TO_BATCH_KEY[component] ?? "";
  return (batchKey ? yieldsByBatchKey[batchKey] : undefined) ?? DEFAULT_BATCH_YIELD_ML;
}

/**
 * Fills every mapped batch key that has a brew profile but no configured
 * yield with the brew-model estimate. Configured yields are kept as-is.
 */
export function withBrewYieldEstimates(yieldsByBatchKey: Record<string, number>): Record<string, number> {
  const filled: Record<string, number> = { ...yieldsByBatchKey };
  for (const batchKey of Object.values(TEA_COMPONENT_TO_BATCH_KEY)) {
    if (!batchKey || filled[batchKey] !== undefined || !BREW_PROFILES[batchKey]) continue;
    filled[batchKey] = estimateBrewYieldMl(batchKey).yieldMl;
  }
  return filled;
}

import {
  isExcludedResolution,
  type IceBucketMeans,
  type IceFallback,
  type IcePct,
  type RecipeOverride
} from "@teabase/contracts";
import { ZERO_ICE_BASE_ML, assignIceBucket } from "./ice-buckets.js";
import type { RecipeTable } from "./recipe-table.js";
import { roundHalfUp } from "./rounding.js";
import type { ComponentUsage, ExplodedDrinkRow, UsageEstimate, UsageRow, VolumeSource } from "./types.js";

export type UsageEstimatorOptions = {
  iceBucketMeans: IceBucketMeans;
  iceFallback: IceFallback;
  defaultIcePct: IcePct;
  zeroIceBaseMl?: number;
};

/** Volume multiplier by distinct topping count; saturates at two toppings. */
const TOPPING_FACTORS = [1, 0.9, 0.8] as const;

export function toppingFactor(toppingCount: number): number {
  const steps = Math.min(Math.max(Math.floor(toppingCount), 0), TOPPING_FACTORS.length - 1);
  return TOPPING_FACTORS[steps] ?? 1;
}

/**
 * Milk share from a recipe that lists both flat tea and milk volumes:
 *   milk_ml / (tea_base_ml + milk_ml)
 */
export function recipeMilkRatio(recipe: RecipeOverride | undefined): number | null {
  if (!recipe || recipe.milkMl === null || recipe.milkMl <= 0) return null;
  if (recipe.teaBaseMl === null || recipe.teaBaseMl <= 0) return null;
  return recipe.milkMl / (recipe.teaBaseMl + recipe.milkMl);
}

/**
 * Estimate tea-base (and milk) ml for one physical drink.
 *
 * 1. A recipe forcing "100% ice" / "no ice" supplies flat volumes directly.
 * 2. Otherwise the ice bucket picks a base: recipe per-bucket override, else
 *    550 ml at 0% ice, else the calibrated bucket mean.
 * 3. Toppings take 10% each off the base, capped at 20%.
 * 4. Milk drinks split the result by their milk ratio.
 * 5. The rounded tea estimate is spread over the resolved blend.
 *
 * Lines whose tea resolution is conflict / missing_choice / unknown are not
 * estimated; they come back as exclusions.
 */
export function estimateUsage(
  row: ExplodedDrinkRow,
  recipes: RecipeTable,
  options: UsageEstimatorOptions
): UsageEstimate {
  if (isExcludedResolution(row.teaResolution)) {
    return { ok: false, lineItemId: row.lineItemId, reason: row.teaResolution };
  }

  const match = recipes.lookup(row.itemName, row.category, row.icePct);
  const recipe = match?.recipe;

  let iceBucket: IcePct;
  let iceImputed = false;
  let baseTeaMl: number;
  let volumeSource: VolumeSource;
  let toppingReduction = 0;
  let teaMlRaw: number;
  let milkMlRaw: number | null;

  if (recipe?.kind === "forced_ice") {
    iceBucket = recipe.bucket === "no ice" ? 0 : 100;
    baseTeaMl = recipe.teaBaseMl;
    volumeSource = "forced_recipe";
    teaMlRaw = recipe.teaBaseMl;
    milkMlRaw = recipe.milkMl;
  } else {
    const icePct = row.icePct === "no ice" ? 0 : row.icePct === "100% ice" ? 100 : row.icePct;
    const assignment = assignIceBucket(icePct, options.iceBucketMeans, options.iceFallback, options.defaultIcePct);
    iceBucket = assignment.bucket;
    iceImputed = assignment.imputed;

    const pinned = recipe?.bucketTeaBaseMl[iceBucket];
    if (pinned !== undefined) {
      baseTeaMl = pinned;
      volumeSource = "recipe_bucket";
    } else if (iceBucket === 0) {
      baseTeaMl = options.zeroIceBaseMl ?? ZERO_ICE_BASE_ML;
      volumeSource = "zero_ice_default";
    } else {
      baseTeaMl = options.iceBucketMeans[iceBucket] ?? 0;
      volumeSource = "bucket_mean";
    }

    const factor = toppingFactor(row.toppings.length);
    toppingReduction = Math.round((1 - factor) * 100) / 100;
    const totalMl = baseTeaMl * factor;

    const milkRatio = row.milkRatio ?? recipeMilkRatio(recipe);
    if (milkRatio !== null) {
      teaMlRaw = totalMl * (1 - milkRatio);
      milkMlRaw = totalMl * milkRatio;
    } else {
      teaMlRaw = totalMl;
      milkMlRaw = null;
    }
  }

  const teaBaseMlEst = roundHalfUp(teaMlRaw);
  const components: ComponentUsage[] = Object.entries(row.resolvedBlend).map(([component, share]) => ({
    component,
    share,
    ml: teaBaseMlEst * share
  }));

  return {
    ok: true,
    usage: {
      lineItemId: row.lineItemId,
      date: row.date,
      orderId: row.orderId,
      itemName: row.itemName,
      category: row.category,
      icePct: row.icePct,
      iceBucket,
      iceImputed,
      sugarPct: row.sugarPct,
      toppingCount: row.toppings.length,
      volumeSource,
      baseTeaMl,
      toppingReduction,
      teaBaseMlEst,
      milkMlEst: milkMlRaw === null ? null : roundHalfUp(milkMlRaw),
      teaResolution: row.teaResolution,
      components
    }
  };
}

export type UsageEstimation = {
  usage: UsageRow[];
  excluded: Array<Extract<UsageEstimate, { ok: false }>>;
};

export function estimateAll(
  rows: ExplodedDrinkRow[],
  recipes: RecipeTable,
  options: UsageEstimatorOptions
): UsageEstimation {
  const usage: UsageRow[] = [];
  const excluded: UsageEstimation["excluded"] = [];
  for (const row of rows) {
    const estimate = estimateUsage(row, recipes, options);
    if (estimate.ok) usage.push(estimate.usage);
    else excluded.push(estimate);
  }
  return { usage, excluded };
}

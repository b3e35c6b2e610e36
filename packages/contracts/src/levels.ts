export const icePctLevels = [0, 25, 50, 75, 100] as const;

export const sugarPctLevels = [0, 25, 50, 75, 100] as const;

export type IcePct = (typeof icePctLevels)[number];
export type SugarPct = (typeof sugarPctLevels)[number];

/** Ice buckets a recipe can force regardless of what the customer picked. */
export const forcedIceBuckets = ["100% ice", "no ice"] as const;
export type ForcedIceBucket = (typeof forcedIceBuckets)[number];

export const recipeIceValues = ["ice (per ice level)", ...forcedIceBuckets] as const;
export type RecipeIceValue = (typeof recipeIceValues)[number];

export const tokenKinds = ["ice", "sugar", "topping", "tea_override", "unknown"] as const;
export type TokenKind = (typeof tokenKinds)[number];

export const teaResolutions = ["blend_default", "override", "missing_choice", "conflict", "unknown"] as const;
export type TeaResolution = (typeof teaResolutions)[number];

/** Lines with these statuses carry no usable blend and stay out of volume totals. */
export const excludedResolutions = ["conflict", "missing_choice", "unknown"] as const satisfies readonly TeaResolution[];
export type ExcludedResolution = (typeof excludedResolutions)[number];

export function isIcePct(value: number): value is IcePct {
  return icePctLevels.some((level) => level === value);
}

export function isSugarPct(value: number): value is SugarPct {
  return sugarPctLevels.some((level) => level === value);
}

export function isExcludedResolution(value: TeaResolution): value is ExcludedResolution {
  return excludedResolutions.some((status) => status === value);
}

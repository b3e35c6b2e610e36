import type { CanonicalLineItem, ExplodedDrinkRow } from "./types.js";

export const DEFAULT_JELLY_TOPPING_KEYS = ["osmanthus_tgy_jelly", "tea_jelly", "tgy_jelly"] as const;

/** Brewed tea that goes into one scoop of tea jelly. */
export const DEFAULT_ML_PER_SCOOP = 87;

export type TeaJellyOptions = {
  mlPerScoop?: number;
  toppingKeys?: readonly string[];
};

export type TeaJellySummary = {
  lineItems: number;
  drinksWithTeaJelly: number;
  totalScoops: number;
  avgScoopsPerDrink: number;
  avgScoopsPerJellyDrink: number;
  mlPerScoop: number;
  totalTeaMlFromJelly: number;
  avgTeaMlFromJellyPerDrink: number;
};

/** Scoops in one drink: jelly toppings plus jelly the menu puts in by default. */
export function jellyScoops(
  item: Pick<CanonicalLineItem, "toppingUnits" | "defaultComponents">,
  toppingKeys: readonly string[]
): number {
  let scoops = 0;
  for (const key of toppingKeys) scoops += (item.toppingUnits[key] ?? 0) + (item.defaultComponents[key] ?? 0);
  return scoops;
}

/** Tea consumed through jelly, one row per physical drink. */
export function summarizeTeaJelly(drinks: ExplodedDrinkRow[], options: TeaJellyOptions = {}): TeaJellySummary {
  const mlPerScoop = options.mlPerScoop ?? DEFAULT_ML_PER_SCOOP;
  const toppingKeys = options.toppingKeys ?? DEFAULT_JELLY_TOPPING_KEYS;

  let drinksWithTeaJelly = 0;
  let totalScoops = 0;
  for (const drink of drinks) {
    const scoops = jellyScoops(drink, toppingKeys);
    if (scoops > 0) drinksWithTeaJelly += 1;
    totalScoops += scoops;
  }

  const lineItems = drinks.length;
  const totalTeaMlFromJelly = totalScoops * mlPerScoop;
  return {
    lineItems,
    drinksWithTeaJelly,
    totalScoops,
    avgScoopsPerDrink: lineItems ? totalScoops / lineItems : 0,
    avgScoopsPerJellyDrink: drinksWithTeaJelly ? totalScoops / drinksWithTeaJelly : 0,
    mlPerScoop,
    totalTeaMlFromJelly,
    avgTeaMlFromJellyPerDrink: lineItems ? totalTeaMlFromJelly / lineItems : 0,
  };
}

import type { Blend } from "@teabase/contracts";
import type {
  DailyComponentUsage,
  MonthCoverage,
  MonthlyBatchUsage,
  MonthWeekdayUsage,
  WeekdayBatchNeed,
} from "./aggregator.js";
import { formatBlend } from "./blend.js";
import { round2 } from "./rounding.js";
import type { CanonicalLineItem, UsageRow } from "./types.js";

/** One flat record per output CSV line. */
export type OutputCell = string | number | boolean | null;
export type OutputRow = Record<string, OutputCell>;

export type ToppingMultiplierClass = "none" | "single" | "double";

/** A single full-weight tea prints as its bare name; blends as "a:0.25|b:0.75". */
export function teaBaseLabel(blend: Blend): string {
  const entries = Object.entries(blend);
  const [only] = entries;
  if (entries.length === 1 && only && only[1] === 1) return only[0];
  return formatBlend(blend);
}

export function toppingMultiplierClass(toppingTypes: number): ToppingMultiplierClass {
  if (toppingTypes <= 0) return "none";
  return toppingTypes === 1 ? "single" : "double";
}

function toppingColumns(item: CanonicalLineItem): OutputRow {
  const units = Object.values(item.toppingUnits);
  return {
    has_topping: item.toppings.length > 0,
    has_multiple_toppings: item.toppings.length > 1,
    toppings_list: item.toppings.join("|"),
    toppings_qty: item.toppings.map((name) => `${name}:${item.toppingUnits[name] ?? 0}`).join("|"),
    topping_types_count: item.toppings.length,
    topping_units_total: units.reduce((sum, n) => sum + n, 0),
    max_single_topping_qty: units.length > 0 ? Math.max(...units) : 0,
    topping_multiplier_class: toppingMultiplierClass(item.toppings.length),
  };
}

/** Analysis view of a canonical line. */
export function canonicalSlimRow(item: CanonicalLineItem): OutputRow {
  return {
    Date: item.date,
    Category: item.category,
    Item: item.itemName,
    Qty: item.quantity,
    "Modifiers Applied": item.modifiers,
    ice_pct: item.icePct,
    sugar_pct: item.sugarPct,
    ...toppingColumns(item),
    category_key: item.categoryKey,
    item_key: item.itemKey,
    tea_base_final: teaBaseLabel(item.resolvedBlend),
    tea_resolution: item.teaResolution,
  };
}

/** Slim columns plus every intermediate the resolution used. */
export function canonicalDebugRow(item: CanonicalLineItem): OutputRow {
  return {
    row_number: item.rowNumber,
    order_id: item.orderId,
    Time: item.time,
    ...canonicalSlimRow(item),
    ice_source: item.iceSource,
    default_components_list: Object.keys(item.defaultComponents).join("|"),
    default_components_qty: Object.entries(item.defaultComponents)
      .map(([name, units]) => `${name}:${units}`)
      .join("|"),
    tea_blend: formatBlend(item.menuBlend),
    tea_base_override: item.teaOverride,
    tea_override_choices: item.teaOverrideChoices.join("|"),
    requires_tea_choice: item.requiresTeaChoice ? 1 : 0,
    unknown_tokens: item.unknownTokens.join("|"),
    drinks_per_item: item.drinksPerItem,
    milk_ratio: item.milkRatio,
  };
}

export function usageLineRow(row: UsageRow): OutputRow {
  return {
    line_item_id: row.lineItemId,
    Date: row.date,
    order_id: row.orderId,
    Item: row.itemName,
    Category: row.category,
    ice_pct: row.icePct,
    ice_bucket: row.iceBucket,
    ice_imputed: row.iceImputed,
    sugar_pct: row.sugarPct,
    topping_count: row.toppingCount,
    volume_source: row.volumeSource,
    base_tea_ml: row.baseTeaMl,
    topping_reduction: row.toppingReduction,
    tea_base_ml_est: row.teaBaseMlEst,
    milk_ml_est: row.milkMlEst,
    tea_resolution: row.teaResolution,
    tea_components: row.components.map((c) => `${c.component}:${c.share}`).join("|"),
  };
}

export function usageComponentRows(row: UsageRow): OutputRow[] {
  return row.components.map((c) => ({
    line_item_id: row.lineItemId,
    Date: row.date,
    Item: row.itemName,
    component: c.component,
    share: c.share,
    tea_ml: c.ml,
  }));
}

export function dailyUsageRow(row: DailyComponentUsage): OutputRow {
  return { Date: row.date, component: row.component, drink_count: row.drinkCount, tea_ml_total: row.mlTotal };
}

export function weekdayBatchRow(row: WeekdayBatchNeed): OutputRow {
  return {
    component: row.component,
    weekday: row.weekday,
    days: row.days,
    avg_tea_ml_total: round2(row.avgMlTotal),
    avg_drink_count: round2(row.avgDrinkCount),
    batch_yield_ml: row.batchYieldMl,
    avg_batches_needed: round2(row.avgBatchesNeeded),
  };
}

export function monthWeekdayRow(row: MonthWeekdayUsage): OutputRow {
  return {
    month: row.month,
    component: row.component,
    weekday: row.weekday,
    days: row.days,
    avg_tea_ml_total: round2(row.avgMlTotal),
    avg_drink_count: round2(row.avgDrinkCount),
  };
}

export function monthlyBatchRow(row: MonthlyBatchUsage): OutputRow {
  return {
    month: row.month,
    component: row.component,
    days_covered: row.daysCovered,
    days_in_month: row.daysInMonth,
    tea_ml_total: row.teaMlTotal,
    batch_yield_ml: row.batchYieldMl,
    leaf_grams_per_batch: row.leafGramsPerBatch,
    bag_grams: row.bagGrams,
    batches_needed: round2(row.batchesNeeded),
    leaf_grams_used: round2(row.leafGramsUsed),
    bags_used: round2(row.bagsUsed),
  };
}

export function monthCoverageRow(row: MonthCoverage): OutputRow {
  return {
    month: row.month,
    days_covered: row.daysCovered,
    days_in_month: row.daysInMonth,
    full_month: row.fullMonth,
  };
}

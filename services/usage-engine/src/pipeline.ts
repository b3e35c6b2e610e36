/**
 * Usage Pipeline
 *
 * One deterministic pass from cleaned POS lines to usage, batch and bag
 * figures:
 *   date filter -> canonicalize -> explode -> estimate -> aggregate -> metrics
 *
 * Every reference table and constant is validated before the first line is
 * touched, so a ConfigurationError always surfaces ahead of any output.
 */

import {
  ConfigurationError,
  ErrorCode,
  usageRunOptionsSchema,
  type RawOrderLine,
  type ReferenceTables,
  type UsageRunOptions,
  type UsageRunOptionsInput,
} from "@teabase/contracts";
import {
  aggregateByMonthWeekday,
  aggregateByWeekday,
  aggregateDaily,
  computeMonthCoverage,
  computeMonthlyBatchUsage,
  computeWeekdayBatchNeeds,
  type DailyComponentUsage,
  type MonthCoverage,
  type MonthlyBatchReport,
  type MonthWeekdayUsage,
  type WeekdayBatchNeed,
} from "./aggregator.js";
import { batchYieldFor, withBrewYieldEstimates } from "./batch-yield.js";
import { canonicalizeLines, explodeLineItems } from "./canonicalizer.js";
import { MenuCatalog } from "./menu-catalog.js";
import { RecipeTable } from "./recipe-table.js";
import { summarizeTeaJelly, type TeaJellySummary } from "./tea-jelly.js";
import { TokenResolver } from "./token-resolver.js";
import type { CanonicalLineItem, ExplodedDrinkRow } from "./types.js";
import type { UnknownTokenAudit } from "./unknown-token-audit.js";
import { estimateAll, type UsageEstimation } from "./usage-estimator.js";
import { computeValidationMetrics, type ValidationMetrics } from "./validation-metrics.js";

export type UsagePipelineResult = {
  options: UsageRunOptions;
  canonical: CanonicalLineItem[];
  drinks: ExplodedDrinkRow[];
  estimation: UsageEstimation;
  unknownTokens: UnknownTokenAudit;
  daily: DailyComponentUsage[];
  weekday: WeekdayBatchNeed[];
  monthWeekday: MonthWeekdayUsage[];
  monthCoverage: MonthCoverage[];
  monthlyBatches: MonthlyBatchReport;
  teaJelly: TeaJellySummary;
  metrics: ValidationMetrics;
};

export function parseRunOptions(input: UsageRunOptionsInput = {}): UsageRunOptions {
  const parsed = usageRunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      table: "run_options",
      rowNumber: null,
      message: `${issue.path.join(".") || "options"}: ${issue.message}`,
    }));
    const code = issues.some((i) => i.message.startsWith("startDate") || i.message.startsWith("endDate"))
      ? ErrorCode.INVALID_DATE_RANGE
      : ErrorCode.INVALID_CONSTANT;
    throw new ConfigurationError(code, "Invalid run options", issues);
  }
  return parsed.data;
}

/** Inclusive on both ends; either bound may be omitted. */
export function filterByDateRange<T extends { date: string }>(rows: T[], startDate?: string, endDate?: string): T[] {
  return rows.filter((row) => (!startDate || row.date >= startDate) && (!endDate || row.date <= endDate));
}

export function runUsagePipeline(
  lines: RawOrderLine[],
  reference: ReferenceTables,
  input: UsageRunOptionsInput = {}
): UsagePipelineResult {
  const options = parseRunOptions(input);
  const resolver = new TokenResolver(reference.tokenRules);
  const menu = new MenuCatalog(reference.menu, reference.namedBlends);
  const recipes = new RecipeTable(reference.recipes);
  for (const constants of reference.batchConstants) batchYieldFor(0, constants);

  const selected = filterByDateRange(lines, options.startDate, options.endDate);
  const observedDates = [...new Set(selected.map((line) => line.date))].sort();

  const { items: canonical, unknownTokens } = canonicalizeLines(selected, { resolver, menu, recipes });
  const drinks = explodeLineItems(canonical);
  const estimation = estimateAll(drinks, recipes, {
    iceBucketMeans: reference.iceBucketMeans,
    iceFallback: options.iceFallback,
    defaultIcePct: options.defaultIcePct,
    zeroIceBaseMl: options.zeroIceBaseMl,
  });

  const daily = aggregateDaily(estimation.usage);
  const configuredYields: Record<string, number> = {};
  for (const constants of reference.batchConstants) {
    configuredYields[constants.batchKey] = constants.batchYieldMl;
  }
  const yieldsByBatchKey = withBrewYieldEstimates(configuredYields);

  return {
    options,
    canonical,
    drinks,
    estimation,
    unknownTokens,
    daily,
    weekday: computeWeekdayBatchNeeds(aggregateByWeekday(daily, observedDates), yieldsByBatchKey),
    monthWeekday: aggregateByMonthWeekday(daily, observedDates),
    monthCoverage: computeMonthCoverage(observedDates),
    monthlyBatches: computeMonthlyBatchUsage(daily, observedDates, reference.batchConstants),
    teaJelly: summarizeTeaJelly(drinks),
    metrics: computeValidationMetrics(canonical, estimation, unknownTokens),
  };
}

import { isExcludedResolution, type ExcludedResolution, type TeaResolution } from "@teabase/contracts";
import type { CanonicalLineItem } from "./types.js";
import type { UnknownTokenAudit } from "./unknown-token-audit.js";
import type { UsageEstimation } from "./usage-estimator.js";

export type ValidationMetrics = {
  lineCount: number;
  drinkCount: number;
  resolutionCounts: Record<TeaResolution, number>;
  unknownTokenDistinct: number;
  unknownTokenOccurrences: number;
  /** Canonical lines whose resolution keeps them out of usage totals. */
  excludedLineCount: number;
  excludedDrinkCount: number;
  excludedByReason: Record<ExcludedResolution, number>;
  /** Drinks whose ice bucket was assumed rather than read from a modifier. */
  imputedIceCount: number;
  /** Canonical lines that defaulted to 0% ice because the category is hot. */
  hotDefaultIceCount: number;
  linesWithToppings: number;
};

export function computeValidationMetrics(
  items: CanonicalLineItem[],
  estimation: UsageEstimation,
  audit: UnknownTokenAudit
): ValidationMetrics {
  const resolutionCounts: Record<TeaResolution, number> = {
    blend_default: 0,
    override: 0,
    missing_choice: 0,
    conflict: 0,
    unknown: 0,
  };
  const excludedByReason: Record<ExcludedResolution, number> = { conflict: 0, missing_choice: 0, unknown: 0 };
  let excludedLineCount = 0;
  let hotDefaultIceCount = 0;
  let linesWithToppings = 0;

  for (const item of items) {
    resolutionCounts[item.teaResolution] += 1;
    if (isExcludedResolution(item.teaResolution)) excludedLineCount += 1;
    if (item.iceSource === "hot_default") hotDefaultIceCount += 1;
    if (item.toppings.length > 0) linesWithToppings += 1;
  }

  for (const excluded of estimation.excluded) {
    excludedByReason[excluded.reason] += 1;
  }

  return {
    lineCount: items.length,
    drinkCount: estimation.usage.length + estimation.excluded.length,
    resolutionCounts,
    unknownTokenDistinct: audit.distinctCount,
    unknownTokenOccurrences: audit.occurrenceCount,
    excludedLineCount,
    excludedDrinkCount: estimation.excluded.length,
    excludedByReason,
    imputedIceCount: estimation.usage.filter((row) => row.iceImputed).length,
    hotDefaultIceCount,
    linesWithToppings,
  };
}

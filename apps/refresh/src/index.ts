import path from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigurationError, formatIssues, type RawOrderLine } from "@teabase/contracts";
import { loadReferenceTables, parsePosExport, writeCsv, type PosCleanStats } from "@teabase/importers";
import {
  canonicalDebugRow,
  canonicalSlimRow,
  dailyUsageRow,
  monthCoverageRow,
  monthlyBatchRow,
  monthWeekdayRow,
  runUsagePipeline,
  usageComponentRows,
  usageLineRow,
  weekdayBatchRow,
  type OutputRow,
  type UsagePipelineResult,
  type ValidationMetrics
} from "@teabase/usage-engine";
import { bootstrapEnv, loadConfig, type RefreshConfig } from "./config.js";

export const OUTPUT_FILES = {
  clean: "clean.csv",
  canonical: "canonicalized_line_items.csv",
  canonicalDebug: "canonicalized_debug.csv",
  usageLines: "usage_line_items.csv",
  usageComponents: "usage_components.csv",
  daily: "usage_daily.csv",
  weekday: "usage_weekday_with_batch_yield.csv",
  monthWeekday: "usage_monthly_weekday_summary.csv",
  monthlyBags: "monthly_bag_usage.csv",
  monthCoverage: "month_coverage.csv",
  unknownTokens: "unknown_tokens.csv",
  teaJelly: "tea_jelly_usage_summary.csv",
  validation: "usage_validation.csv"
} as const;

export type RefreshSummary = {
  outputDir: string;
  written: string[];
  stats: PosCleanStats;
  metrics: ValidationMetrics;
};

function cleanRow(line: RawOrderLine): OutputRow {
  return {
    row_number: line.rowNumber,
    order_id: line.orderId,
    Date: line.date,
    Time: line.time,
    Category: line.category,
    Item: line.itemName,
    Qty: line.quantity,
    "Modifiers Applied": line.modifiers
  };
}

function validationRows(stats: PosCleanStats, metrics: ValidationMetrics): OutputRow[] {
  const rows: OutputRow[] = [
    { metric: "source_rows", value: stats.sourceRows },
    { metric: "payment_rows", value: stats.paymentRows },
    { metric: "refund_rows", value: stats.refundRows },
    { metric: "refund_qty", value: stats.refundQty },
    { metric: "reward_rows", value: stats.rewardRows },
    { metric: "fixed_ice_rows", value: stats.fixedIceRows },
    { metric: "invalid_rows", value: stats.invalidRows },
    { metric: "line_count", value: metrics.lineCount },
    { metric: "drink_count", value: metrics.drinkCount }
  ];
  for (const [resolution, count] of Object.entries(metrics.resolutionCounts)) {
    rows.push({ metric: `tea_resolution_${resolution}`, value: count });
  }
  rows.push(
    { metric: "unknown_token_distinct", value: metrics.unknownTokenDistinct },
    { metric: "unknown_token_occurrences", value: metrics.unknownTokenOccurrences },
    { metric: "excluded_line_count", value: metrics.excludedLineCount },
    { metric: "excluded_drink_count", value: metrics.excludedDrinkCount }
  );
  for (const [reason, count] of Object.entries(metrics.excludedByReason)) {
    rows.push({ metric: `excluded_${reason}`, value: count });
  }
  rows.push(
    { metric: "imputed_ice_count", value: metrics.imputedIceCount },
    { metric: "hot_default_ice_count", value: metrics.hotDefaultIceCount },
    { metric: "lines_with_toppings", value: metrics.linesWithToppings }
  );
  return rows;
}

function outputTables(
  lines: RawOrderLine[],
  result: UsagePipelineResult,
  stats: PosCleanStats
): Array<[keyof typeof OUTPUT_FILES, OutputRow[], string[]]> {
  return [
    ["clean", lines.map(cleanRow), []],
    ["canonical", result.canonical.map(canonicalSlimRow), []],
    ["canonicalDebug", result.canonical.map(canonicalDebugRow), []],
    ["usageLines", result.estimation.usage.map(usageLineRow), []],
    ["usageComponents", result.estimation.usage.flatMap(usageComponentRows), []],
    ["daily", result.daily.map(dailyUsageRow), []],
    ["weekday", result.weekday.map(weekdayBatchRow), []],
    ["monthWeekday", result.monthWeekday.map(monthWeekdayRow), []],
    [
      "monthlyBags",
      result.monthlyBatches.records.map(monthlyBatchRow),
      [
        "month",
        "component",
        "days_covered",
        "days_in_month",
        "tea_ml_total",
        "batch_yield_ml",
        "leaf_grams_per_batch",
        "bag_grams",
        "batches_needed",
        "leaf_grams_used",
        "bags_used"
      ]
    ],
    ["monthCoverage", result.monthCoverage.map(monthCoverageRow), []],
    ["unknownTokens", result.unknownTokens.toReport(), ["token", "count"]],
    ["teaJelly", [result.teaJelly], []],
    ["validation", validationRows(stats, result.metrics), []]
  ];
}

/**
 * Load, estimate, then write every report. Configuration errors are thrown
 * from the loaders or the pipeline before the first file is written.
 */
export function runRefresh(config: RefreshConfig): RefreshSummary {
  const reference = loadReferenceTables(config.referenceDir);
  console.log(
    `reference tables: ${reference.tokenRules.length} token rules, ${reference.menu.length} menu items, ${reference.recipes.length} recipes`
  );

  const pos = parsePosExport(config.rawInput);
  for (const error of pos.errors) {
    console.warn(`skipped ${error.sheet} row ${error.rowNumber ?? "?"} (${error.code}): ${error.message}`);
  }
  console.log(
    `pos export: ${pos.stats.sourceRows} rows, kept ${pos.stats.keptRows}, refunds ${pos.stats.refundRows}, rewards ${pos.stats.rewardRows}`
  );

  const result = runUsagePipeline(pos.lines, reference, config.runOptions);
  for (const month of result.monthlyBatches.partialMonths) {
    console.warn(`partial month ${month.month}: ${month.daysCovered}/${month.daysInMonth} days, no bag usage reported`);
  }

  const written: string[] = [];
  for (const [name, rows, header] of outputTables(pos.lines, result, pos.stats)) {
    const file = path.join(config.outputDir, OUTPUT_FILES[name]);
    writeCsv(file, rows, header.length > 0 ? header : undefined);
    written.push(file);
  }
  console.log(`wrote ${written.length} files to ${config.outputDir}`);

  return { outputDir: config.outputDir, written, stats: pos.stats, metrics: result.metrics };
}

function main() {
  bootstrapEnv();
  try {
    runRefresh(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.code}: ${error.message}`);
      if (error.issues.length > 0 && !error.message.includes("\n")) console.error(formatIssues(error.issues));
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main();
}

import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";
import {
  ConfigurationError,
  ErrorCode,
  batchConstantsRowSchema,
  blendRuleRowSchema,
  defaultComponentRowSchema,
  formatIssues,
  iceBucketMeanRowSchema,
  isIcePct,
  itemRuleRowSchema,
  manualSampleRowSchema,
  menuKey,
  namedBlendRowSchema,
  normKey,
  recipeOverrideRowSchema,
  tokenMapRowSchema,
  type BatchConstants,
  type Blend,
  type ConfigurationIssue,
  type ErrorCodeType,
  type IceBucketMeans,
  type IcePct,
  type MenuItem,
  type RecipeOverride,
  type RecipeOverrideRow,
  type ReferenceTables,
  type TokenRule
} from "@teabase/contracts";
import {
  TEA_COMPONENT_TO_BATCH_KEY,
  TEA_VALUE_ALIASES,
  blendWeightSum,
  buildLevelTokenRules,
  computeIceBucketMeans,
  formatBlend,
  isNormalizedBlend
} from "@teabase/usage-engine";
import { readSheetRows, type SheetRow } from "./workbook.js";

export const REFERENCE_TABLES = {
  tokenMap: "modifier_token_map",
  itemRules: "item_rules",
  blendRules: "item_blend_rules",
  defaultComponents: "item_default_component",
  namedBlends: "named_blends",
  recipes: "recipe_overrides",
  iceBucketMeans: "ice_bucket_means",
  manualSamples: "manual_samples",
  batchConstants: "batch_constants"
} as const;

/** Default components that are flavouring shots, not toppings. */
const NON_TOPPING_COMPONENT = /syrup|shot/i;

type Parsed<T> = { rowNumber: number; data: T };

class IssueCollector {
  readonly issues: ConfigurationIssue[] = [];
  private readonly codes = new Set<ErrorCodeType>();

  add(code: ErrorCodeType, table: string, rowNumber: number | null, message: string): void {
    this.codes.add(code);
    this.issues.push({ table, rowNumber, message });
  }

  get code(): ErrorCodeType {
    if (this.codes.has(ErrorCode.MISSING_REFERENCE_TABLE)) return ErrorCode.MISSING_REFERENCE_TABLE;
    if (this.codes.has(ErrorCode.BLEND_SHARE_SUM)) return ErrorCode.BLEND_SHARE_SUM;
    return ErrorCode.INVALID_REFERENCE_ROW;
  }
}

/** `<table>.csv`, else `<table>.xlsx`, else null. */
function tablePath(dir: string, table: string): string | null {
  for (const ext of [".csv", ".xlsx"]) {
    const candidate = path.join(dir, `${table}${ext}`);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

function readTable(dir: string, table: string, required: boolean, collector: IssueCollector): SheetRow[] | null {
  const file = tablePath(dir, table);
  if (file) return readSheetRows(file);
  if (required) {
    collector.add(ErrorCode.MISSING_REFERENCE_TABLE, table, null, `${table}.csv is required in ${dir}`);
  }
  return null;
}

function parseRows<T extends z.ZodTypeAny>(
  table: string,
  rows: SheetRow[] | null,
  schema: T,
  collector: IssueCollector
): Parsed<z.output<T>>[] {
  const parsedRows: Parsed<z.output<T>>[] = [];
  (rows ?? []).forEach((row, idx) => {
    const rowNumber = idx + 2;
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      collector.add(
        ErrorCode.INVALID_REFERENCE_ROW,
        table,
        rowNumber,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
      );
      return;
    }
    parsedRows.push({ rowNumber, data: parsed.data });
  });
  return parsedRows;
}

function teaName(value: string): string {
  const trimmed = value.trim();
  return TEA_VALUE_ALIASES[trimmed] ?? trimmed;
}

function addShare(blends: Map<string, Blend>, key: string, component: string, share: number): void {
  const blend = blends.get(key) ?? {};
  blend[component] = (blend[component] ?? 0) + share;
  blends.set(key, blend);
}

function checkBlends(table: string, blends: Map<string, Blend>, collector: IssueCollector): void {
  for (const [label, blend] of blends) {
    if (isNormalizedBlend(blend)) continue;
    collector.add(
      ErrorCode.BLEND_SHARE_SUM,
      table,
      null,
      `${label}: shares ${formatBlend(blend)} sum to ${blendWeightSum(blend)}, expected 1`
    );
  }
}

// ── Table builders ─────────────────────────────────────

function buildTokenRules(rows: Parsed<z.output<typeof tokenMapRowSchema>>[]): TokenRule[] {
  const rules: TokenRule[] = rows.map(({ data }) => ({
    pattern: data.raw_token,
    match: data.match,
    kind: data.token_type === "tea_base" ? "tea_override" : data.token_type,
    value: data.canonical_value
  }));
  return [...rules, ...buildLevelTokenRules()];
}

function buildMenu(
  itemRows: Parsed<z.output<typeof itemRuleRowSchema>>[],
  blendRows: Parsed<z.output<typeof blendRuleRowSchema>>[],
  componentRows: Parsed<z.output<typeof defaultComponentRowSchema>>[],
  collector: IssueCollector
): MenuItem[] {
  const items = new Map<string, MenuItem>();
  for (const { data } of itemRows) {
    const categoryKey = normKey(data.category_key);
    const itemKey = normKey(data.item_key);
    const key = menuKey(categoryKey, itemKey);
    // First definition wins.
    if (items.has(key)) continue;
    items.set(key, {
      categoryKey,
      itemKey,
      defaultTeaBase: data.default_tea_base ? teaName(data.default_tea_base) : null,
      requiresTeaChoice: data.requires_tea_choice,
      blend: null,
      milkRatio: data.milk_ratio ?? null,
      drinksPerItem: data.drinks_per_item ?? 1,
      defaultToppings: []
    });
  }

  const blends = new Map<string, Blend>();
  for (const { data } of blendRows) {
    addShare(blends, menuKey(normKey(data.category_key), normKey(data.item_key)), teaName(data.component_tea), data.share);
  }
  checkBlends(REFERENCE_TABLES.blendRules, blends, collector);

  for (const [key, blend] of blends) {
    const existing = items.get(key);
    if (existing) {
      existing.blend = blend;
      continue;
    }
    // Blend rules alone are enough to resolve an item.
    const [categoryKey = "", itemKey = ""] = key.split("::");
    items.set(key, {
      categoryKey,
      itemKey,
      defaultTeaBase: null,
      requiresTeaChoice: false,
      blend,
      milkRatio: null,
      drinksPerItem: 1,
      defaultToppings: []
    });
  }

  for (const { data } of componentRows) {
    const component = normKey(data.component_key);
    if (NON_TOPPING_COMPONENT.test(component)) continue;
    const item = items.get(menuKey(normKey(data.category_key), normKey(data.item_key)));
    if (!item) continue;
    const units = Math.max(1, Math.round(data.qty));
    for (let i = 0; i < units; i += 1) item.defaultToppings.push(component);
  }

  return [...items.values()];
}

function buildNamedBlends(
  rows: Parsed<z.output<typeof namedBlendRowSchema>>[],
  collector: IssueCollector
): Record<string, Blend> {
  const blends = new Map<string, Blend>();
  for (const { data } of rows) addShare(blends, data.blend_name.trim(), teaName(data.component_tea), data.share);
  checkBlends(REFERENCE_TABLES.namedBlends, blends, collector);
  return Object.fromEntries(blends);
}

function bucketVolumes(data: RecipeOverrideRow): Partial<Record<IcePct, number>> {
  const volumes: Partial<Record<IcePct, number>> = {};
  const columns: Array<[IcePct, number | undefined]> = [
    [0, data.tea_base_ml_0],
    [25, data.tea_base_ml_25],
    [50, data.tea_base_ml_50],
    [75, data.tea_base_ml_75],
    [100, data.tea_base_ml_100]
  ];
  for (const [pct, ml] of columns) {
    if (ml !== undefined) volumes[pct] = ml;
  }
  return volumes;
}

function buildRecipes(rows: Parsed<RecipeOverrideRow>[], collector: IssueCollector): RecipeOverride[] {
  const recipes: RecipeOverride[] = [];
  for (const { rowNumber, data } of rows) {
    const matchTokens = (data.match_tokens ?? "")
      .split("|")
      .map((token) => token.trim())
      .filter(Boolean);
    const base = {
      rowNumber,
      category: data.category,
      itemName: data.item_name,
      categoryKey: normKey(data.category),
      itemKey: normKey(data.item_name),
      matchTokens,
      milkMl: data.milk_ml ?? null
    };
    if (!base.itemKey && matchTokens.length === 0) {
      collector.add(ErrorCode.INVALID_REFERENCE_ROW, REFERENCE_TABLES.recipes, rowNumber, "needs item_name or match_tokens");
      continue;
    }

    if (data.ice === "100% ice" || data.ice === "no ice") {
      if (data.tea_base_ml === undefined) {
        collector.add(
          ErrorCode.INVALID_REFERENCE_ROW,
          REFERENCE_TABLES.recipes,
          rowNumber,
          `ice "${data.ice}" requires tea_base_ml`
        );
        continue;
      }
      recipes.push({ ...base, kind: "forced_ice", bucket: data.ice, teaBaseMl: data.tea_base_ml });
      continue;
    }

    recipes.push({
      ...base,
      kind: "per_ice_level",
      teaBaseMl: data.tea_base_ml ?? null,
      bucketTeaBaseMl: bucketVolumes(data)
    });
  }
  return recipes;
}

function buildIceBucketMeans(
  meanRows: SheetRow[] | null,
  sampleRows: SheetRow[] | null,
  collector: IssueCollector
): IceBucketMeans {
  if (meanRows) {
    const means: IceBucketMeans = {};
    for (const { rowNumber, data } of parseRows(REFERENCE_TABLES.iceBucketMeans, meanRows, iceBucketMeanRowSchema, collector)) {
      if (!isIcePct(data.ice_pct)) continue;
      if (means[data.ice_pct] !== undefined) {
        collector.add(
          ErrorCode.INVALID_REFERENCE_ROW,
          REFERENCE_TABLES.iceBucketMeans,
          rowNumber,
          `duplicate ice_pct ${data.ice_pct}`
        );
        continue;
      }
      means[data.ice_pct] = data.tea_base_ml;
    }
    return means;
  }

  if (sampleRows) {
    const samples = parseRows(REFERENCE_TABLES.manualSamples, sampleRows, manualSampleRowSchema, collector).map(({ data }) => ({
      icePct: data.ice_pct,
      teaBaseMl: data.tea_base_ml
    }));
    return computeIceBucketMeans(samples);
  }

  collector.add(
    ErrorCode.MISSING_REFERENCE_TABLE,
    REFERENCE_TABLES.iceBucketMeans,
    null,
    "ice_bucket_means.csv or manual_samples.csv is required"
  );
  return {};
}

function buildBatchConstants(
  rows: Parsed<z.output<typeof batchConstantsRowSchema>>[],
  collector: IssueCollector
): BatchConstants[] {
  const seen = new Set<string>();
  const constants: BatchConstants[] = [];
  for (const { rowNumber, data } of rows) {
    const teaComponent = teaName(data.tea_component);
    if (seen.has(teaComponent)) {
      collector.add(
        ErrorCode.INVALID_REFERENCE_ROW,
        REFERENCE_TABLES.batchConstants,
        rowNumber,
        `duplicate tea_component ${teaComponent}`
      );
      continue;
    }
    seen.add(teaComponent);
    constants.push({
      teaComponent,
      batchKey: data.batch_key || TEA_COMPONENT_TO_BATCH_KEY[teaComponent] || teaComponent,
      batchYieldMl: data.batch_yield_ml,
      leafGramsPerBatch: data.leaf_grams_per_batch,
      bagGrams: data.bag_grams
    });
  }
  return constants;
}

/**
 * Load every reference table from a directory of CSV (or XLSX) files. All
 * problems across all tables are collected and thrown together as one
 * ConfigurationError, so a run never starts on a half-valid configuration.
 */
export function loadReferenceTables(dir: string): ReferenceTables {
  const root = path.resolve(dir);
  const collector = new IssueCollector();
  const read = (table: string, required: boolean) => readTable(root, table, required, collector);

  const tokenRows = parseRows(REFERENCE_TABLES.tokenMap, read(REFERENCE_TABLES.tokenMap, true), tokenMapRowSchema, collector);
  const itemRows = parseRows(REFERENCE_TABLES.itemRules, read(REFERENCE_TABLES.itemRules, true), itemRuleRowSchema, collector);
  const blendRows = parseRows(REFERENCE_TABLES.blendRules, read(REFERENCE_TABLES.blendRules, false), blendRuleRowSchema, collector);
  const componentRows = parseRows(
    REFERENCE_TABLES.defaultComponents,
    read(REFERENCE_TABLES.defaultComponents, false),
    defaultComponentRowSchema,
    collector
  );
  const namedBlendRows = parseRows(
    REFERENCE_TABLES.namedBlends,
    read(REFERENCE_TABLES.namedBlends, false),
    namedBlendRowSchema,
    collector
  );
  const recipeRows = parseRows(REFERENCE_TABLES.recipes, read(REFERENCE_TABLES.recipes, false), recipeOverrideRowSchema, collector);
  const batchRows = parseRows(
    REFERENCE_TABLES.batchConstants,
    read(REFERENCE_TABLES.batchConstants, true),
    batchConstantsRowSchema,
    collector
  );

  const tables: ReferenceTables = {
    tokenRules: buildTokenRules(tokenRows),
    menu: buildMenu(itemRows, blendRows, componentRows, collector),
    namedBlends: buildNamedBlends(namedBlendRows, collector),
    recipes: buildRecipes(recipeRows, collector),
    iceBucketMeans: buildIceBucketMeans(
      read(REFERENCE_TABLES.iceBucketMeans, false),
      read(REFERENCE_TABLES.manualSamples, false),
      collector
    ),
    batchConstants: buildBatchConstants(batchRows, collector)
  };

  if (collector.issues.length > 0) {
    throw new ConfigurationError(
      collector.code,
      `Reference tables in ${root} are invalid:\n${formatIssues(collector.issues)}`,
      collector.issues
    );
  }
  return tables;
}

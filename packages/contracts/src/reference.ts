import type { ForcedIceBucket, IcePct, SugarPct, TokenKind } from "./levels.js";

/** Component name -> weight. Resolved blends always sum to 1. */
export type Blend = Record<string, number>;

export type TokenMatch = "exact" | "substring";

export type TokenRule = {
  pattern: string;
  match: TokenMatch;
  kind: Exclude<TokenKind, "unknown">;
  value: string;
};

export type MenuItem = {
  categoryKey: string;
  itemKey: string;
  defaultTeaBase: string | null;
  requiresTeaChoice: boolean;
  /** Weighted default blend; takes precedence over defaultTeaBase when set. */
  blend: Blend | null;
  /** Share of the drink volume that is milk, for milk drinks. */
  milkRatio: number | null;
  /** Physical drinks per sold unit (combos sell more than one). */
  drinksPerItem: number;
  /** Components every serving carries without a modifier (cream foam, house jelly), one entry per unit. Not counted as toppings. */
  defaultToppings: string[];
};

type RecipeOverrideBase = {
  rowNumber: number;
  category: string;
  itemName: string;
  categoryKey: string;
  itemKey: string;
  matchTokens: string[];
  milkMl: number | null;
};

export type ForcedIceRecipe = RecipeOverrideBase & {
  kind: "forced_ice";
  bucket: ForcedIceBucket;
  teaBaseMl: number;
};

export type PerIceLevelRecipe = RecipeOverrideBase & {
  kind: "per_ice_level";
  teaBaseMl: number | null;
  bucketTeaBaseMl: Partial<Record<IcePct, number>>;
};

export type RecipeOverride = ForcedIceRecipe | PerIceLevelRecipe;

/** Calibrated mean tea-base ml per ice bucket. */
export type IceBucketMeans = Partial<Record<IcePct, number>>;

export type BatchConstants = {
  teaComponent: string;
  batchKey: string;
  batchYieldMl: number;
  leafGramsPerBatch: number;
  bagGrams: number;
};

export type ReferenceTables = {
  tokenRules: TokenRule[];
  menu: MenuItem[];
  namedBlends: Record<string, Blend>;
  recipes: RecipeOverride[];
  iceBucketMeans: IceBucketMeans;
  batchConstants: BatchConstants[];
};

export type RawOrderLine = {
  /** Spreadsheet row in the source export; the header is row 1. */
  rowNumber: number;
  orderId: string | null;
  /** YYYY-MM-DD */
  date: string;
  time: string | null;
  category: string;
  itemName: string;
  modifiers: string;
  quantity: number;
};

export type { IcePct, SugarPct };

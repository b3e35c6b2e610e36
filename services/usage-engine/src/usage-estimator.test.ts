import { describe, it, expect } from "vitest";
import type { MenuItem, RecipeOverride } from "@teabase/contracts";
import { canonicalizeLine, explodeLineItems } from "./canonicalizer.js";
import { MenuCatalog } from "./menu-catalog.js";
import { RecipeTable } from "./recipe-table.js";
import { TokenResolver, buildLevelTokenRules } from "./token-resolver.js";
import type { ExplodedDrinkRow } from "./types.js";
import { UnknownTokenAudit } from "./unknown-token-audit.js";
import {
  estimateAll,
  estimateUsage,
  recipeMilkRatio,
  toppingFactor,
  type UsageEstimatorOptions,
} from "./usage-estimator.js";

// ── Helpers ────────────────────────────────────────────

function makeRow(overrides: Partial<ExplodedDrinkRow> = {}): ExplodedDrinkRow {
  return {
    lineIndex: 0,
    rowNumber: 1,
    orderId: "T-100",
    date: "2026-01-05",
    time: "10:15",
    itemName: "TGY Special",
    category: "Mosa Signature",
    itemKey: "tgy_special",
    categoryKey: "mosa_signature",
    quantity: 1,
    modifiers: "100% Ice",
    icePct: 100,
    iceSource: "token",
    sugarPct: 50,
    toppings: [],
    toppingUnits: {},
    defaultComponents: {},
    teaOverride: null,
    teaOverrideChoices: [],
    requiresTeaChoice: false,
    teaResolution: "blend_default",
    resolvedBlend: { tie_guan_yin: 1 },
    menuBlend: { tie_guan_yin: 1 },
    unknownTokens: [],
    drinksPerItem: 1,
    milkRatio: null,
    lineItemId: "0-1",
    drinkIndex: 1,
    ...overrides,
  };
}

function makeOptions(overrides: Partial<UsageEstimatorOptions> = {}): UsageEstimatorOptions {
  return {
    iceBucketMeans: { 25: 580, 50: 520, 75: 480.5, 100: 600 },
    iceFallback: "nearest",
    defaultIcePct: 100,
    ...overrides,
  };
}

function makeRecipe(overrides: Partial<Extract<RecipeOverride, { kind: "per_ice_level" }>> = {}): RecipeOverride {
  return {
    kind: "per_ice_level",
    rowNumber: 1,
    category: "Mosa Signature",
    itemName: "TGY Special",
    categoryKey: "mosa_signature",
    itemKey: "tgy_special",
    matchTokens: [],
    milkMl: null,
    teaBaseMl: null,
    bucketTeaBaseMl: {},
    ...overrides,
  };
}

const noRecipes = new RecipeTable([]);

function estimate(row: Partial<ExplodedDrinkRow>, recipes = noRecipes, options = makeOptions()) {
  const result = estimateUsage(makeRow(row), recipes, options);
  if (!result.ok) throw new Error(`expected usage, got ${result.reason}`);
  return result.usage;
}

// ── toppingFactor ──────────────────────────────────────

describe("toppingFactor", () => {
  it("takes 10% per topping and saturates at two", () => {
    expect(toppingFactor(0)).toBe(1);
    expect(toppingFactor(1)).toBe(0.9);
    expect(toppingFactor(2)).toBe(0.8);
    expect(toppingFactor(5)).toBe(0.8);
  });
});

// ── estimateUsage ──────────────────────────────────────

describe("estimateUsage", () => {
  it("applies the topping reduction to the bucket base", () => {
    expect(estimate({}).teaBaseMlEst).toBe(600);
    expect(estimate({ toppings: ["boba"] }).teaBaseMlEst).toBe(540);
    expect(estimate({ toppings: ["boba", "lychee_jelly"] }).teaBaseMlEst).toBe(480);
    expect(estimate({ toppings: ["boba", "lychee_jelly", "pudding"] }).teaBaseMlEst).toBe(480);
  });

  it("reports the reduction as a fraction", () => {
    expect(estimate({ toppings: ["boba"] }).toppingReduction).toBe(0.1);
    expect(estimate({ toppings: ["boba", "pudding"] }).toppingReduction).toBe(0.2);
  });

  it("uses 550 ml for 0% ice without a recipe pin", () => {
    const usage = estimate({ icePct: 0 });
    expect(usage.teaBaseMlEst).toBe(550);
    expect(usage.volumeSource).toBe("zero_ice_default");
    expect(usage.iceBucket).toBe(0);
  });

  it("does not reduce for components the menu adds by default", () => {
    const osmanthus: MenuItem = {
      categoryKey: "mosa_signature",
      itemKey: "osmanthus_oolong",
      defaultTeaBase: "tie_guan_yin",
      requiresTeaChoice: false,
      blend: null,
      milkRatio: null,
      drinksPerItem: 1,
      defaultToppings: ["osmanthus_tgy_jelly"],
    };
    const context = {
      resolver: new TokenResolver([
        { pattern: "Boba", match: "exact", kind: "topping", value: "boba" },
        ...buildLevelTokenRules(),
      ]),
      menu: new MenuCatalog([osmanthus]),
      recipes: noRecipes,
    };
    const drinkFor = (modifiers: string) => {
      const item = canonicalizeLine(
        {
          rowNumber: 1,
          orderId: null,
          date: "2026-01-05",
          time: null,
          category: "Mosa Signature",
          itemName: "Osmanthus Oolong",
          modifiers,
          quantity: 1,
        },
        0,
        context,
        new UnknownTokenAudit(),
      );
      const [drink] = explodeLineItems([item]);
      if (!drink) throw new Error("expected one drink");
      return drink;
    };

    const plain = estimateUsage(drinkFor("No Ice"), noRecipes, makeOptions());
    expect(plain.ok && plain.usage.teaBaseMlEst).toBe(550);
    expect(plain.ok && plain.usage.toppingCount).toBe(0);

    const withBoba = estimateUsage(drinkFor("100% Ice, Boba"), noRecipes, makeOptions());
    expect(withBoba.ok && withBoba.usage.toppingReduction).toBe(0.1);
    expect(withBoba.ok && withBoba.usage.teaBaseMlEst).toBe(540);
  });

  it("imputes the default bucket when ice is missing", () => {
    const usage = estimate({ icePct: null, iceSource: "missing" });
    expect(usage.iceBucket).toBe(100);
    expect(usage.iceImputed).toBe(true);
    expect(usage.teaBaseMlEst).toBe(600);
  });

  it("rounds the estimate half up", () => {
    expect(estimate({ icePct: 75 }).teaBaseMlEst).toBe(481);
  });

  it("prefers a recipe's per-bucket volume", () => {
    const recipes = new RecipeTable([makeRecipe({ bucketTeaBaseMl: { 50: 300 } })]);
    const usage = estimate({ icePct: 50, toppings: ["boba"] }, recipes);
    expect(usage.volumeSource).toBe("recipe_bucket");
    expect(usage.baseTeaMl).toBe(300);
    expect(usage.teaBaseMlEst).toBe(270);
  });

  it("splits milk drinks by the menu milk ratio", () => {
    const usage = estimate({ milkRatio: 0.25, toppings: ["boba"] });
    expect(usage.teaBaseMlEst).toBe(405);
    expect(usage.milkMlEst).toBe(135);
  });

  it("derives the milk ratio from recipe volumes when the menu has none", () => {
    const recipes = new RecipeTable([makeRecipe({ teaBaseMl: 200, milkMl: 100 })]);
    const usage = estimate({}, recipes);
    expect(usage.teaBaseMlEst).toBe(400);
    expect(usage.milkMlEst).toBe(200);
  });

  it("applies forced-ice recipe volumes directly", () => {
    const recipes = new RecipeTable([
      {
        kind: "forced_ice",
        rowNumber: 1,
        category: "",
        itemName: "",
        categoryKey: "",
        itemKey: "",
        matchTokens: ["matcha latte"],
        milkMl: 150,
        bucket: "100% ice",
        teaBaseMl: 60,
      },
    ]);
    const usage = estimate(
      { itemName: "Mango Matcha Latte", icePct: "100% ice", toppings: ["boba", "pudding"], resolvedBlend: { matcha: 1 } },
      recipes
    );
    expect(usage.volumeSource).toBe("forced_recipe");
    expect(usage.teaBaseMlEst).toBe(60);
    expect(usage.milkMlEst).toBe(150);
    expect(usage.toppingReduction).toBe(0);
    expect(usage.iceBucket).toBe(100);
  });

  it("spreads the estimate across blend components", () => {
    const usage = estimate({ resolvedBlend: { buckwheat_barley: 0.25, four_seasons: 0.75 } });
    expect(usage.components).toEqual([
      { component: "buckwheat_barley", share: 0.25, ml: 150 },
      { component: "four_seasons", share: 0.75, ml: 450 },
    ]);
    const total = usage.components.reduce((sum, c) => sum + c.ml, 0);
    expect(Math.abs(total - usage.teaBaseMlEst)).toBeLessThan(1e-6);
  });

  it("excludes unresolved lines", () => {
    for (const teaResolution of ["conflict", "missing_choice", "unknown"] as const) {
      const result = estimateUsage(makeRow({ teaResolution, resolvedBlend: {} }), noRecipes, makeOptions());
      expect(result).toEqual({ ok: false, lineItemId: "0-1", reason: teaResolution });
    }
  });
});

describe("recipeMilkRatio", () => {
  it("needs both flat volumes", () => {
    expect(recipeMilkRatio(undefined)).toBeNull();
    expect(recipeMilkRatio(makeRecipe({ milkMl: 100 }))).toBeNull();
    expect(recipeMilkRatio(makeRecipe({ teaBaseMl: 300, milkMl: 100 }))).toBe(0.25);
  });
});

describe("estimateAll", () => {
  it("separates usage rows from exclusions", () => {
    const rows = [
      makeRow(),
      makeRow({ lineItemId: "1-1", teaResolution: "missing_choice", resolvedBlend: {} }),
      makeRow({ lineItemId: "2-1", icePct: 0 }),
    ];
    const result = estimateAll(rows, noRecipes, makeOptions());
    expect(result.usage.map((u) => u.lineItemId)).toEqual(["0-1", "2-1"]);
    expect(result.excluded).toEqual([{ ok: false, lineItemId: "1-1", reason: "missing_choice" }]);
  });
});

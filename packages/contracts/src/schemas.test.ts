import { describe, expect, it } from "vitest";
import {
  batchConstantsRowSchema,
  itemRuleRowSchema,
  recipeOverrideRowSchema,
  tokenMapRowSchema,
  usageRunOptionsSchema
} from "./schemas.js";
import { normKey } from "./keys.js";
import { ConfigurationError, ErrorCode, formatIssues } from "./errors.js";
import { isExcludedResolution } from "./levels.js";

describe("normKey", () => {
  it("collapses punctuation and spacing into underscores", () => {
    expect(normKey("Mosa Signature")).toBe("mosa_signature");
    expect(normKey("  TGY Special! ")).toBe("tgy_special");
    expect(normKey("Fresh   Fruit-Tea")).toBe("fresh_fruit_tea");
  });

  it("returns empty string for missing values", () => {
    expect(normKey(null)).toBe("");
    expect(normKey(undefined)).toBe("");
  });
});

describe("tokenMapRowSchema", () => {
  it("defaults match to exact when the column is blank", () => {
    const parsed = tokenMapRowSchema.parse({
      raw_token: "Boba",
      token_type: "topping",
      canonical_value: "boba",
      match: ""
    });
    expect(parsed.match).toBe("exact");
  });

  it("rejects unknown token types", () => {
    expect(
      tokenMapRowSchema.safeParse({ raw_token: "Boba", token_type: "flavor", canonical_value: "boba" }).success
    ).toBe(false);
  });
});

describe("itemRuleRowSchema", () => {
  it("reads requires_tea_choice flags as booleans", () => {
    const yes = itemRuleRowSchema.parse({ category_key: "fresh_fruit_tea", item_key: "fresh_mango_tea", requires_tea_choice: "1" });
    const no = itemRuleRowSchema.parse({ category_key: "hot_drink", item_key: "hot_black", requires_tea_choice: "" });
    expect(yes.requires_tea_choice).toBe(true);
    expect(no.requires_tea_choice).toBe(false);
  });

  it("rejects milk ratios above 1", () => {
    expect(
      itemRuleRowSchema.safeParse({ category_key: "milk_tea", item_key: "tgy_milk_tea", milk_ratio: "1.4" }).success
    ).toBe(false);
  });
});

describe("recipeOverrideRowSchema", () => {
  it("treats blank numeric cells as unset", () => {
    const parsed = recipeOverrideRowSchema.parse({
      category: "Milk Tea",
      item_name: "TGY Milk Tea",
      tea_base_ml: "300",
      milk_ml: "",
      ice: "Ice (per ice level)",
      match_tokens: "",
      tea_base_ml_0: "",
      tea_base_ml_25: "420"
    });
    expect(parsed.tea_base_ml).toBe(300);
    expect(parsed.milk_ml).toBeUndefined();
    expect(parsed.ice).toBe("ice (per ice level)");
    expect(parsed.tea_base_ml_25).toBe(420);
  });

  it("rejects unrecognized ice values", () => {
    expect(recipeOverrideRowSchema.safeParse({ category: "", item_name: "X", ice: "extra ice" }).success).toBe(false);
  });

  it("rejects non-numeric volumes", () => {
    expect(recipeOverrideRowSchema.safeParse({ category: "", item_name: "X", tea_base_ml: "lots" }).success).toBe(false);
  });
});

describe("batchConstantsRowSchema", () => {
  it("rejects a zero batch yield", () => {
    const result = batchConstantsRowSchema.safeParse({
      tea_component: "tie_guan_yin",
      batch_yield_ml: "0",
      leaf_grams_per_batch: "160",
      bag_grams: "600"
    });
    expect(result.success).toBe(false);
  });
});

describe("usageRunOptionsSchema", () => {
  it("fills defaults", () => {
    const parsed = usageRunOptionsSchema.parse({});
    expect(parsed.iceFallback).toBe("nearest");
    expect(parsed.defaultIcePct).toBe(100);
    expect(parsed.zeroIceBaseMl).toBe(550);
  });

  it("rejects an inverted date range", () => {
    expect(usageRunOptionsSchema.safeParse({ startDate: "2026-02-01", endDate: "2026-01-01" }).success).toBe(false);
  });
});

describe("ConfigurationError", () => {
  it("carries code and issues", () => {
    const error = new ConfigurationError(ErrorCode.INVALID_CONSTANT, "bad constants", [
      { table: "batch_constants", rowNumber: 2, message: "bag_grams must be positive" }
    ]);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ConfigurationError");
    expect(formatIssues(error.issues)).toBe("batch_constants row 2: bag_grams must be positive");
  });
});

describe("isExcludedResolution", () => {
  it("flags statuses without a usable blend", () => {
    expect(isExcludedResolution("conflict")).toBe(true);
    expect(isExcludedResolution("missing_choice")).toBe(true);
    expect(isExcludedResolution("unknown")).toBe(true);
    expect(isExcludedResolution("override")).toBe(false);
    expect(isExcludedResolution("blend_default")).toBe(false);
  });
});

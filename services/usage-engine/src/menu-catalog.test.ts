import { describe, it, expect } from "vitest";
import { ConfigurationError, ErrorCode, type MenuItem } from "@teabase/contracts";
import { formatBlend, isNormalizedBlend, parseBlendExpression } from "./blend.js";
import { MenuCatalog } from "./menu-catalog.js";

function makeItem(overrides: Partial<MenuItem> = {}): MenuItem {
  return {
    categoryKey: "mosa_signature",
    itemKey: "grapefruit_bloom",
    defaultTeaBase: null,
    requiresTeaChoice: false,
    blend: { four_seasons: 0.75, buckwheat_barley: 0.25 },
    milkRatio: null,
    drinksPerItem: 1,
    defaultToppings: [],
    ...overrides,
  };
}

describe("blend helpers", () => {
  it("formats blends sorted by component", () => {
    expect(formatBlend({ four_seasons: 0.75, buckwheat_barley: 0.25 })).toBe("buckwheat_barley:0.25|four_seasons:0.75");
  });

  it("parses inline expressions and bare names", () => {
    expect(parseBlendExpression("green:0.5|genmai:0.5")).toEqual({ genmai: 0.5, green: 0.5 });
    expect(parseBlendExpression("green")).toEqual({ green: 1 });
    expect(parseBlendExpression("green:abc")).toBeNull();
    expect(parseBlendExpression(" ")).toBeNull();
  });

  it("accepts sums within tolerance only", () => {
    expect(isNormalizedBlend({ a: 0.3333333, b: 0.6666667 })).toBe(true);
    expect(isNormalizedBlend({ a: 0.5, b: 0.4 })).toBe(false);
    expect(isNormalizedBlend({})).toBe(false);
  });
});

describe("MenuCatalog", () => {
  it("finds items by normalized category and name", () => {
    const menu = new MenuCatalog([makeItem()]);
    expect(menu.find("Mosa Signature", "Grapefruit  Bloom")?.itemKey).toBe("grapefruit_bloom");
    expect(menu.find("Fruit Tea", "Grapefruit Bloom")).toBeNull();
  });

  it("rejects blend rules that do not sum to one", () => {
    let caught: unknown;
    try {
      new MenuCatalog([makeItem({ blend: { four_seasons: 0.7, buckwheat_barley: 0.25 } })]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.code).toBe(ErrorCode.BLEND_SHARE_SUM);
      expect(caught.issues[0]?.table).toBe("item_blend_rules");
    }
  });

  it("rejects named blends that do not sum to one", () => {
    expect(() => new MenuCatalog([], { genmai_green: { genmai: 0.5, green: 0.6 } })).toThrow(ConfigurationError);
  });

  it("keeps the first definition of a duplicated item", () => {
    const menu = new MenuCatalog([makeItem(), makeItem({ blend: null, defaultTeaBase: "green" })]);
    expect(menu.size).toBe(1);
    expect(menu.find("mosa_signature", "grapefruit_bloom")?.defaultTeaBase).toBeNull();
  });

  it("expands tea names into blends", () => {
    const menu = new MenuCatalog([], { genmai_green: { genmai: 0.5, green: 0.5 } });
    expect(menu.blendForTea("genmai_green")).toEqual({ genmai: 0.5, green: 0.5 });
    expect(menu.blendForTea("genmai:1|green:3")).toEqual({ genmai: 0.25, green: 0.75 });
    expect(menu.blendForTea("tie_guan_yin")).toEqual({ tie_guan_yin: 1 });
  });

  it("prefers blend rules over the default tea", () => {
    const menu = new MenuCatalog([]);
    expect(menu.defaultBlend(makeItem({ defaultTeaBase: "green" }))).toEqual({ buckwheat_barley: 0.25, four_seasons: 0.75 });
    expect(menu.defaultBlend(makeItem({ blend: null, defaultTeaBase: "green" }))).toEqual({ green: 1 });
    expect(menu.defaultBlend(makeItem({ blend: null }))).toBeNull();
  });
});

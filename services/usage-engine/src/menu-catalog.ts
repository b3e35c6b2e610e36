import { menuKey, normKey, type Blend, type MenuItem } from "@teabase/contracts";
import { assertNormalizedBlend, blendWeightSum, parseBlendExpression, sortBlend } from "./blend.js";

/**
 * Read-only lookup of menu metadata keyed by normalized category + item.
 * Every default blend and named blend is checked to sum to 1 on construction.
 */
export class MenuCatalog {
  private readonly items: ReadonlyMap<string, MenuItem>;
  private readonly namedBlends: Readonly<Record<string, Blend>>;

  constructor(items: MenuItem[], namedBlends: Record<string, Blend> = {}) {
    const map = new Map<string, MenuItem>();
    for (const item of items) {
      if (item.blend) {
        assertNormalizedBlend(item.blend, "item_blend_rules", `${item.categoryKey}/${item.itemKey}`);
      }
      const key = menuKey(item.categoryKey, item.itemKey);
      // First definition wins; later duplicates are ignored.
      if (!map.has(key)) map.set(key, Object.freeze({ ...item }));
    }

    const blends: Record<string, Blend> = {};
    for (const [name, blend] of Object.entries(namedBlends)) {
      assertNormalizedBlend(blend, "named_blends", name);
      blends[name] = Object.freeze(sortBlend(blend));
    }

    this.items = map;
    this.namedBlends = Object.freeze(blends);
  }

  get size(): number {
    return this.items.size;
  }

  find(category: string, itemName: string): MenuItem | null {
    return this.items.get(menuKey(normKey(category), normKey(itemName))) ?? null;
  }

  /**
   * Weighted blend a tea name stands for: a named blend, an inline
   * "a:0.5|b:0.5" expression (rescaled to sum to 1), or the tea alone.
   */
  blendForTea(teaName: string): Blend {
    const named = this.namedBlends[teaName];
    if (named) return { ...named };
    if (/[|:]/.test(teaName)) {
      const parsed = parseBlendExpression(teaName);
      if (parsed) return rescale(parsed);
    }
    return { [teaName]: 1 };
  }

  /** The item's configured default blend, or null when it has none. */
  defaultBlend(item: MenuItem): Blend | null {
    if (item.blend) return sortBlend(item.blend);
    if (item.defaultTeaBase) return this.blendForTea(item.defaultTeaBase);
    return null;
  }
}

function rescale(blend: Blend): Blend {
  const names = Object.keys(blend);
  const total = blendWeightSum(blend);
  const scaled: Blend = {};
  for (const name of names) {
    const share = blend[name] ?? 0;
    scaled[name] = total > 0 ? share / total : 1 / names.length;
  }
  return scaled;
}

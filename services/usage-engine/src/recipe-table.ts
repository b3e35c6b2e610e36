import { normKey, type RecipeOverride } from "@teabase/contracts";
import type { IceValue } from "./types.js";

export type RecipeMatch = {
  recipe: RecipeOverride;
  matchedBy: "match_token" | "item_category";
  /** Tea-base ml the entry pins for the requested ice level, if any. */
  bucketTeaBaseMl: number | null;
};

/**
 * Ordered recipe overrides consulted before the generic volume formulas.
 *
 * An entry matches when the item name contains one of its match tokens, or
 * when its item + category equal the line's. Among matches, entries with
 * match tokens beat entries without; remaining ties go to table order.
 */
export class RecipeTable {
  private readonly entries: readonly RecipeOverride[];

  constructor(entries: RecipeOverride[]) {
    this.entries = Object.freeze(
      entries.map((entry) =>
        Object.freeze({ ...entry, matchTokens: entry.matchTokens.map((t) => t.trim().toLowerCase()).filter(Boolean) })
      )
    );
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(itemName: string, category: string, icePct: IceValue = null): RecipeMatch | null {
    const haystack = itemName.toLowerCase();
    const itemKey = normKey(itemName);
    const categoryKey = normKey(category);

    let fallback: RecipeMatch | null = null;
    for (const recipe of this.entries) {
      const tokenHit = recipe.matchTokens.some((token) => haystack.includes(token));
      if (tokenHit) {
        return { recipe, matchedBy: "match_token", bucketTeaBaseMl: bucketVolume(recipe, icePct) };
      }
      if (fallback) continue;
      const exactHit = recipe.itemKey !== "" && recipe.itemKey === itemKey && recipe.categoryKey === categoryKey;
      if (exactHit) {
        fallback = { recipe, matchedBy: "item_category", bucketTeaBaseMl: bucketVolume(recipe, icePct) };
      }
    }
    return fallback;
  }
}

function bucketVolume(recipe: RecipeOverride, icePct: IceValue): number | null {
  if (recipe.kind === "forced_ice") return recipe.teaBaseMl;
  if (typeof icePct !== "number") return null;
  return recipe.bucketTeaBaseMl[icePct] ?? null;
}

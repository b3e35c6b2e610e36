import {
  isIcePct,
  isSugarPct,
  normKey,
  type Blend,
  type MenuItem,
  type RawOrderLine,
  type SugarPct,
  type TeaResolution
} from "@teabase/contracts";
import { sortBlend } from "./blend.js";
import type { MenuCatalog } from "./menu-catalog.js";
import type { RecipeTable } from "./recipe-table.js";
import { parseTokenQuantity, type TokenResolver } from "./token-resolver.js";
import type { CanonicalLineItem, ExplodedDrinkRow, IceSource, IceValue, ModifierToken } from "./types.js";
import { UnknownTokenAudit } from "./unknown-token-audit.js";

export type CanonicalizerContext = {
  resolver: TokenResolver;
  menu: MenuCatalog;
  recipes: RecipeTable;
};

export type CanonicalizeResult = {
  items: CanonicalLineItem[];
  unknownTokens: UnknownTokenAudit;
};

export type TeaResolutionResult = {
  teaResolution: TeaResolution;
  teaOverride: string | null;
  resolvedBlend: Blend;
};

const HOT_CATEGORY = /\bhot\b/i;

/**
 * Tea-base precedence: unmapped item -> unknown, then conflict, override,
 * missing_choice, blend_default. An item with no default blend and no
 * override stays unknown.
 */
export function resolveTeaBase(
  menuItem: MenuItem | null,
  overrideChoices: string[],
  menu: MenuCatalog
): TeaResolutionResult {
  if (!menuItem) {
    return { teaResolution: "unknown", teaOverride: null, resolvedBlend: {} };
  }
  if (overrideChoices.length > 1) {
    return { teaResolution: "conflict", teaOverride: null, resolvedBlend: {} };
  }
  const [choice] = overrideChoices;
  if (choice !== undefined) {
    return { teaResolution: "override", teaOverride: choice, resolvedBlend: sortBlend(menu.blendForTea(choice)) };
  }
  if (menuItem.requiresTeaChoice) {
    return { teaResolution: "missing_choice", teaOverride: null, resolvedBlend: {} };
  }
  const blend = menu.defaultBlend(menuItem);
  if (!blend) {
    return { teaResolution: "unknown", teaOverride: null, resolvedBlend: {} };
  }
  return { teaResolution: "blend_default", teaOverride: null, resolvedBlend: blend };
}

function parseIce(tokens: ModifierToken[]): IceValue {
  let ice: IceValue = null;
  for (const token of tokens) {
    if (token.kind !== "ice") continue;
    const value = Number(token.value);
    // Last token wins; exports sometimes repeat the ice modifier.
    if (isIcePct(value)) ice = value;
  }
  return ice;
}

function parseSugar(tokens: ModifierToken[]): SugarPct | null {
  let sugar: SugarPct | null = null;
  for (const token of tokens) {
    if (token.kind !== "sugar") continue;
    const value = Number(token.value);
    if (isSugarPct(value)) sugar = value;
  }
  return sugar;
}

function sortedUnits(units: Map<string, number>): Record<string, number> {
  const sorted: Record<string, number> = {};
  for (const name of [...units.keys()].sort()) {
    sorted[name] = units.get(name) ?? 0;
  }
  return sorted;
}

function collectToppings(tokens: ModifierToken[]): Record<string, number> {
  const units = new Map<string, number>();
  for (const token of tokens) {
    if (token.kind !== "topping") continue;
    units.set(token.value, (units.get(token.value) ?? 0) + token.quantity);
  }
  return sortedUnits(units);
}

function collectDefaultComponents(menuItem: MenuItem | null): Record<string, number> {
  const units = new Map<string, number>();
  for (const component of menuItem?.defaultToppings ?? []) {
    units.set(component, (units.get(component) ?? 0) + 1);
  }
  return sortedUnits(units);
}

export function canonicalizeLine(
  line: RawOrderLine,
  lineIndex: number,
  context: CanonicalizerContext,
  audit: UnknownTokenAudit
): CanonicalLineItem {
  const tokens = context.resolver.tokenize(line.modifiers);
  const menuItem = context.menu.find(line.category, line.itemName);

  for (const token of tokens) {
    // "Mystery x2" is two occurrences of "Mystery".
    if (token.kind === "unknown") audit.record(parseTokenQuantity(token.raw).label, token.quantity);
  }

  let icePct = parseIce(tokens);
  let iceSource: IceSource = icePct === null ? "missing" : "token";
  if (icePct === null && HOT_CATEGORY.test(line.category)) {
    icePct = 0;
    iceSource = "hot_default";
  }
  const recipe = context.recipes.lookup(line.itemName, line.category, icePct);
  if (recipe?.recipe.kind === "forced_ice") {
    icePct = recipe.recipe.bucket;
    iceSource = "recipe_forced";
  }

  const teaOverrideChoices = [
    ...new Set(tokens.filter((token) => token.kind === "tea_override").map((token) => token.value))
  ].sort();
  const tea = resolveTeaBase(menuItem, teaOverrideChoices, context.menu);
  const toppingUnits = collectToppings(tokens);

  return {
    lineIndex,
    rowNumber: line.rowNumber,
    orderId: line.orderId,
    date: line.date,
    time: line.time,
    itemName: line.itemName,
    category: line.category,
    itemKey: normKey(line.itemName),
    categoryKey: normKey(line.category),
    quantity: line.quantity,
    modifiers: line.modifiers,
    icePct,
    iceSource,
    sugarPct: parseSugar(tokens),
    toppings: Object.keys(toppingUnits),
    toppingUnits,
    defaultComponents: collectDefaultComponents(menuItem),
    teaOverride: tea.teaOverride,
    teaOverrideChoices,
    requiresTeaChoice: menuItem?.requiresTeaChoice ?? false,
    teaResolution: tea.teaResolution,
    resolvedBlend: tea.resolvedBlend,
    menuBlend: menuItem ? context.menu.defaultBlend(menuItem) ?? {} : {},
    unknownTokens: tokens.filter((token) => token.kind === "unknown").map((token) => token.raw),
    drinksPerItem: menuItem?.drinksPerItem ?? 1,
    milkRatio: menuItem?.milkRatio ?? null
  };
}

/** One canonical item per raw line, in input order, plus the unknown-token audit for the pass. */
export function canonicalizeLines(lines: RawOrderLine[], context: CanonicalizerContext): CanonicalizeResult {
  const unknownTokens = new UnknownTokenAudit();
  const items = lines.map((line, idx) => canonicalizeLine(line, idx, context, unknownTokens));
  return { items, unknownTokens };
}

/**
 * One row per physical drink: quantity x drinks-per-item. Each row gets a
 * stable id "<lineIndex>-<n>".
 */
export function explodeLineItems(items: CanonicalLineItem[]): ExplodedDrinkRow[] {
  const rows: ExplodedDrinkRow[] = [];
  for (const item of items) {
    const drinks = Math.max(0, Math.round(item.quantity)) * item.drinksPerItem;
    for (let n = 1; n <= drinks; n++) {
      rows.push({ ...item, lineItemId: `${item.lineIndex}-${n}`, drinkIndex: n });
    }
  }
  return rows;
}

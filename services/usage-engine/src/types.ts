import type {
  Blend,
  ExcludedResolution,
  ForcedIceBucket,
  IcePct,
  SugarPct,
  TeaResolution,
  TokenKind
} from "@teabase/contracts";

export interface ModifierToken {
  kind: TokenKind;
  /** Canonical value; the raw token itself when kind is "unknown". */
  value: string;
  raw: string;
  /** Units from an "xN" suffix ("Boba x2" -> 2), 1 otherwise. */
  quantity: number;
}

/** Parsed ice level: a bucket, a bucket forced by the recipe, or nothing parseable. */
export type IceValue = IcePct | ForcedIceBucket | null;

export type IceSource = "token" | "hot_default" | "recipe_forced" | "missing";

export interface CanonicalLineItem {
  lineIndex: number;
  rowNumber: number;
  orderId: string | null;
  date: string;
  time: string | null;
  itemName: string;
  category: string;
  itemKey: string;
  categoryKey: string;
  quantity: number;
  modifiers: string;
  icePct: IceValue;
  iceSource: IceSource;
  sugarPct: SugarPct | null;
  /** Sorted, duplicate-free. */
  toppings: string[];
  /** Units per topping, keyed in the same order as `toppings`. */
  toppingUnits: Record<string, number>;
  /** Menu default components (cream foam, house jelly), sorted. Not toppings: no volume reduction. */
  defaultComponents: Record<string, number>;
  teaOverride: string | null;
  /** Every distinct tea-override value seen, sorted. */
  teaOverrideChoices: string[];
  requiresTeaChoice: boolean;
  teaResolution: TeaResolution;
  /** Empty for conflict / missing_choice / unknown. */
  resolvedBlend: Blend;
  /** Menu-level blend (or default tea) regardless of overrides; debug output only. */
  menuBlend: Blend;
  unknownTokens: string[];
  drinksPerItem: number;
  milkRatio: number | null;
}

export interface ExplodedDrinkRow extends CanonicalLineItem {
  lineItemId: string;
  /** 1-based index of the drink within its line. */
  drinkIndex: number;
}

export interface ComponentUsage {
  component: string;
  share: number;
  ml: number;
}

export type VolumeSource = "forced_recipe" | "recipe_bucket" | "zero_ice_default" | "bucket_mean";

export interface UsageRow {
  lineItemId: string;
  date: string;
  orderId: string | null;
  itemName: string;
  category: string;
  icePct: IceValue;
  iceBucket: IcePct | null;
  iceImputed: boolean;
  sugarPct: SugarPct | null;
  toppingCount: number;
  volumeSource: VolumeSource;
  baseTeaMl: number;
  /** Fraction removed for toppings: 0, 0.1 or 0.2. */
  toppingReduction: number;
  teaBaseMlEst: number;
  milkMlEst: number | null;
  teaResolution: TeaResolution;
  components: ComponentUsage[];
}

export type UsageEstimate =
  | { ok: true; usage: UsageRow }
  | { ok: false; lineItemId: string; reason: ExcludedResolution };

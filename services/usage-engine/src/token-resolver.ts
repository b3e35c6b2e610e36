import {
  ConfigurationError,
  ErrorCode,
  icePctLevels,
  isIcePct,
  isSugarPct,
  sugarPctLevels,
  type ConfigurationIssue,
  type TokenRule
} from "@teabase/contracts";
import type { ModifierToken } from "./types.js";

/** Modifier text is split on any of these. */
export const MODIFIER_DELIMITERS = /[,;\n]/;

const QUANTITY_SUFFIX = /\s*[x×]\s*(\d+)$/i;

/** Export-side tea names mapped onto blend component keys. */
export const TEA_VALUE_ALIASES: Record<string, string> = {
  green_tea: "green",
  four_seasons_tea: "four_seasons",
  green_tea_genmai: "genmai_green"
};

type CompiledRule = TokenRule & { needle: string };

export function normalizeTokenLabel(value: string): string {
  return value.toLowerCase().replace(/\s*%\s*/g, "% ").replace(/\s+/g, " ").trim();
}

export function splitModifierText(text: string): string[] {
  return text
    .split(MODIFIER_DELIMITERS)
    .map((token) => token.trim())
    .filter(Boolean);
}

export function parseTokenQuantity(raw: string): { label: string; quantity: number } {
  const match = QUANTITY_SUFFIX.exec(raw);
  if (!match?.[1]) return { label: raw.trim(), quantity: 1 };
  const quantity = Number.parseInt(match[1], 10);
  return { label: raw.slice(0, match.index).trim(), quantity: quantity > 0 ? quantity : 1 };
}

/**
 * Exact rules for the standard "NN% Ice" / "NN% Sugar" / "No Ice" / "No Sugar"
 * labels. Callers append these after shop-specific rules.
 */
export function buildLevelTokenRules(): TokenRule[] {
  const rules: TokenRule[] = [
    { pattern: "no ice", match: "exact", kind: "ice", value: "0" },
    { pattern: "no sugar", match: "exact", kind: "sugar", value: "0" }
  ];
  for (const pct of icePctLevels) {
    rules.push({ pattern: `${pct}% ice`, match: "exact", kind: "ice", value: String(pct) });
  }
  for (const pct of sugarPctLevels) {
    rules.push({ pattern: `${pct}% sugar`, match: "exact", kind: "sugar", value: String(pct) });
  }
  return rules;
}

function canonicalRuleValue(rule: TokenRule): string {
  const value = rule.value.trim();
  if (rule.kind === "ice" || rule.kind === "sugar") {
    const lowered = value.toLowerCase();
    if (lowered === "no ice" || lowered === "no sugar" || lowered === "none") return "0";
    return lowered.replace(/\s*%.*$/, "");
  }
  if (rule.kind === "tea_override") {
    return TEA_VALUE_ALIASES[value] ?? value;
  }
  return value;
}

/**
 * Maps free-text modifier tokens to canonical categories using an ordered,
 * immutable rule table. First matching rule wins; a token nothing matches
 * comes back as kind "unknown" carrying the raw text.
 */
export class TokenResolver {
  private readonly rules: readonly CompiledRule[];

  constructor(rules: TokenRule[]) {
    const issues: ConfigurationIssue[] = [];
    const compiled: CompiledRule[] = [];

    rules.forEach((rule, idx) => {
      const needle = normalizeTokenLabel(rule.pattern);
      const value = canonicalRuleValue(rule);
      if (!needle) {
        issues.push({ table: "modifier_token_map", rowNumber: idx + 1, message: "pattern is empty" });
        return;
      }
      if (rule.kind === "ice" && !isIcePct(Number(value))) {
        issues.push({
          table: "modifier_token_map",
          rowNumber: idx + 1,
          message: `ice value "${rule.value}" for "${rule.pattern}" is not one of ${icePctLevels.join(", ")}`
        });
        return;
      }
      if (rule.kind === "sugar" && !isSugarPct(Number(value))) {
        issues.push({
          table: "modifier_token_map",
          rowNumber: idx + 1,
          message: `sugar value "${rule.value}" for "${rule.pattern}" is not one of ${sugarPctLevels.join(", ")}`
        });
        return;
      }
      compiled.push(Object.freeze({ ...rule, value, needle }));
    });

    if (issues.length > 0) {
      throw new ConfigurationError(ErrorCode.INVALID_REFERENCE_ROW, "Invalid modifier token rules", issues);
    }
    this.rules = Object.freeze(compiled);
  }

  get size(): number {
    return this.rules.length;
  }

  resolve(rawToken: string): ModifierToken {
    const raw = rawToken.trim();
    const { label, quantity } = parseTokenQuantity(raw);
    const haystack = normalizeTokenLabel(label);

    for (const rule of this.rules) {
      const hit = rule.match === "exact" ? haystack === rule.needle : haystack.includes(rule.needle);
      if (hit) {
        return { kind: rule.kind, value: rule.value, raw, quantity };
      }
    }
    return { kind: "unknown", value: raw, raw, quantity };
  }

  tokenize(modifierText: string): ModifierToken[] {
    return splitModifierText(modifierText).map((token) => this.resolve(token));
  }
}

import { ConfigurationError, ErrorCode, type Blend } from "@teabase/contracts";

export const BLEND_SUM_TOLERANCE = 1e-6;

export function blendWeightSum(blend: Blend): number {
  return Object.values(blend).reduce((sum, share) => sum + share, 0);
}

export function isNormalizedBlend(blend: Blend): boolean {
  const entries = Object.values(blend);
  if (entries.length === 0) return false;
  if (entries.some((share) => !Number.isFinite(share) || share < 0)) return false;
  return Math.abs(blendWeightSum(blend) - 1) <= BLEND_SUM_TOLERANCE;
}

export function assertNormalizedBlend(blend: Blend, table: string, label: string): void {
  if (isNormalizedBlend(blend)) return;
  throw new ConfigurationError(ErrorCode.BLEND_SHARE_SUM, `Blend shares for ${label} must sum to 1`, [
    { table, rowNumber: null, message: `${label}: shares ${formatBlend(blend)} sum to ${blendWeightSum(blend)}` }
  ]);
}

/**
 * Parse "genmai:0.5|green:0.5". A bare name ("green") is a single-tea blend.
 * Returns null for empty input or malformed shares.
 */
export function parseBlendExpression(expression: string): Blend | null {
  const parts = expression
    .split("|")
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length === 0) return null;

  const blend: Blend = {};
  for (const part of parts) {
    const [name = "", share] = part.split(":", 2).map((x) => x.trim());
    if (!name) return null;
    const value = share === undefined ? 1 : Number(share);
    if (share !== undefined && (share === "" || !Number.isFinite(value))) return null;
    blend[name] = (blend[name] ?? 0) + value;
  }
  return sortBlend(blend);
}

export function sortBlend(blend: Blend): Blend {
  const sorted: Blend = {};
  for (const name of Object.keys(blend).sort()) {
    const share = blend[name];
    if (share !== undefined) sorted[name] = share;
  }
  return sorted;
}

export function formatBlend(blend: Blend): string {
  return Object.entries(sortBlend(blend))
    .map(([name, share]) => `${name}:${share}`)
    .join("|");
}

/** Round half up (0.5 -> 1), not banker's rounding. */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

/** Round to two decimals for presentation tables. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

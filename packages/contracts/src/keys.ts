/**
 * Normalize a menu label into a join key: lowercase, runs of anything other
 * than a-z/0-9 collapsed to "_", no leading/trailing underscores.
 *   "Mosa Signature" -> "mosa_signature", "TGY Special!" -> "tgy_special"
 */
export function normKey(value: string | null | undefined): string {
  const s = (value ?? "").toLowerCase().trim().replace(/[^a-z0-9]+/g, "_");
  return s.replace(/^_+|_+$/g, "");
}

export function menuKey(categoryKey: string, itemKey: string): string {
  return `${categoryKey}::${itemKey}`;
}

export type UnknownTokenReportRow = {
  token: string;
  count: number;
};

/**
 * Occurrence counts of modifier tokens no rule recognized. Passed into the
 * canonicalizer and handed back with its output; callers merge audits from
 * separate passes. Reports are sorted by token so the result never depends on
 * row order.
 */
export class UnknownTokenAudit {
  private readonly counts = new Map<string, number>();

  record(token: string, occurrences = 1): void {
    const key = token.trim();
    if (!key || occurrences <= 0) return;
    this.counts.set(key, (this.counts.get(key) ?? 0) + occurrences);
  }

  merge(other: UnknownTokenAudit): this {
    for (const row of other.toReport()) {
      this.record(row.token, row.count);
    }
    return this;
  }

  count(token: string): number {
    return this.counts.get(token.trim()) ?? 0;
  }

  get distinctCount(): number {
    return this.counts.size;
  }

  get occurrenceCount(): number {
    let total = 0;
    for (const count of this.counts.values()) total += count;
    return total;
  }

  toReport(): UnknownTokenReportRow[] {
    return [...this.counts.entries()]
      .map(([token, count]) => ({ token, count }))
      .sort((a, b) => (a.token < b.token ? -1 : a.token > b.token ? 1 : 0));
  }

  toRecord(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const row of this.toReport()) out[row.token] = row.count;
    return out;
  }
}

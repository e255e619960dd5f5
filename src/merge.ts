import type { CanonicalStore, DayRecord } from "./types.js";

export interface MergeSummary {
  added: number;
  replaced: number;
  unchanged: number;
}

export interface MergeResult {
  store: CanonicalStore;
  summary: MergeSummary;
}

function sameDay(a: DayRecord, b: DayRecord): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Replace-or-insert by date. Upstream totals are cumulative for the day, so a
 * re-fetched day overwrites what was stored rather than adding to it.
 * `lastUpdated` never moves backwards.
 */
export function mergeActivity(store: CanonicalStore, incoming: readonly DayRecord[], now: Date): MergeResult {
  const byDate = new Map<string, DayRecord>();
  for (const record of store.readingActivity) {
    byDate.set(record.date, record);
  }

  const summary: MergeSummary = { added: 0, replaced: 0, unchanged: 0 };
  for (const record of incoming) {
    const existing = byDate.get(record.date);
    if (!existing) summary.added += 1;
    else if (sameDay(existing, record)) summary.unchanged += 1;
    else summary.replaced += 1;
    byDate.set(record.date, record);
  }

  const previous = store.lastUpdated ? Date.parse(store.lastUpdated) : Number.NaN;
  const lastUpdated = store.lastUpdated && previous > now.getTime() ? store.lastUpdated : now.toISOString();

  return {
    store: {
      lastUpdated,
      readingActivity: [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date))
    },
    summary
  };
}

import { describe, it, expect } from "vitest";
import { mergeActivity } from "../src/merge.js";
import { buildDayRecord } from "../src/normalize.js";
import { emptyStore } from "../src/store.js";
import type { CanonicalStore, DayRecord } from "../src/types.js";

const NOW = new Date("2026-01-21T08:00:00.000Z");

function day(date: string, ...books: Array<[asin: string, seconds: number]>): DayRecord {
  return buildDayRecord(
    date,
    books.map(([asin, seconds]) => ({ title: `Title ${asin}`, asin, durationSeconds: seconds, sessions: 1 }))
  );
}

describe("mergeActivity", () => {
  it("replaces a re-fetched day instead of adding to it", () => {
    const store: CanonicalStore = {
      lastUpdated: "2026-01-20T12:00:00.000Z",
      readingActivity: [day("2026-01-20", ["X", 3600])]
    };

    const { store: merged, summary } = mergeActivity(store, [day("2026-01-20", ["X", 5400])], NOW);

    expect(merged.readingActivity).toHaveLength(1);
    expect(merged.readingActivity[0].totalSeconds).toBe(5400);
    expect(merged.readingActivity[0].books[0].durationSeconds).toBe(5400);
    expect(summary).toEqual({ added: 0, replaced: 1, unchanged: 0 });
  });

  it("inserts new days and keeps the list sorted by date", () => {
    const store: CanonicalStore = {
      lastUpdated: null,
      readingActivity: [day("2026-01-05", ["A", 60]), day("2026-01-10", ["A", 60])]
    };

    const { store: merged, summary } = mergeActivity(
      store,
      [day("2026-01-12", ["B", 30]), day("2026-01-01", ["C", 90]), day("2026-01-10", ["A", 60])],
      NOW
    );

    expect(merged.readingActivity.map((record) => record.date)).toEqual([
      "2026-01-01",
      "2026-01-05",
      "2026-01-10",
      "2026-01-12"
    ]);
    expect(summary).toEqual({ added: 2, replaced: 0, unchanged: 1 });
    expect(merged.lastUpdated).toBe("2026-01-21T08:00:00.000Z");
  });

  it("is idempotent", () => {
    const store: CanonicalStore = {
      lastUpdated: "2026-01-19T00:00:00.000Z",
      readingActivity: [day("2026-01-18", ["A", 100]), day("2026-01-19", ["A", 200])]
    };
    const incoming = [day("2026-01-19", ["A", 250], ["B", 50]), day("2026-01-20", ["B", 75])];

    const once = mergeActivity(store, incoming, NOW).store;
    const twice = mergeActivity(once, incoming, NOW).store;

    expect(twice).toEqual(once);
  });

  it("never stores two records for the same date", () => {
    let store = emptyStore();
    for (const seconds of [60, 120, 180]) {
      store = mergeActivity(store, [day("2026-01-15", ["A", seconds]), day("2026-01-16", ["A", seconds])], NOW).store;
    }

    const dates = store.readingActivity.map((record) => record.date);
    expect(dates).toEqual(["2026-01-15", "2026-01-16"]);
    expect(store.readingActivity[0].totalSeconds).toBe(180);
  });

  it("keeps lastUpdated from moving backwards", () => {
    const store: CanonicalStore = { lastUpdated: "2026-02-01T00:00:00.000Z", readingActivity: [] };
    expect(mergeActivity(store, [], NOW).store.lastUpdated).toBe("2026-02-01T00:00:00.000Z");
  });

  it("does not touch the input store", () => {
    const store: CanonicalStore = { lastUpdated: null, readingActivity: [day("2026-01-20", ["X", 10])] };
    mergeActivity(store, [day("2026-01-20", ["X", 20])], NOW);
    expect(store.readingActivity[0].totalSeconds).toBe(10);
    expect(store.lastUpdated).toBeNull();
  });
});

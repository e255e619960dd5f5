import { describe, it, expect } from "vitest";
import {
  computeFetchWindow,
  daysBetween,
  epochToDate,
  isBeyondRetention,
  isIsoDate,
  partitionWindow,
  shiftDate,
  todayIn,
  windowToEpochRange
} from "../src/window.js";
import { emptyStore } from "../src/store.js";
import { buildDayRecord } from "../src/normalize.js";
import type { CanonicalStore } from "../src/types.js";

function storeWith(...dates: string[]): CanonicalStore {
  return {
    lastUpdated: "2026-03-01T00:00:00.000Z",
    readingActivity: dates.map((date) => buildDayRecord(date, [{ title: "T", asin: "X", durationSeconds: 60, sessions: 1 }]))
  };
}

describe("computeFetchWindow", () => {
  it("bootstraps the last 120 days ending today on an empty store", () => {
    const window = computeFetchWindow(emptyStore(), "2026-03-15");
    expect(window).toEqual({ startDate: "2025-11-16", endDate: "2026-03-15" });
    expect(daysBetween(window.endDate, window.startDate) + 1).toBe(120);
  });

  it("starts at the newest stored day when data exists", () => {
    const window = computeFetchWindow(storeWith("2026-01-02", "2026-03-10", "2026-02-20"), "2026-03-15");
    expect(window).toEqual({ startDate: "2026-03-10", endDate: "2026-03-15" });
  });
});

describe("partitionWindow", () => {
  it("tiles the window with weeks and a clipped tail", () => {
    expect(partitionWindow({ startDate: "2026-03-01", endDate: "2026-03-16" })).toEqual([
      { startDate: "2026-03-01", endDate: "2026-03-07" },
      { startDate: "2026-03-08", endDate: "2026-03-14" },
      { startDate: "2026-03-15", endDate: "2026-03-16" }
    ]);
  });

  it("covers the bootstrap window with no gaps or overlaps", () => {
    const window = { startDate: "2025-11-16", endDate: "2026-03-15" };
    const parts = partitionWindow(window);

    expect(parts).toHaveLength(18);
    expect(parts[0].startDate).toBe(window.startDate);
    expect(parts[parts.length - 1]).toEqual({ startDate: "2026-03-15", endDate: "2026-03-15" });
    for (const part of parts) {
      expect(daysBetween(part.endDate, part.startDate)).toBeLessThanOrEqual(6);
    }
    for (let i = 1; i < parts.length; i++) {
      expect(parts[i].startDate).toBe(shiftDate(parts[i - 1].endDate, 1));
    }
  });

  it("returns a single one-day window when start equals end", () => {
    expect(partitionWindow({ startDate: "2026-03-15", endDate: "2026-03-15" })).toEqual([
      { startDate: "2026-03-15", endDate: "2026-03-15" }
    ]);
  });

  it("returns nothing for an inverted window", () => {
    expect(partitionWindow({ startDate: "2026-03-16", endDate: "2026-03-15" })).toEqual([]);
  });
});

describe("isBeyondRetention", () => {
  it("flags weeks that ended more than 90 days ago", () => {
    expect(isBeyondRetention({ startDate: "2025-12-07", endDate: "2025-12-13" }, "2026-03-15")).toBe(true);
    expect(isBeyondRetention({ startDate: "2025-12-14", endDate: "2025-12-20" }, "2026-03-15")).toBe(false);
    expect(isBeyondRetention({ startDate: "2025-12-09", endDate: "2025-12-15" }, "2026-03-15")).toBe(false);
  });
});

describe("time zone conversions", () => {
  it("spans local midnights, including a DST change", () => {
    expect(windowToEpochRange({ startDate: "2026-03-02", endDate: "2026-03-08" }, "America/Los_Angeles")).toEqual({
      startTime: 1772438400,
      endTime: 1773039600
    });
  });

  it("maps an interval start back to its calendar day", () => {
    expect(epochToDate(1768896000, "America/Los_Angeles")).toBe("2026-01-20");
    expect(epochToDate(1768896000, "UTC")).toBe("2026-01-20");
    expect(epochToDate(1768896000 - 1, "America/Los_Angeles")).toBe("2026-01-19");
  });

  it("reads today in the household zone", () => {
    const now = new Date("2026-03-16T05:00:00Z");
    expect(todayIn("America/Los_Angeles", now)).toBe("2026-03-15");
    expect(todayIn("UTC", now)).toBe("2026-03-16");
  });

  it("rejects an unknown zone", () => {
    expect(() => todayIn("Not/AZone", new Date())).toThrow("Invalid time zone 'Not/AZone'");
  });
});

describe("isIsoDate", () => {
  it("accepts real calendar dates only", () => {
    expect(isIsoDate("2026-02-28")).toBe(true);
    expect(isIsoDate("2026-02-30")).toBe(false);
    expect(isIsoDate("2026-2-3")).toBe(false);
    expect(isIsoDate(20260228)).toBe(false);
  });
});

import { isRecord, type JsonObject } from "./json.js";
import { debug } from "./log.js";
import { epochToDate } from "./window.js";
import type { BookEntry, DayRecord, IsoDate, RawWeekPayload } from "./types.js";

function arrayAt(obj: JsonObject, key: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

export function roundMinutes(totalSeconds: number): number {
  return Math.round((totalSeconds / 60) * 10) / 10;
}

export function compareBooks(a: BookEntry, b: BookEntry): number {
  if (a.durationSeconds !== b.durationSeconds) return b.durationSeconds - a.durationSeconds;
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  return a.asin < b.asin ? -1 : a.asin > b.asin ? 1 : 0;
}

/** Derives the totals from the books; the only way a DayRecord is built. */
export function buildDayRecord(date: IsoDate, books: BookEntry[]): DayRecord {
  const sorted = [...books].sort(compareBooks);
  const totalSeconds = sorted.reduce((sum, book) => sum + book.durationSeconds, 0);
  return { date, totalSeconds, totalMinutes: roundMinutes(totalSeconds), books: sorted };
}

/**
 * Reads one `aggregatedActivityResults[]` entry. Returns the reason instead of
 * a book when a required field is missing or out of range.
 */
export function parseBookEntry(raw: unknown): BookEntry | string {
  if (!isRecord(raw)) return "entry is not an object";
  const attrs = isRecord(raw.attributes) ? raw.attributes : {};

  const asin = attrs.ORIGINAL_KEY;
  if (typeof asin !== "string" || !asin.trim()) return "missing ORIGINAL_KEY";

  const duration = raw.activityDuration;
  if (typeof duration !== "number" || !Number.isInteger(duration) || duration < 0) {
    return `invalid activityDuration ${JSON.stringify(duration)}`;
  }

  const count = raw.activityCount;
  if (typeof count !== "number" || !Number.isInteger(count) || count < 1) {
    return `invalid activityCount ${JSON.stringify(count)}`;
  }

  const title = typeof attrs.TITLE === "string" && attrs.TITLE.trim() ? attrs.TITLE.trim() : "Unknown";
  const thumbnail = typeof attrs.THUMBNAIL_URL === "string" && attrs.THUMBNAIL_URL.trim() ? attrs.THUMBNAIL_URL.trim() : undefined;

  return {
    title,
    asin: asin.trim(),
    durationSeconds: duration,
    sessions: count,
    ...(thumbnail ? { thumbnail } : {})
  };
}

function addBook(day: Map<string, BookEntry>, book: BookEntry) {
  const existing = day.get(book.asin);
  if (!existing) {
    day.set(book.asin, { ...book });
    return;
  }
  existing.durationSeconds += book.durationSeconds;
  existing.sessions += book.sessions;
  if (existing.title === "Unknown" && book.title !== "Unknown") existing.title = book.title;
  if (!existing.thumbnail && book.thumbnail) existing.thumbnail = book.thumbnail;
}

/**
 * Flattens weekly payloads into one record per calendar day, summing each
 * book across every child and payload that reports that day. Non-2xx
 * payloads are ignored, as are intervals outside their payload's window.
 */
export function normalizeWeeks(payloads: readonly RawWeekPayload[], { timeZone }: { timeZone: string }): DayRecord[] {
  const days = new Map<IsoDate, Map<string, BookEntry>>();

  for (const payload of payloads) {
    if (payload.status < 200 || payload.status >= 300 || !isRecord(payload.body)) continue;

    for (const category of arrayAt(payload.body, "activityV2Data")) {
      if (!isRecord(category)) continue;

      for (const interval of arrayAt(category, "intervals")) {
        if (!isRecord(interval) || typeof interval.startTime !== "number") continue;

        const date = epochToDate(interval.startTime, timeZone);
        if (!date) continue;
        if (date < payload.window.startDate || date > payload.window.endDate) {
          debug(`Interval ${date} outside ${payload.window.startDate}..${payload.window.endDate}; skipped`);
          continue;
        }

        for (const entry of arrayAt(interval, "aggregatedActivityResults")) {
          const parsed = parseBookEntry(entry);
          if (typeof parsed === "string") {
            console.warn(`⚠️  [${date}] Dropping book entry for child ${payload.childId}: ${parsed}`);
            continue;
          }
          let day = days.get(date);
          if (!day) {
            day = new Map();
            days.set(date, day);
          }
          addBook(day, parsed);
        }
      }
    }
  }

  return [...days.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, books]) => buildDayRecord(date, [...books.values()]));
}

import { addDays, differenceInCalendarDays, format, isValid, parse, parseISO } from "date-fns";
import { DateTime } from "luxon";
import type { CanonicalStore, FetchWindow, IsoDate } from "./types.js";

export const BOOTSTRAP_DAYS = 120;
export const RETENTION_DAYS = 90;
export const MAX_SUBWINDOW_DAYS = 7;

const DATE_FORMAT = "yyyy-MM-dd";

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  return isValid(parse(value, DATE_FORMAT, new Date()));
}

export function shiftDate(date: IsoDate, days: number): IsoDate {
  return format(addDays(parseISO(date), days), DATE_FORMAT);
}

export function daysBetween(later: IsoDate, earlier: IsoDate): number {
  return differenceInCalendarDays(parseISO(later), parseISO(earlier));
}

/** Today's calendar date as the household's time zone sees it. */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  const local = DateTime.fromJSDate(now, { zone: timeZone });
  const iso = local.isValid ? local.toISODate() : null;
  if (!iso) {
    throw new Error(`Invalid time zone '${timeZone}'`);
  }
  return iso;
}

export function latestStoredDate(store: CanonicalStore): IsoDate | null {
  let latest: IsoDate | null = null;
  for (const record of store.readingActivity) {
    if (!latest || record.date > latest) latest = record.date;
  }
  return latest;
}

/**
 * Bootstrap: the last BOOTSTRAP_DAYS calendar days ending today.
 * Incremental: from the newest stored day (re-fetched, it may have grown) to today.
 */
export function computeFetchWindow(
  store: CanonicalStore,
  today: IsoDate,
  bootstrapDays: number = BOOTSTRAP_DAYS
): FetchWindow {
  const latest = latestStoredDate(store);
  if (latest) {
    return { startDate: latest, endDate: today };
  }
  return { startDate: shiftDate(today, -(bootstrapDays - 1)), endDate: today };
}

/**
 * Consecutive sub-windows of at most MAX_SUBWINDOW_DAYS days that tile the
 * window exactly, oldest first. An empty or inverted window yields none.
 */
export function partitionWindow(window: FetchWindow, maxDays: number = MAX_SUBWINDOW_DAYS): FetchWindow[] {
  const parts: FetchWindow[] = [];
  let cursor = window.startDate;
  while (cursor <= window.endDate) {
    const candidateEnd = shiftDate(cursor, maxDays - 1);
    const endDate = candidateEnd < window.endDate ? candidateEnd : window.endDate;
    parts.push({ startDate: cursor, endDate });
    cursor = shiftDate(endDate, 1);
  }
  return parts;
}

export function isBeyondRetention(
  subWindow: FetchWindow,
  today: IsoDate,
  retentionDays: number = RETENTION_DAYS
): boolean {
  return daysBetween(today, subWindow.endDate) > retentionDays;
}

/** Epoch seconds of local midnight opening `startDate` and closing `endDate`. */
export function windowToEpochRange(window: FetchWindow, timeZone: string): { startTime: number; endTime: number } {
  const start = DateTime.fromISO(window.startDate, { zone: timeZone }).startOf("day");
  const end = DateTime.fromISO(window.endDate, { zone: timeZone }).plus({ days: 1 }).startOf("day");
  if (!start.isValid || !end.isValid) {
    throw new Error(`Cannot convert ${window.startDate}..${window.endDate} in zone '${timeZone}'`);
  }
  return { startTime: Math.floor(start.toSeconds()), endTime: Math.floor(end.toSeconds()) };
}

export function epochToDate(epochSeconds: number, timeZone: string): IsoDate | null {
  const dt = DateTime.fromSeconds(epochSeconds, { zone: timeZone });
  return dt.isValid ? dt.toISODate() : null;
}

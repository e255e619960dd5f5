import type { ActivityTransport, TransportResponse, WeeklyActivityRequest } from "../src/fetcher.js";
import { epochToDate, shiftDate, windowToEpochRange } from "../src/window.js";
import type { FetchWindow, IsoDate, RawWeekPayload, Session } from "../src/types.js";

export const TZ = "America/Los_Angeles";

export interface FakeBook {
  asin: string;
  duration: number;
  count?: number;
  title?: string;
}

export function makeSession(children: Array<[string, string]> = [["child-a", "Ada"]]): Session {
  const childNames = new Map(children);
  return {
    childIds: new Set(childNames.keys()),
    childNames,
    csrfToken: "test-csrf",
    cookies: []
  };
}

export function interval(date: IsoDate, books: FakeBook[], timeZone: string = TZ) {
  const { startTime, endTime } = windowToEpochRange({ startDate: date, endDate: date }, timeZone);
  return {
    startTime,
    endTime,
    aggregatedDuration: books.reduce((sum, book) => sum + book.duration, 0),
    aggregatedActivityResults: books.map((book) => ({
      activityDuration: book.duration,
      activityCount: book.count ?? 1,
      attributes: {
        TITLE: book.title ?? `Book ${book.asin}`,
        ORIGINAL_KEY: book.asin,
        THUMBNAIL_URL: `https://images.example.test/${book.asin}.jpg`
      }
    }))
  };
}

export function weekBody(intervals: unknown[]) {
  return { activityV2Data: [{ activityType: "BOOK", intervals }] };
}

export function payload(childId: string, window: FetchWindow, body: unknown, status = 200): RawWeekPayload {
  return { childId, window, status, body };
}

export function datesOf(request: WeeklyActivityRequest, timeZone: string = TZ): IsoDate[] {
  const first = epochToDate(request.startTime, timeZone);
  const last = epochToDate(request.endTime - 1, timeZone);
  const dates: IsoDate[] = [];
  if (!first || !last) return dates;
  for (let date = first; date <= last; date = shiftDate(date, 1)) {
    dates.push(date);
  }
  return dates;
}

/** A response reporting the same books for every day the request covers. */
export function dailyResponse(request: WeeklyActivityRequest, books: FakeBook[]): TransportResponse {
  return { status: 200, body: weekBody(datesOf(request).map((date) => interval(date, books))) };
}

export function fakeTransport(
  handler: (request: WeeklyActivityRequest) => TransportResponse | Promise<TransportResponse>
) {
  const requests: WeeklyActivityRequest[] = [];
  const state = { disposed: false };
  const transport: ActivityTransport = {
    async postWeeklyActivity(request) {
      requests.push(request);
      return handler(request);
    },
    async dispose() {
      state.disposed = true;
    }
  };
  return { transport, requests, state };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

export function noSleep() {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    }
  };
}

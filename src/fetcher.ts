import { request as pwRequest } from "playwright";
import { FetchError, describeError } from "./errors.js";
import { isRecord } from "./json.js";
import { debug } from "./log.js";
import { isBeyondRetention, partitionWindow, RETENTION_DAYS, windowToEpochRange } from "./window.js";
import type { FetchWindow, IsoDate, RawWeekPayload, Session } from "./types.js";

export const DASHBOARD_ORIGIN = "https://www.amazon.com";
export const ACTIVITIES_PATH = "/parentdashboard/ajax/get-weekly-activities-v2";
export const AGGREGATION_INTERVAL_SECONDS = 86400;

const MAX_RETRIES = 3;
const DEFAULT_DELAY_MS = 300;
const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:120.0) Gecko/20100101 Firefox/120.0";

export interface WeeklyActivityRequest {
  childDirectedId: string;
  startTime: number;
  endTime: number;
  aggregationInterval: number;
  timeZone: string;
}

export interface TransportResponse {
  status: number;
  body: unknown;
}

export interface ActivityTransport {
  postWeeklyActivity(body: WeeklyActivityRequest): Promise<TransportResponse>;
  dispose(): Promise<void>;
}

export type FetchOutcome =
  | { kind: "ok"; childId: string; window: FetchWindow; payload: RawWeekPayload }
  | { kind: "retention-expired"; childId: string; window: FetchWindow; status: number };

export interface FetchOptions {
  transport: ActivityTransport;
  timeZone: string;
  today: IsoDate;
  retentionDays?: number;
  maxRetries?: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number) {
  return Math.min(2000 * (attempt + 1), 8000);
}

function isSuccess(status: number) {
  return status >= 200 && status < 300;
}

/** Non-JSON text comes back as a string, which never counts as a payload. */
export function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text.slice(0, 500);
  }
}

export function buildApiHeaders(session: Session): Record<string, string> {
  return {
    accept: "application/json, text/plain, */*",
    "content-type": "application/json;charset=UTF-8",
    origin: DASHBOARD_ORIGIN,
    referer: `${DASHBOARD_ORIGIN}/parentdashboard/activities/household-summary`,
    "user-agent": DEFAULT_USER_AGENT,
    "x-amzn-csrf": session.csrfToken
  };
}

/** API client that carries the browser session's cookies and CSRF header. */
export async function createPlaywrightTransport(session: Session): Promise<ActivityTransport> {
  const request = await pwRequest.newContext({
    baseURL: DASHBOARD_ORIGIN,
    storageState: { cookies: [...session.cookies], origins: [] },
    extraHTTPHeaders: buildApiHeaders(session)
  });

  return {
    async postWeeklyActivity(body) {
      const resp = await request.post(ACTIVITIES_PATH, { data: body, failOnStatusCode: false });
      const text = await resp.text();
      return { status: resp.status(), body: parseBody(text) };
    },
    dispose: () => request.dispose()
  };
}

async function fetchOne(
  request: WeeklyActivityRequest,
  window: FetchWindow,
  label: string,
  opts: Required<Omit<FetchOptions, "timeZone">>
): Promise<FetchOutcome> {
  const childId = request.childDirectedId;

  for (let attempt = 0; ; attempt++) {
    let response: TransportResponse;
    try {
      response = await opts.transport.postWeeklyActivity(request);
    } catch (err) {
      response = { status: 0, body: { _error: describeError(err) } };
    }

    const { status, body } = response;
    if (isSuccess(status) && isRecord(body)) {
      return { kind: "ok", childId, window, payload: { childId, window, status, body } };
    }

    if (status >= 500 && isBeyondRetention(window, opts.today, opts.retentionDays)) {
      console.log(`ℹ️  ${label} - HTTP ${status}, older than ${opts.retentionDays} days; skipped`);
      return { kind: "retention-expired", childId, window, status };
    }

    debug(`${label} response: ${String(JSON.stringify(body)).slice(0, 200)}`);
    if (attempt >= opts.maxRetries) {
      throw new FetchError(
        `Weekly activity for ${window.startDate}..${window.endDate} (child ${childId}) failed after ${attempt + 1} attempts: HTTP ${status}`,
        status
      );
    }

    const wait = backoffDelay(attempt);
    console.warn(`⚠️  ${label} - HTTP ${status}; retrying in ${wait} ms (${attempt + 1}/${opts.maxRetries})`);
    await opts.sleep(wait);
  }
}

/**
 * Walks the window one week at a time, oldest first, asking for each child in
 * turn. Calls are strictly sequential. Retention-expired weeks come back as
 * outcomes; a week that keeps failing inside retention throws FetchError.
 */
export async function* fetchWeeks(
  session: Session,
  window: FetchWindow,
  options: FetchOptions
): AsyncGenerator<FetchOutcome> {
  const opts = {
    transport: options.transport,
    today: options.today,
    retentionDays: options.retentionDays ?? RETENTION_DAYS,
    maxRetries: options.maxRetries ?? MAX_RETRIES,
    delayMs: options.delayMs ?? DEFAULT_DELAY_MS,
    sleep: options.sleep ?? sleep
  };

  const weeks = partitionWindow(window);
  let calls = 0;

  for (const [index, week] of weeks.entries()) {
    const { startTime, endTime } = windowToEpochRange(week, options.timeZone);

    for (const childId of session.childIds) {
      const name = session.childNames.get(childId) ?? childId;
      const label = `[${name}] Week ${index + 1}/${weeks.length}: ${week.startDate} to ${week.endDate}`;

      if (calls > 0 && opts.delayMs > 0) {
        await opts.sleep(opts.delayMs);
      }
      calls += 1;

      const outcome = await fetchOne(
        {
          childDirectedId: childId,
          startTime,
          endTime,
          aggregationInterval: AGGREGATION_INTERVAL_SECONDS,
          timeZone: options.timeZone
        },
        week,
        label,
        opts
      );
      if (outcome.kind === "ok") {
        console.log(`  ${label} - OK`);
      }
      yield outcome;
    }
  }
}

import type { Cookie } from "playwright";

/** Calendar date in `yyyy-MM-dd` form. */
export type IsoDate = string;

export interface FetchWindow {
  startDate: IsoDate;
  endDate: IsoDate;
}

/**
 * Authenticated dashboard session harvested during login. Never persisted.
 */
export interface Session {
  readonly childIds: ReadonlySet<string>;
  /** Display names for log lines, keyed by child id. */
  readonly childNames: ReadonlyMap<string, string>;
  readonly csrfToken: string;
  readonly cookies: readonly Cookie[];
}

/** One weekly-activity response for one child and one sub-window. */
export interface RawWeekPayload {
  childId: string;
  window: FetchWindow;
  status: number;
  body: unknown;
}

export interface BookEntry {
  title: string;
  asin: string;
  durationSeconds: number;
  sessions: number;
  thumbnail?: string;
}

export interface DayRecord {
  date: IsoDate;
  totalSeconds: number;
  totalMinutes: number;
  books: BookEntry[];
}

export interface CanonicalStore {
  lastUpdated: string | null;
  /** Sorted by date, one record per date. */
  readingActivity: DayRecord[];
}

export interface CredentialProvider {
  getEmail(): Promise<string>;
  getPassword(): Promise<string>;
  getOtp(): Promise<string | null>;
}

import { promises as fsPromises } from "node:fs";
import path from "node:path";
import { format } from "date-fns";
import { StoreError } from "./errors.js";
import { isRecord } from "./json.js";
import { isIsoDate } from "./window.js";
import { buildDayRecord } from "./normalize.js";
import type { BookEntry, CanonicalStore, DayRecord, FetchWindow, RawWeekPayload } from "./types.js";

const { mkdir, writeFile, rename, rm, readFile } = fsPromises;

export const CANONICAL_FILENAME = "reading_data.json";

interface WireBook {
  title: string;
  asin: string;
  duration_seconds: number;
  sessions: number;
  thumbnail: string | null;
}

interface WireDay {
  date: string;
  total_seconds: number;
  total_minutes: number;
  books: WireBook[];
}

interface WireStore {
  last_updated: string | null;
  reading_activity: WireDay[];
}

export function emptyStore(): CanonicalStore {
  return { lastUpdated: null, readingActivity: [] };
}

export function toWire(store: CanonicalStore): WireStore {
  const days = [...store.readingActivity].sort((a, b) => a.date.localeCompare(b.date));
  return {
    last_updated: store.lastUpdated,
    reading_activity: days.map((day) => ({
      date: day.date,
      total_seconds: day.totalSeconds,
      total_minutes: day.totalMinutes,
      books: day.books.map((book) => ({
        title: book.title,
        asin: book.asin,
        duration_seconds: book.durationSeconds,
        sessions: book.sessions,
        thumbnail: book.thumbnail ?? null
      }))
    }))
  };
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function bookFromWire(raw: unknown): BookEntry | null {
  if (!isRecord(raw)) return null;
  const { title, asin, duration_seconds: durationSeconds, sessions, thumbnail } = raw;
  if (typeof asin !== "string" || !asin) return null;
  if (!isCount(durationSeconds) || !isCount(sessions)) return null;
  return {
    title: typeof title === "string" ? title : "Unknown",
    asin,
    durationSeconds,
    sessions,
    ...(typeof thumbnail === "string" && thumbnail ? { thumbnail } : {})
  };
}

function dayFromWire(raw: unknown, source: string): DayRecord | null {
  if (!isRecord(raw) || !isIsoDate(raw.date) || !Array.isArray(raw.books)) return null;
  const books: BookEntry[] = [];
  for (const entry of raw.books) {
    const book = bookFromWire(entry);
    if (!book) {
      console.warn(`⚠️  [${raw.date}] Dropping unreadable book from ${source}: ${String(JSON.stringify(entry)).slice(0, 200)}`);
      continue;
    }
    books.push(book);
  }
  // Totals are recomputed from the books so a hand-edited file cannot break conservation.
  return buildDayRecord(raw.date, books);
}

export function fromWire(raw: unknown, source = "store"): CanonicalStore {
  if (!isRecord(raw)) {
    throw new StoreError(`${source} does not contain a JSON object`);
  }
  const activity = raw.reading_activity ?? [];
  if (!Array.isArray(activity)) {
    throw new StoreError(`${source}: reading_activity must be an array`);
  }

  const byDate = new Map<string, DayRecord>();
  for (const entry of activity) {
    const day = dayFromWire(entry, source);
    if (!day) {
      console.warn(`⚠️  Dropping unreadable day entry from ${source}: ${String(JSON.stringify(entry)).slice(0, 200)}`);
      continue;
    }
    byDate.set(day.date, day);
  }

  const lastUpdated = typeof raw.last_updated === "string" ? raw.last_updated : null;
  const readingActivity = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
  return { lastUpdated, readingActivity };
}

export function serializeStore(store: CanonicalStore): string {
  return `${JSON.stringify(toWire(store), null, 2)}\n`;
}

export async function loadStore(storePath: string): Promise<CanonicalStore> {
  let text: string;
  try {
    text = await readFile(storePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return emptyStore();
    throw new StoreError(`Could not read ${storePath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new StoreError(`${storePath} is not valid JSON; refusing to overwrite it`, { cause: err });
  }
  return fromWire(parsed, storePath);
}

/** Writes beside the target and renames over it, so readers never see a partial file. */
export async function saveStore(storePath: string, store: CanonicalStore): Promise<void> {
  await mkdir(path.dirname(storePath), { recursive: true });
  const tempPath = `${storePath}.partial`;
  try {
    await writeFile(tempPath, serializeStore(store), "utf8");
    await rename(tempPath, storePath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch(() => undefined);
    throw new StoreError(`Could not save ${storePath}`, { cause: err });
  }
}

export interface SkippedWeek {
  childId: string;
  window: FetchWindow;
  status: number;
}

export interface SnapshotContents {
  window: FetchWindow;
  payloads: RawWeekPayload[];
  skipped: SkippedWeek[];
}

export function snapshotBaseName(timestamp: Date): string {
  return `fetch_${format(timestamp, "yyyy-MM-dd'T'HHmmss")}`;
}

/** Writes one run's raw payloads to a new file; existing snapshots are never touched. */
export async function archiveSnapshot(
  dir: string,
  contents: SnapshotContents,
  timestamp: Date
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const body = `${JSON.stringify(
    {
      fetched_at: timestamp.toISOString(),
      window: contents.window,
      raw_responses: contents.payloads,
      retention_expired: contents.skipped
    },
    null,
    2
  )}\n`;

  const base = snapshotBaseName(timestamp);
  for (let attempt = 0; ; attempt++) {
    const candidate = path.join(dir, attempt === 0 ? `${base}.json` : `${base}-${attempt}.json`);
    try {
      await writeFile(candidate, body, { encoding: "utf8", flag: "wx" });
      return candidate;
    } catch (err) {
      if (isAlreadyExists(err)) continue;
      throw err;
    }
  }
}

export function canonicalPath(dataDir: string) {
  return path.join(dataDir, CANONICAL_FILENAME);
}

function errorCode(err: unknown): unknown {
  return err && typeof err === "object" && "code" in err ? err.code : undefined;
}

function isMissingFile(err: unknown) {
  return errorCode(err) === "ENOENT";
}

function isAlreadyExists(err: unknown) {
  return errorCode(err) === "EEXIST";
}

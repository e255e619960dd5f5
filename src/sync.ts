import { fetchWeeks, type ActivityTransport, type FetchOptions } from "./fetcher.js";
import { mergeActivity, type MergeSummary } from "./merge.js";
import { normalizeWeeks } from "./normalize.js";
import { archiveSnapshot, canonicalPath, loadStore, saveStore, type SkippedWeek } from "./store.js";
import { computeFetchWindow, partitionWindow, todayIn } from "./window.js";
import type { CanonicalStore, FetchWindow, RawWeekPayload, Session } from "./types.js";

export interface SyncDeps {
  dataDir: string;
  timeZone: string;
  establish: () => Promise<Session>;
  createTransport: (session: Session) => Promise<ActivityTransport>;
  now?: () => Date;
  fetchOptions?: Pick<FetchOptions, "sleep" | "delayMs" | "maxRetries" | "retentionDays">;
}

export interface SyncResult {
  window: FetchWindow;
  fetchedWeeks: number;
  expiredWeeks: number;
  days: number;
  summary: MergeSummary | null;
  store: CanonicalStore;
  storePath: string;
  snapshotPath: string | null;
}

/**
 * One fetch-and-merge cycle. The canonical file is written once, at the end,
 * and only if every week inside the retention horizon was fetched.
 */
export async function runSync(deps: SyncDeps): Promise<SyncResult> {
  const now = deps.now ?? (() => new Date());
  const storePath = canonicalPath(deps.dataDir);
  const store = await loadStore(storePath);

  const today = todayIn(deps.timeZone, now());
  const window = computeFetchWindow(store, today);
  if (store.readingActivity.length > 0) {
    console.log(`🕒 Incremental fetch starting from existing latest day: ${window.startDate}`);
  } else {
    console.log(`🆕 No existing reading history; bootstrapping ${window.startDate} → ${window.endDate}`);
  }

  if (partitionWindow(window).length === 0) {
    console.log("ℹ️  Nothing to fetch; store is already ahead of today.");
    return {
      window,
      fetchedWeeks: 0,
      expiredWeeks: 0,
      days: 0,
      summary: null,
      store,
      storePath,
      snapshotPath: null
    };
  }

  const session = await deps.establish();
  const transport = await deps.createTransport(session);

  const payloads: RawWeekPayload[] = [];
  const skipped: SkippedWeek[] = [];
  try {
    for await (const outcome of fetchWeeks(session, window, {
      ...deps.fetchOptions,
      transport,
      timeZone: deps.timeZone,
      today
    })) {
      if (outcome.kind === "ok") {
        payloads.push(outcome.payload);
      } else {
        skipped.push({ childId: outcome.childId, window: outcome.window, status: outcome.status });
      }
    }
  } finally {
    await transport.dispose();
  }

  const records = normalizeWeeks(payloads, { timeZone: deps.timeZone });
  console.log(`📚 Fetched ${records.length} days of activity`);

  const runTime = now();
  const snapshotPath = await archiveSnapshot(deps.dataDir, { window, payloads, skipped }, runTime);
  console.log(`📄 Raw fetch saved to ${snapshotPath}`);

  const { store: merged, summary } = mergeActivity(store, records, runTime);
  await saveStore(storePath, merged);

  const total = merged.readingActivity.length;
  const first = merged.readingActivity[0];
  const last = merged.readingActivity[total - 1];
  console.log(
    `💯 Merged: ${total} total days (+${summary.added} new, ${summary.replaced} updated, ${summary.unchanged} unchanged)`
  );
  if (first && last) {
    console.log(`   Date range: ${first.date} to ${last.date}`);
  }
  console.log(`   Saved to ${storePath}`);

  return {
    window,
    fetchedWeeks: payloads.length,
    expiredWeeks: skipped.length,
    days: records.length,
    summary,
    store: merged,
    storePath,
    snapshotPath
  };
}

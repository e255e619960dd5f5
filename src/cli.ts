#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";
import { DEFAULT_DATA_DIR, loadConfig } from "./config.js";
import { OnePasswordCredentials } from "./credentials.js";
import { SyncError, describeError } from "./errors.js";
import { createPlaywrightTransport } from "./fetcher.js";
import { setDebug } from "./log.js";
import { establishSession } from "./session.js";
import { canonicalPath, loadStore } from "./store.js";
import { runSync } from "./sync.js";

interface SyncOpts {
  debug?: boolean;
  headless?: boolean;
  dataDir: string;
}

function fail(err: unknown): void {
  if (err instanceof SyncError) {
    console.error(`❌ ${err.message}`);
    process.exitCode = err.exitCode;
    return;
  }
  console.error("❌ Unexpected failure:", describeError(err));
  if (err instanceof Error && err.stack) console.error(err.stack);
  process.exitCode = 1;
}

const program = new Command();
program.name("reading-sync").description("Children's reading activity sync CLI").version("0.1.0");

program
  .command("sync", { isDefault: true })
  .description("Sign in → fetch weekly activity since the last stored day → merge into the canonical JSON")
  .option("--debug", "verbose logging and login screenshots", false)
  .option("--headless", "run the browser without a window (no manual verification possible)", false)
  .option("--data-dir <dir>", "where reading_data.json and raw snapshots live", DEFAULT_DATA_DIR)
  .action(async (opts: SyncOpts) => {
    setDebug(Boolean(opts.debug));
    const dataDir = path.resolve(opts.dataDir);
    try {
      const config = await loadConfig();
      const credentials = new OnePasswordCredentials(config.vault, config.item);
      console.log(`🔐 Using 1Password item '${config.item}' in vault '${config.vault}'`);

      await runSync({
        dataDir,
        timeZone: config.timeZone,
        establish: () => establishSession(credentials, { headless: opts.headless, debugDir: dataDir }),
        createTransport: createPlaywrightTransport
      });
    } catch (err) {
      fail(err);
    }
  });

program
  .command("summary")
  .description("Print what the canonical store holds, without signing in")
  .option("--data-dir <dir>", "where reading_data.json lives", DEFAULT_DATA_DIR)
  .action(async (opts: { dataDir: string }) => {
    try {
      const storePath = canonicalPath(path.resolve(opts.dataDir));
      const store = await loadStore(storePath);
      const days = store.readingActivity;
      if (days.length === 0) {
        console.log(`ℹ️  No reading activity stored in ${storePath}`);
        return;
      }
      const totalSeconds = days.reduce((sum, day) => sum + day.totalSeconds, 0);
      console.log(`📚 ${days.length} days, ${days[0].date} to ${days[days.length - 1].date}`);
      console.log(`⏱  ${Math.round((totalSeconds / 3600) * 10) / 10} hours of reading in total`);
      console.log(`🕒 Last updated ${store.lastUpdated ?? "never"}`);
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);

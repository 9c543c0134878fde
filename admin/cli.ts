import * as readline from "readline";
import Db, { type OpenMode } from "./db";
import * as D from "./log";
import { loadConfig } from "./config";
import { UsageError, UserNotFoundError } from "./errors";
import { loadSpammyFeeds } from "./spam";
import { exportRecentFeeds } from "./recentfeeds";
import { purgeUser, type PurgeIO } from "./purge";
import * as T from "./types";

export interface ConsoleIO extends PurgeIO {
  err(line: string): void;
}

export function processIO(): ConsoleIO {
  return {
    out: (line) => { process.stdout.write(line + "\n"); },
    err: (line) => { process.stderr.write(line + "\n"); },
    ask: (question) => new Promise((resolve) => {
      let rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      let answered = false;
      rl.on('close', () => { if (!answered) resolve(undefined); });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    }),
  };
}

export const exportUsage = "Usage: export_all_recent_feeds <days>";
export const purgeUsage = "Usage: hard_delete_all_data_for_username <username>";

// Upper bound keeps the cutoff inside the range a Date can hold.
const maxDays = 1000000;

export function parseDaysArg(args: string[]): number {
  if (args.length != 1 || !/^[0-9]+$/.test(args[0])) throw new UsageError(exportUsage);
  let days = +args[0];
  if (days > maxDays) throw new UsageError(exportUsage);
  return days;
}

export function parseUsernameArg(args: string[]): string {
  if (args.length != 1 || !args[0]) throw new UsageError(purgeUsage);
  return args[0];
}

export async function withDb<A>(file: string, mode: OpenMode, fn: (db: Db) => Promise<A>): Promise<A> {
  let db = await Db.open(file, mode);
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}

/**
 * Runs a script body and maps the outcome to an exit code. Usage and
 * not-found problems are reported as plain messages, anything else is
 * logged as an error.
 */
export async function runScript(io: ConsoleIO, body: () => Promise<void>): Promise<number> {
  try {
    await body();
    return 0;
  } catch (e) {
    if (e instanceof UsageError || e instanceof UserNotFoundError) {
      io.out(e.message);
    } else {
      D.error(e instanceof Error ? e.message : e);
    }
    return 1;
  }
}

export function printExport(res: T.RecentFeedsExport, spammyFeedsFile: string, io: ConsoleIO) {
  io.err(`Fetching feeds with posts more recent than ${res.cutoff}`);
  io.err(`Found ${res.spammyFeeds.length} spammy feeds in ${spammyFeedsFile}`);
  io.err(`Found ${res.urls.length} feeds with posts more recent than ${res.days} days`);
  for (let url of res.urls) io.out(url);
  for (let group of res.domains) {
    if (group.urls.length < 2) continue;
    io.err("");
    io.err(group.domain);
    for (let url of group.urls) io.err(`  '${url}'`);
  }
}

export function exportAllRecentFeeds(
  args: string[],
  io: ConsoleIO,
  env: NodeJS.ProcessEnv = process.env,
  now = new Date()
): Promise<number> {
  return runScript(io, async () => {
    let days = parseDaysArg(args);
    let config = loadConfig(env);
    D.level(config.debugLevel);
    let spammyFeeds = await loadSpammyFeeds(config.spammyFeedsFile);
    let res = await withDb(config.dbPath, 'readonly', (db) => exportRecentFeeds(db, days, spammyFeeds, now));
    printExport(res, config.spammyFeedsFile, io);
  });
}

export function hardDeleteAllDataForUsername(
  args: string[],
  io: ConsoleIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  return runScript(io, async () => {
    let username = parseUsernameArg(args);
    let config = loadConfig(env);
    D.level(config.debugLevel);
    await withDb(config.dbPath, 'readwrite', (db) => purgeUser(db, username, io));
  });
}

import type Db from "./db";
import * as T from "./types";
import * as D from "./log";
import { normalizeFeedUrl, feedDomain } from "./feedurl";
import { isSpammy } from "./spam";

function pad(n: number) {
  return n.toString().padStart(2, "0");
}

// Same layout as post.published_at, so the comparison in SQL is a plain
// string comparison. Subtracts calendar days in local time.
export function cutoffFor(days: number, now = new Date()): string {
  let d = new Date(now.getTime());
  d.setDate(d.getDate() - days);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function groupByDomain(urls: string[]): T.DomainGroup[] {
  let groups = new Map<string, string[]>();
  for (let url of urls) {
    let domain = feedDomain(url);
    let group = groups.get(domain);
    if (group) group.push(url);
    else groups.set(domain, [url]);
  }
  return Array.from(groups, ([domain, urls]) => ({ domain, urls }));
}

export function cleanFeedUrls(urls: string[], spammyFeeds: string[]): string[] {
  let normalized = urls.map(normalizeFeedUrl);
  let kept = normalized.filter((url) => !isSpammy(url, spammyFeeds));
  D.xdebug(6,`dropped ${normalized.length - kept.length} spammy feeds`);
  return Array.from(new Set(kept)).sort();
}

export async function exportRecentFeeds(
  db: Db,
  days: number,
  spammyFeeds: string[],
  now = new Date()
): Promise<T.RecentFeedsExport> {
  let cutoff = cutoffFor(days, now);
  let feeds = await db.getFeedsWithPostsAfter(cutoff);
  D.xdebug(6,`${feeds.length} feeds with posts after ${cutoff}`);
  let urls = cleanFeedUrls(feeds.map((f) => f.url), spammyFeeds);
  return {
    cutoff,
    days,
    spammyFeeds,
    urls,
    domains: groupByDomain(urls),
  };
}

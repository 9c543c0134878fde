import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Db from "./db";
import { cutoffFor, groupByDomain, cleanFeedUrls, exportRecentFeeds } from "./recentfeeds";
import { createStore, addFeed } from "./testutil";

describe("cutoffFor", () => {
  it("subtracts days and formats like published_at", () => {
    expect(cutoffFor(3, new Date(2024, 2, 15, 10, 5, 9))).toBe("2024-03-12 10:05:09");
  });

  it("is now for zero days", () => {
    expect(cutoffFor(0, new Date(2024, 2, 15, 10, 5, 9))).toBe("2024-03-15 10:05:09");
  });

  it("crosses month boundaries", () => {
    expect(cutoffFor(1, new Date(2024, 2, 1, 0, 0, 0))).toBe("2024-02-29 00:00:00");
  });
});

describe("groupByDomain", () => {
  it("groups in order of first appearance", () => {
    expect(groupByDomain([
      "https://a.example/1",
      "https://a.example/2",
      "https://b.example/feed",
    ])).toEqual([
      { domain: "a.example", urls: ["https://a.example/1", "https://a.example/2"] },
      { domain: "b.example", urls: ["https://b.example/feed"] },
    ]);
  });
});

describe("cleanFeedUrls", () => {
  it("normalizes, drops spam, deduplicates and sorts", () => {
    expect(cleanFeedUrls([
      "https://b.example/feed/",
      "https://a.example/feed",
      "https://b.example/feed",
      "https://spam.example/x",
    ], ["spam.example"])).toEqual([
      "https://a.example/feed",
      "https://b.example/feed",
    ]);
  });

  it("checks spam after normalizing", () => {
    expect(cleanFeedUrls(["https://x.bearblog.dev/rss"], ["x.bearblog.dev/feed"])).toEqual([]);
  });
});

describe("exportRecentFeeds", () => {
  let db: Db;
  let now = new Date(2024, 5, 10, 12, 0, 0);

  beforeEach(async () => {
    db = await createStore();
    await addFeed(db, 1, "https://alpha.example/feed/", ["2024-06-09 08:00:00", "2024-06-08 08:00:00"]);
    await addFeed(db, 2, "https://alpha.example/feed", ["2024-06-05 00:00:00"]);
    await addFeed(db, 3, "https://beta.example/rss", ["2024-05-01 00:00:00"]);
    await addFeed(db, 4, "https://jane.bearblog.dev/feed/?type=rss", ["2024-06-10 11:59:59"]);
    await addFeed(db, 5, "https://jane.bearblog.dev/rss/", ["2024-06-04 00:00:00"]);
    await addFeed(db, 6, "https://casino-bonus.example/feed", ["2024-06-09 00:00:00"]);
    await addFeed(db, 7, "https://alpha.example/comments/feed", ["2024-06-03 12:00:00"]);
    await addFeed(db, 8, "https://alpha.example/podcast.xml", ["2024-06-03 12:00:01"]);
    await addFeed(db, 9, "https://quiet.example/feed", []);
  });

  afterEach(async () => {
    await db.close();
  });

  it("exports feeds with a post after the cutoff", async () => {
    let res = await exportRecentFeeds(db, 7, ["casino-bonus.example"], now);
    expect(res.cutoff).toBe("2024-06-03 12:00:00");
    expect(res.days).toBe(7);
    expect(res.urls).toEqual([
      "https://alpha.example/feed",
      "https://alpha.example/podcast.xml",
      "https://jane.bearblog.dev/feed",
    ]);
    expect(res.domains).toEqual([
      { domain: "alpha.example", urls: ["https://alpha.example/feed", "https://alpha.example/podcast.xml"] },
      { domain: "jane.bearblog.dev", urls: ["https://jane.bearblog.dev/feed"] },
    ]);
  });

  it("includes older feeds for a longer window", async () => {
    let res = await exportRecentFeeds(db, 60, [], now);
    expect(res.urls).toEqual([
      "https://alpha.example/comments/feed",
      "https://alpha.example/feed",
      "https://alpha.example/podcast.xml",
      "https://beta.example/rss",
      "https://casino-bonus.example/feed",
      "https://jane.bearblog.dev/feed",
    ]);
  });

  it("returns nothing when no post is newer than now", async () => {
    let res = await exportRecentFeeds(db, 0, [], now);
    expect(res.urls).toEqual([]);
    expect(res.domains).toEqual([]);
  });
});

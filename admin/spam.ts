import * as F from "fs";
import * as D from "./log";

const blockStart = /listOfSpammyFeeds\s*=\s*\[\]string\s*\{/;

/**
 * Parses a spammy feed list. Accepts either one substring per line or a
 * source file declaring a `listOfSpammyFeeds = []string{ ... }` block.
 */
export function parseSpammyFeeds(text: string): string[] {
  let start = blockStart.exec(text);
  if (start) {
    let body = text.slice(start.index + start[0].length);
    let end = body.indexOf("}");
    text = end >= 0 ? body.slice(0, end) : body;
  }

  let res: string[] = [];
  for (let line of text.split("\n")) {
    let entry = line.trim();
    if (!entry || entry.startsWith("#") || entry.startsWith("//")) continue;
    entry = entry.split('"').join("");
    if (entry.endsWith(",")) entry = entry.slice(0, -1);
    entry = entry.trim();
    if (entry) res.push(entry);
  }
  return res;
}

export async function loadSpammyFeeds(file: string): Promise<string[]> {
  let text = await F.promises.readFile(file, "utf8");
  let list = parseSpammyFeeds(text);
  D.xdebug(7,`loaded ${list.length} spammy feed patterns from ${file}`);
  return list;
}

// Plain substring containment: "spam.example" also matches
// "notspam.example.org".
export function isSpammy(url: string, spammyFeeds: string[]): boolean {
  return spammyFeeds.some((s) => url.includes(s));
}

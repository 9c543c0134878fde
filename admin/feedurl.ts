function stripTrailing(s: string, ch: string): string {
  let end = s.length;
  while (end > 0 && s[end - 1] === ch) end--;
  return s.slice(0, end);
}

/**
 * Brings a feed URL into the form used for the export, so that the same
 * feed stored with cosmetic differences collapses into one entry.
 *
 * Bear Blog feeds show up as `/feed`, `/feed/`, `/feed/?type=rss` and
 * `/rss`; all of them become `/feed`.
 */
export function normalizeFeedUrl(url: string): string {
  url = url.trim();
  url = stripTrailing(url, "/");
  url = stripTrailing(url, "?");
  url = stripTrailing(url, "&");

  if (url.includes(".bearblog.dev") || url.includes("/feed/?type=rss")) {
    url = url.split("?")[0];
    url = stripTrailing(url, "/");
    url = url.split("/rss").join("/feed");
  }
  return url;
}

/**
 * Network location of a URL as written (host, port and userinfo), or ""
 * when the URL has no `scheme://` part.
 */
export function feedDomain(url: string): string {
  let m = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/([^/?#]*)/.exec(url);
  return m ? m[1] : "";
}

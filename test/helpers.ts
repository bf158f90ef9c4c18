import { DateTime } from "luxon";
import type { HTMLElement } from "node-html-parser";
import type { IPageFetcher, PageFetchResult } from "../src/IPageFetcher.js";
import type { PlatformProfile } from "../src/types.js";
import { parseMarkup, selectContentRoot } from "../src/utils/dom.js";

export const NOW = DateTime.fromISO("2024-06-01T10:20:30", { zone: "utc" });
export const SOURCE_URL = "https://docs.example.com/release-notes";

export function utcDay(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: "utc" });
}

export function contentRootOf(html: string, profile: PlatformProfile): HTMLElement {
  return selectContentRoot(parseMarkup(html), profile.containerSelectors);
}

/** Fetcher that serves fixed markup and records requested URLs. */
export class StaticFetcher implements IPageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly html: string) {}

  async fetchPage(url: string): Promise<PageFetchResult> {
    this.requested.push(url);
    return { content: this.html, url, statusCode: 200, contentType: "text/html" };
  }
}

/** Fetcher whose every request fails with the given error. */
export class FailingFetcher implements IPageFetcher {
  constructor(private readonly error: Error) {}

  async fetchPage(): Promise<PageFetchResult> {
    throw this.error;
  }
}

export const SAMPLE_PAGE = `<html><body>
  <nav><h2>January 5, 2024</h2><p>Navigation entries that are not releases</p></nav>
  <main>
    <h2>March 1, 2024</h2>
    <p>Security patch for the runtime image</p>
    <h2>April 2, 2024</h2>
    <ul><li>New regions added</li></ul>
  </main>
</body></html>`;

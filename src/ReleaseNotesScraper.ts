import { DateTime } from "luxon";
import type { IPageFetcher } from "./IPageFetcher.js";
import { PageFetcher } from "./PageFetcher.js";
import { ParseError, type ReleaseNotesError, TransportError, toError } from "./errors.js";
import { StructuredExtractor } from "./extractors/StructuredExtractor.js";
import { UnstructuredExtractor } from "./extractors/UnstructuredExtractor.js";
import { selectProfile } from "./platforms.js";
import { ReleaseCollection, computeCutoff, filterByCutoff, sortByDateDescending } from "./ReleaseCollection.js";
import { parseMarkup, selectContentRoot } from "./utils/dom.js";
import type { ExtractionOptions, ReleaseGroup } from "./types.js";

export interface ReleaseNotesScraperOptions extends ExtractionOptions {
  /** Defaults to a PageFetcher with the standard timeout. */
  fetcher?: IPageFetcher;
}

/**
 * Runs the extraction pipeline over already-fetched markup.
 *
 * The structured pass runs first; the unstructured pass only runs when it found
 * nothing. The result is filtered to the retention window and sorted newest first.
 */
export function extractReleases(html: string, options: ExtractionOptions): ReleaseGroup[] {
  const { url, months, verbose = false } = options;
  const cutoff = computeCutoff(months, options.now ?? DateTime.utc());
  const profile = options.profile ?? selectProfile(url);

  const contentRoot = selectContentRoot(parseMarkup(html), profile.containerSelectors);
  const collection = new ReleaseCollection();

  for (const group of new StructuredExtractor(profile, url).extract(contentRoot)) {
    collection.add(group);
  }

  if (verbose) {
    console.error(`ReleaseNotesScraper: ${profile.name} profile, structured pass found ${collection.size} groups`);
  }

  if (collection.size === 0) {
    new UnstructuredExtractor(profile, url, cutoff).extract(contentRoot, collection);
    if (verbose) {
      console.error(`ReleaseNotesScraper: unstructured pass found ${collection.size} groups`);
    }
  }

  return sortByDateDescending(filterByCutoff(collection.toArray(), cutoff));
}

/**
 * ReleaseNotesScraper - Fetches one documentation page and extracts its release groups.
 *
 * Fetch and extraction failures are soft: they are reported on stderr and the
 * scraper returns an empty list, so callers can still render a valid report.
 */
export class ReleaseNotesScraper {
  private readonly fetcher: IPageFetcher;
  private readonly options: ExtractionOptions;

  constructor(options: ReleaseNotesScraperOptions) {
    const { fetcher, ...extraction } = options;
    this.fetcher = fetcher ?? new PageFetcher();
    this.options = extraction;
  }

  /** Start of the retention window used by this scraper. */
  get cutoff(): DateTime {
    return computeCutoff(this.options.months, this.options.now ?? DateTime.utc());
  }

  async scrape(): Promise<ReleaseGroup[]> {
    const { url } = this.options;

    let html: string;
    try {
      html = (await this.fetcher.fetchPage(url)).content;
    } catch (error: unknown) {
      if (error instanceof TransportError) {
        console.error(`Error fetching URL: ${error.message}`);
        this.logDetails(error);
        return [];
      }
      throw error;
    }

    try {
      return extractReleases(html, this.options);
    } catch (error: unknown) {
      const parseError = new ParseError(`Error parsing content: ${toError(error).message}`, toError(error));
      console.error(parseError.message);
      this.logDetails(parseError);
      return [];
    }
  }

  // Prints code, status and cause through the error's inspect hook.
  private logDetails(error: ReleaseNotesError): void {
    if (this.options.verbose) {
      console.error(error);
    }
  }
}

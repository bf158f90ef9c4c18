import { DateTime } from "luxon";
import { ReleaseNotesScraper, renderReleases } from "../src/index.js";

/**
 * Release notes digest for the last quarter
 *
 * Fetches one release notes page and prints a Markdown summary.
 */

async function main() {
  const scraper = new ReleaseNotesScraper({ url: "https://cloud.google.com/run/docs/release-notes", months: 3 });

  console.log("📰 Collecting release notes...");
  const releases = await scraper.scrape();

  console.log(
    renderReleases("markdown", releases, {
      sourceUrl: "https://cloud.google.com/run/docs/release-notes",
      months: 3,
      cutoff: scraper.cutoff,
      generatedAt: DateTime.local(),
    })
  );
}

main().catch(console.error);

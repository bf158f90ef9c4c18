import { writeFileSync } from "node:fs";
import { Command, CommanderError, Option } from "commander";
import { config as loadDotenv } from "dotenv";
import { DateTime } from "luxon";
import { resolveConfig } from "./config.js";
import { DEFAULT_MONTHS } from "./constants.js";
import { OutputWriteError, toError } from "./errors.js";
import type { IPageFetcher } from "./IPageFetcher.js";
import { PageFetcher } from "./PageFetcher.js";
import { selectProfile } from "./platforms.js";
import { computeCutoff } from "./ReleaseCollection.js";
import { ReleaseNotesScraper } from "./ReleaseNotesScraper.js";
import { renderReleases } from "./renderers/index.js";
import { OUTPUT_FORMATS } from "./types.js";

/**
 * Seams the tests replace. Everything defaults to the real process.
 */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  fetcher?: IPageFetcher;
  now?: DateTime;
  writeFile?: (path: string, data: string) => void;
}

function writeUtf8(path: string, data: string): void {
  writeFileSync(path, data, "utf-8");
}

export function createProgram(): Command {
  return new Command()
    .name("release-notes")
    .description("Scrape release notes from documentation pages")
    .requiredOption("-u, --url <url>", "URL of the release notes page to scrape")
    .option("-m, --months <number>", `Number of months to look back (default: ${DEFAULT_MONTHS})`)
    .addOption(new Option("-o, --output <format>", "Output format").choices(OUTPUT_FORMATS).default("text"))
    .option("-f, --file <path>", "Output file path (if not specified, prints to stdout)")
    .option("-v, --verbose", "Enable verbose output")
    .addHelpText(
      "after",
      `
Examples:
  release-notes -u https://example.com/release-notes
  release-notes -u https://example.com/release-notes -m 6 -o json
  release-notes -u https://example.com/release-notes -o html -f output.html
  release-notes -u https://example.com/release-notes -m 3 -o markdown -f notes.md`
    )
    .exitOverride();
}

/**
 * Runs one scrape from command-line arguments (without the node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const resolved = resolveConfig(program.opts(), deps.env ?? process.env);
  if (!resolved.ok) {
    console.error("Error: invalid options");
    resolved.errors.forEach((message) => console.error(`  ${message}`));
    return 1;
  }

  const { url, months, output, file, verbose, timeout, userAgent } = resolved.config;
  const now = deps.now ?? DateTime.utc();

  if (verbose) {
    console.error(`Scraping: ${url}`);
    console.error(`Time range: Last ${months} months`);
    console.error(`Output format: ${output}`);
    console.error(`Platform profile: ${selectProfile(url).name}`);
  }

  const fetcher =
    deps.fetcher ?? new PageFetcher({ timeout, headers: userAgent ? { "User-Agent": userAgent } : {} });
  const scraper = new ReleaseNotesScraper({ url, months, now, verbose, fetcher });
  const releases = await scraper.scrape();

  if (verbose) {
    console.error(`Found ${releases.length} releases`);
  }

  const rendered = renderReleases(output, releases, {
    sourceUrl: url,
    months,
    cutoff: computeCutoff(months, now),
    generatedAt: now.toLocal(),
  });

  if (!file) {
    console.log(rendered);
    return 0;
  }

  try {
    (deps.writeFile ?? writeUtf8)(file, rendered);
  } catch (error: unknown) {
    const writeError = new OutputWriteError(`Error writing to file: ${toError(error).message}`, file, toError(error));
    console.error(writeError.message);
    return 1;
  }

  console.error(`${output.toUpperCase()} output saved to ${file}`);
  return 0;
}

/** Entry point used by the `release-notes` binary. */
export async function main(): Promise<void> {
  loadDotenv();
  process.exitCode = await runCli(process.argv.slice(2));
}

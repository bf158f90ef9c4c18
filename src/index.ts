export { ReleaseNotesScraper, extractReleases } from "./ReleaseNotesScraper.js";
export type { ReleaseNotesScraperOptions } from "./ReleaseNotesScraper.js";
export { PageFetcher, HttpStatusError } from "./PageFetcher.js";
export type { PageFetcherOptions } from "./PageFetcher.js";
export type { IPageFetcher, PageFetchResult } from "./IPageFetcher.js";
export { StructuredExtractor } from "./extractors/StructuredExtractor.js";
export { UnstructuredExtractor } from "./extractors/UnstructuredExtractor.js";
export type { GroupSink } from "./extractors/UnstructuredExtractor.js";
export {
  ReleaseCollection,
  computeCutoff,
  filterByCutoff,
  sortByDateDescending,
} from "./ReleaseCollection.js";
export type { PayloadLookup } from "./ReleaseCollection.js";
export { GENERIC_PROFILE, GOOGLE_CLOUD_PROFILE, PLATFORM_PROFILES, selectProfile } from "./platforms.js";
export { parseDate, findDateMatch, findAllDateMatches } from "./utils/date-parser.js";
export { categorize, roleHintOf } from "./utils/categorizer.js";
export * from "./renderers/index.js";
export {
  ReleaseNotesError,
  TransportError,
  ParseError,
  OutputWriteError,
  DependencyError,
} from "./errors.js";
export type { ReleaseNotesErrorDetails } from "./errors.js";
export * from "./types.js";

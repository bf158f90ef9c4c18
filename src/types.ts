import type { DateTime } from "luxon";

/**
 * Closed set of labels a release item can carry.
 */
export type Category =
  | "security"
  | "breaking"
  | "public-preview"
  | "ga"
  | "deprecated"
  | "fixed"
  | "issue"
  | "change"
  | "announcement"
  | "libraries"
  | "update";

export const CATEGORIES: ReadonlyArray<Category> = [
  "security",
  "breaking",
  "public-preview",
  "ga",
  "deprecated",
  "fixed",
  "issue",
  "change",
  "announcement",
  "libraries",
  "update",
];

/**
 * Semantic role read from a `release-*` class token on the source element.
 */
export type StructuralHint = "feature" | "changed" | "announcement" | "breaking" | "issue";

export type OutputFormat = "text" | "markdown" | "json" | "html";

export const OUTPUT_FORMATS: ReadonlyArray<OutputFormat> = ["text", "markdown", "json", "html"];

/**
 * Selectors and patterns for one documentation platform.
 */
export interface PlatformProfile {
  readonly name: string;
  /** Substrings or RegExps tested against the source URL. Empty for the generic profile. */
  readonly urlPatterns: ReadonlyArray<string | RegExp>;
  /** Tried in order; the first match becomes the content root. */
  readonly containerSelectors: ReadonlyArray<string>;
  /** Tags whose text may carry a release date. Also the section boundaries. */
  readonly headerTags: ReadonlyArray<string>;
  /** Sibling tags turned into release items during the structured walk. */
  readonly contentTags: ReadonlyArray<string>;
  /** Each pattern has exactly one capture group holding the date substring. */
  readonly datePatterns: ReadonlyArray<RegExp>;
}

/**
 * One categorized content fragment.
 */
export interface ReleaseItem {
  /** Outer HTML of the source element. Also the identity used for deduplication. */
  raw: string;
  category: Category;
  /** Every non-empty `href` found in the fragment, in document order. */
  links: string[];
}

/**
 * All release items attributed to one date.
 */
export interface ReleaseGroup {
  /** Parsed calendar date (UTC midnight). Groups without one never reach output. */
  date: DateTime | null;
  /** The date exactly as it appeared in the page. */
  dateText: string;
  items: ReleaseItem[];
  sourceUrl: string;
}

/**
 * Options for one extraction run.
 */
export interface ExtractionOptions {
  /** URL the markup came from; also used to select the platform profile. */
  url: string;
  /** Size of the retention window in (30-day) months. */
  months: number;
  /** Clock used for the retention window. Defaults to the current time. */
  now?: DateTime;
  /** Forces a profile instead of selecting one from the URL. */
  profile?: PlatformProfile;
  /** Log progress lines to stderr. */
  verbose?: boolean;
}

/**
 * Values the renderers print around the release list.
 */
export interface RenderContext {
  sourceUrl: string;
  months: number;
  cutoff: DateTime;
  generatedAt: DateTime;
  /** Substring removed from item text in the text, Markdown and JSON renderers. */
  selfLink?: string;
}

export interface CategoryCount {
  category: Category;
  count: number;
}

export interface ReleaseStatistics {
  totalReleases: number;
  totalItems: number;
  /** Sorted by count descending; ties keep first-occurrence order. */
  categoryCounts: CategoryCount[];
}

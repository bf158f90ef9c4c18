export const DEFAULT_HTTP_TIMEOUT = 30000;
export const MAX_REDIRECTS = 5;
export const DEFAULT_MONTHS = 12;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const COMMON_HEADERS = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  "Accept-Encoding": "gzip, deflate",
  Connection: "keep-alive",
};

// Days per month in the retention window. Not calendar-accurate.
export const DAYS_PER_MONTH = 30;

// Minimum flattened-text length (exclusive) for an item to be kept.
export const MIN_STRUCTURED_TEXT_LENGTH = 10;
export const MIN_UNSTRUCTURED_TEXT_LENGTH = 20;

export const RELEASE_ROLE_CLASSES = {
  feature: "release-feature",
  changed: "release-changed",
  announcement: "release-announcement",
  breaking: "release-breaking",
  issue: "release-issue",
} as const;

export const LIST_TAGS: ReadonlyArray<string> = ["ul", "ol"];
export const REMOVED_TAGS: ReadonlyArray<string> = ["script", "style"];

// Self-referencing link that the documentation pages embed in every entry.
export const CANONICAL_SELF_LINK = "https://cloud.google.com/run/docs/release-notes";

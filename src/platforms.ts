import type { PlatformProfile } from "./types.js";

const DATE_PATTERNS: ReadonlyArray<RegExp> = [
  /(\w+\s+\d{1,2},\s+\d{4})/, // January 15, 2024
  /(\d{4}-\d{2}-\d{2})/, // 2024-01-15
  /(\d{1,2}\/\d{1,2}\/\d{4})/, // 01/15/2024
];

const CONTENT_TAGS: ReadonlyArray<string> = ["p", "ul", "ol", "li", "div"];

export const GOOGLE_CLOUD_PROFILE: PlatformProfile = Object.freeze({
  name: "google-cloud",
  urlPatterns: ["cloud.google.com"],
  containerSelectors: ["main", "article", '[role="main"]', ".devsite-article-body", "div.release-notes-container"],
  headerTags: ["h2", "h3"],
  contentTags: CONTENT_TAGS,
  datePatterns: DATE_PATTERNS,
});

export const GENERIC_PROFILE: PlatformProfile = Object.freeze({
  name: "generic",
  urlPatterns: [],
  containerSelectors: ["main", "article", ".content", "#content", ".release-notes"],
  headerTags: ["h2", "h3", "h4"],
  contentTags: CONTENT_TAGS,
  datePatterns: DATE_PATTERNS,
});

/** Known platforms, checked in order before falling back to the generic profile. */
export const PLATFORM_PROFILES: ReadonlyArray<PlatformProfile> = [GOOGLE_CLOUD_PROFILE];

export function selectProfile(url: string, profiles: ReadonlyArray<PlatformProfile> = PLATFORM_PROFILES): PlatformProfile {
  for (const profile of profiles) {
    for (const pattern of profile.urlPatterns) {
      if (typeof pattern === "string" ? url.includes(pattern) : pattern.test(url)) {
        return profile;
      }
    }
  }
  return GENERIC_PROFILE;
}

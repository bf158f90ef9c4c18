import { DateTime } from "luxon";

// Order matters: US month/day is tried before day/month for slash dates.
const DATE_FORMATS: ReadonlyArray<string> = [
  "MMMM d, yyyy", // January 15, 2024
  "MMM d, yyyy", // Jan 15, 2024
  "yyyy-M-d", // 2024-01-15
  "M/d/yyyy", // 01/15/2024
  "d/M/yyyy", // 15/01/2024
];

/**
 * Parses an isolated date substring into a UTC calendar date.
 *
 * Formats are tried in a fixed order and the first valid result wins, so
 * `01/02/2024` is January 2nd while `13/02/2024` falls through to day-first.
 * Returns `null` when no format fits; never throws.
 */
export function parseDate(text: string): DateTime | null {
  const normalized = text.trim().replace(/\s+/g, " ");
  if (!normalized) {
    return null;
  }

  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(normalized, format, { zone: "utc", locale: "en-US" });
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
}

/**
 * First capture of `pattern` in `text`. Runs on a non-global copy, so a shared
 * pattern's `lastIndex` never leaks between calls.
 */
export function firstCapture(text: string, pattern: RegExp): string | null {
  const match = new RegExp(pattern.source, withoutGlobal(pattern.flags)).exec(text);
  return match?.[1] || null;
}

/** First capture of the first pattern that matches `text`. */
export function findDateMatch(text: string, patterns: ReadonlyArray<RegExp>): string | null {
  for (const pattern of patterns) {
    const capture = firstCapture(text, pattern);
    if (capture) {
      return capture;
    }
  }
  return null;
}

/** Every capture of every pattern, grouped by pattern order then position. */
export function findAllDateMatches(text: string, patterns: ReadonlyArray<RegExp>): string[] {
  const matches: string[] = [];
  for (const pattern of patterns) {
    const globalPattern = new RegExp(pattern.source, `${withoutGlobal(pattern.flags)}g`);
    for (const match of text.matchAll(globalPattern)) {
      if (match[1]) {
        matches.push(match[1]);
      }
    }
  }
  return matches;
}

function withoutGlobal(flags: string): string {
  return flags.replace(/[gy]/g, "");
}

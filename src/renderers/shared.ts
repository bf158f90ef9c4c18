import type { DateTime } from "luxon";
import { parse } from "node-html-parser";
import { CANONICAL_SELF_LINK } from "../constants.js";
import { flattenText } from "../utils/dom.js";
import type { Category, CategoryCount, ReleaseGroup, ReleaseItem, ReleaseStatistics, RenderContext } from "../types.js";

const plainTextCache = new WeakMap<ReleaseItem, string>();

/** Flattened text of an item's raw payload. Computed once per item. */
export function plainTextOf(item: ReleaseItem): string {
  const cached = plainTextCache.get(item);
  if (cached !== undefined) {
    return cached;
  }
  const text = flattenText(parse(item.raw));
  plainTextCache.set(item, text);
  return text;
}

/** Item text as shown by the text, Markdown and JSON renderers. */
export function displayTextOf(item: ReleaseItem, context: RenderContext): string {
  const selfLink = context.selfLink ?? CANONICAL_SELF_LINK;
  const text = plainTextOf(item);
  return selfLink ? text.split(selfLink).join("") : text;
}

export function computeStatistics(groups: ReadonlyArray<ReleaseGroup>): ReleaseStatistics {
  const counts = new Map<Category, number>();
  let totalItems = 0;

  for (const group of groups) {
    for (const item of group.items) {
      counts.set(item.category, (counts.get(item.category) ?? 0) + 1);
      totalItems += 1;
    }
  }

  // Array#sort is stable: equal counts keep first-occurrence order.
  const categoryCounts: CategoryCount[] = [...counts.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count);

  return { totalReleases: groups.length, totalItems, categoryCounts };
}

export function formatTimestamp(value: DateTime): string {
  return value.toFormat("yyyy-MM-dd HH:mm:ss");
}

export function formatDay(value: DateTime): string {
  return value.toFormat("yyyy-MM-dd");
}

/** ISO-8601 without offset or milliseconds, e.g. `2024-03-01T00:00:00`. */
export function formatIsoLocal(value: DateTime): string {
  return value.toISO({ includeOffset: false, suppressMilliseconds: true }) ?? "";
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

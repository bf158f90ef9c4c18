import type { ReleaseGroup, RenderContext } from "../types.js";
import { computeStatistics, displayTextOf, formatIsoLocal } from "./shared.js";

export interface JsonReleaseItem {
  text: string;
  category: string;
  urls: string[];
}

export interface JsonRelease {
  date: string | null;
  date_str: string;
  items: JsonReleaseItem[];
  url: string;
}

export interface JsonReport {
  metadata: {
    source: string;
    generated: string;
    time_range_months: number;
    cutoff_date: string;
  };
  statistics: {
    total_releases: number;
    total_items: number;
    items_by_category: Record<string, number>;
  };
  releases: JsonRelease[];
}

export function buildJsonReport(groups: ReadonlyArray<ReleaseGroup>, context: RenderContext): JsonReport {
  const stats = computeStatistics(groups);

  return {
    metadata: {
      source: context.sourceUrl,
      generated: formatIsoLocal(context.generatedAt),
      time_range_months: context.months,
      cutoff_date: formatIsoLocal(context.cutoff),
    },
    statistics: {
      total_releases: stats.totalReleases,
      total_items: stats.totalItems,
      items_by_category: Object.fromEntries(stats.categoryCounts.map(({ category, count }) => [category, count])),
    },
    releases: groups.map((group) => ({
      date: group.date ? formatIsoLocal(group.date) : null,
      date_str: group.dateText,
      items: group.items.map((item) => ({
        text: displayTextOf(item, context),
        category: item.category,
        urls: [...item.links],
      })),
      url: group.sourceUrl || context.sourceUrl,
    })),
  };
}

export function renderJson(groups: ReadonlyArray<ReleaseGroup>, context: RenderContext): string {
  return JSON.stringify(buildJsonReport(groups, context), null, 2);
}

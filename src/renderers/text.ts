import type { ReleaseGroup, RenderContext } from "../types.js";
import { computeStatistics, displayTextOf, formatTimestamp } from "./shared.js";

const BANNER = "=".repeat(80);
const RULE = "-".repeat(40);

export function renderText(groups: ReadonlyArray<ReleaseGroup>, context: RenderContext): string {
  const lines: string[] = [
    BANNER,
    "RELEASE NOTES SUMMARY",
    `Generated: ${formatTimestamp(context.generatedAt)}`,
    `Time range: Last ${context.months} months`,
    BANNER,
    "",
  ];

  if (groups.length === 0) {
    lines.push("No releases found in the specified time range.");
    return lines.join("\n");
  }

  for (const group of groups) {
    lines.push(`\n## ${group.dateText}`, RULE);
    for (const item of group.items) {
      lines.push(`  [${item.category.toUpperCase()}] ${displayTextOf(item, context)}`);
      if (item.links.length > 0) {
        lines.push("    Links:", ...item.links.map((link) => `      - ${link}`));
      }
      lines.push("");
    }
  }

  const stats = computeStatistics(groups);
  lines.push(`\n${BANNER}`, "STATISTICS", RULE, `Total releases: ${stats.totalReleases}`, `Total items: ${stats.totalItems}`);

  if (stats.categoryCounts.length > 0) {
    lines.push("\nItems by category:", ...stats.categoryCounts.map(({ category, count }) => `  - ${category}: ${count}`));
  }

  return lines.join("\n");
}

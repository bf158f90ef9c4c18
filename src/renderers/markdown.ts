import type { ReleaseGroup, RenderContext } from "../types.js";
import { computeStatistics, displayTextOf, formatTimestamp } from "./shared.js";

export function renderMarkdown(groups: ReadonlyArray<ReleaseGroup>, context: RenderContext): string {
  const { sourceUrl } = context;
  const lines: string[] = [
    "# Release Notes Summary\n",
    `**Source:** [${sourceUrl}](${sourceUrl})  `,
    `**Generated:** ${formatTimestamp(context.generatedAt)}  `,
    `**Time range:** Last ${context.months} months\n`,
    "---\n",
  ];

  if (groups.length === 0) {
    lines.push("*No releases found in the specified time range.*");
    return lines.join("\n");
  }

  for (const group of groups) {
    lines.push(`\n## ${group.dateText}\n`);
    for (const item of group.items) {
      lines.push(`- \`${item.category}\` ${displayTextOf(item, context)}`);
      lines.push(...item.links.map((link) => `  - [Link](${link})`));
    }
    lines.push("");
  }

  const stats = computeStatistics(groups);
  lines.push("\n---\n", "## Statistics\n", `- **Total releases:** ${stats.totalReleases}`, `- **Total items:** ${stats.totalItems}`);

  if (stats.categoryCounts.length > 0) {
    lines.push("\n### Items by category\n", ...stats.categoryCounts.map(({ category, count }) => `- \`${category}\`: ${count}`));
  }

  return lines.join("\n");
}

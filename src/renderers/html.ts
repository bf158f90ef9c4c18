import type { DateTime } from "luxon";
import { CATEGORIES, type Category, type ReleaseGroup, type RenderContext } from "../types.js";
import { computeStatistics, escapeHtml, formatDay, formatTimestamp } from "./shared.js";

interface CategoryStyle {
  /** Shown in the statistics breakdown. */
  displayName: string;
  border: string;
  badge: string;
}

export const CATEGORY_STYLES: Readonly<Record<Category, CategoryStyle>> = {
  ga: { displayName: "GA (Generally Available)", border: "#4CAF50", badge: "#4CAF50" },
  "public-preview": { displayName: "Public Preview", border: "#FF9800", badge: "#FF9800" },
  change: { displayName: "Change", border: "#2196F3", badge: "#2196F3" },
  announcement: { displayName: "Announcement", border: "#9C27B0", badge: "#9C27B0" },
  breaking: { displayName: "Breaking", border: "#f44336", badge: "#E91E63" },
  deprecated: { displayName: "Deprecated", border: "#f44336", badge: "#f44336" },
  fixed: { displayName: "Fixed", border: "#00BCD4", badge: "#00BCD4" },
  update: { displayName: "Update", border: "#795548", badge: "#795548" },
  libraries: { displayName: "Libraries", border: "#607D8B", badge: "#607D8B" },
  security: { displayName: "Security", border: "#E91E63", badge: "#E91E63" },
  issue: { displayName: "Issue", border: "#ffc107", badge: "#ffc107" },
};

/** `public-preview` becomes `publicpreview`. */
export function categoryClass(category: Category): string {
  return category.replace(/-/g, "");
}

/** `public-preview` becomes `PUBLIC PREVIEW`. */
export function categoryLabel(category: Category): string {
  return category.replace(/-/g, " ").toUpperCase();
}

const BASE_STYLES = `        body {
            font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
            line-height: 1.6;
            max-width: 1200px;
            margin: 0 auto;
            padding: 20px;
            background: #f5f5f5;
        }
        .header {
            background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
            color: white;
            padding: 30px;
            border-radius: 10px;
            margin-bottom: 30px;
        }
        .header h1 { margin: 0; font-size: 2em; }
        .meta { opacity: 0.9; margin-top: 10px; }
        .release-date {
            background: white;
            border-radius: 8px;
            padding: 20px;
            margin-bottom: 20px;
            box-shadow: 0 2px 4px rgba(0,0,0,0.1);
        }
        .release-date h2 {
            color: #333;
            margin-top: 0;
            border-bottom: 2px solid #667eea;
            padding-bottom: 10px;
        }
        .release-item {
            margin: 15px 0;
            padding: 10px;
            background: #f9f9f9;
            border-left: 4px solid #ccc;
            border-radius: 4px;
        }
        .category {
            display: inline-block;
            padding: 2px 8px;
            border-radius: 3px;
            font-size: 0.85em;
            font-weight: bold;
            margin-right: 10px;
        }
        .stats {
            background: white;
            border-radius: 8px;
            padding: 20px;
            margin-top: 30px;
            box-shadow: 0 2px 4px rgba(0,0,0,0.1);
        }
        .stats h2 { color: #333; margin-top: 0; }
        a { color: #667eea; text-decoration: none; }
        a:hover { text-decoration: underline; }
        .source-link { margin-top: 20px; text-align: center; }
        .no-results {
            background: #fff3cd;
            border: 1px solid #ffc107;
            border-radius: 5px;
            padding: 20px;
            margin: 20px 0;
            text-align: center;
        }`;

function buildStylesheet(): string {
  const borders = CATEGORIES.map(
    (category) =>
      `        .release-item.${categoryClass(category)} { border-left-color: ${CATEGORY_STYLES[category].border}; }`
  );
  const badges = CATEGORIES.map(
    (category) =>
      `        .category.${categoryClass(category)} { background: ${CATEGORY_STYLES[category].badge}; color: white; }`
  );
  return [BASE_STYLES, ...borders, ...badges].join("\n");
}

export function renderHtml(groups: ReadonlyArray<ReleaseGroup>, context: RenderContext): string {
  const url = escapeHtml(context.sourceUrl);
  const html: string[] = [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '    <meta charset="UTF-8">',
    '    <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    "    <title>Release Notes Summary</title>",
    "    <style>",
    buildStylesheet(),
    "    </style>",
    "</head>",
    "<body>",
    '    <div class="header">',
    "        <h1>Release Notes Summary</h1>",
    '        <div class="meta">',
    `            <p>Generated: ${formatTimestamp(context.generatedAt)}</p>`,
    `            <p>Source: <a href="${url}" style="color: white; text-decoration: underline;">${url}</a></p>`,
    `            <p>Time range: Last ${context.months} months</p>`,
    "        </div>",
    "    </div>",
  ];

  if (groups.length === 0) {
    html.push(
      '    <div class="no-results">',
      "        <h2>No Release Notes Found</h2>",
      "        <p>No release notes were found in the specified time range.</p>",
      "        <p>This could be due to:</p>",
      '        <ul style="text-align: left; display: inline-block;">',
      `            <li>No releases in the past ${context.months} months</li>`,
      "            <li>Different page structure than expected</li>",
      "            <li>Content loaded dynamically via JavaScript</li>",
      "        </ul>",
      "    </div>"
    );
  }

  for (const group of groups) {
    html.push('    <div class="release-date">', `        <h2>${escapeHtml(group.dateText)}</h2>`);
    for (const item of group.items) {
      const cssClass = categoryClass(item.category);
      html.push(
        `        <div class="release-item ${cssClass}">`,
        `            <span class="category ${cssClass}">${categoryLabel(item.category)}</span>`,
        `            ${item.raw}`,
        "        </div>"
      );
    }
    html.push("    </div>");
  }

  const stats = computeStatistics(groups);
  html.push(
    '    <div class="stats">',
    "        <h2>Summary Statistics</h2>",
    `        <p><strong>Total Releases:</strong> ${stats.totalReleases}</p>`,
    `        <p><strong>Total Items:</strong> ${stats.totalItems}</p>`
  );

  const dates = groups.flatMap((group): DateTime[] => (group.date ? [group.date] : []));
  if (dates.length > 0) {
    const start = dates.reduce((min, date) => (date.toMillis() < min.toMillis() ? date : min));
    const end = dates.reduce((max, date) => (date.toMillis() > max.toMillis() ? date : max));
    html.push(`        <p><strong>Date Range:</strong> ${formatDay(start)} to ${formatDay(end)}</p>`);
  } else {
    html.push(
      `        <p><strong>Search Range:</strong> ${formatDay(context.cutoff)} to ${formatDay(context.generatedAt)}</p>`
    );
  }

  if (stats.categoryCounts.length > 0) {
    html.push("        <h3>Items by Category</h3>", "        <ul>");
    for (const { category, count } of stats.categoryCounts) {
      html.push(`            <li><strong>${CATEGORY_STYLES[category].displayName}:</strong> ${count}</li>`);
    }
    html.push("        </ul>");
  }

  html.push(
    "    </div>",
    '    <div class="source-link">',
    `        <a href="${url}" target="_blank">View Full Release Notes</a>`,
    "    </div>",
    "</body>",
    "</html>"
  );

  return html.join("\n");
}

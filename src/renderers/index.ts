import type { OutputFormat, ReleaseGroup, RenderContext } from "../types.js";
import { renderHtml } from "./html.js";
import { renderJson } from "./json.js";
import { renderMarkdown } from "./markdown.js";
import { renderText } from "./text.js";

export type Renderer = (groups: ReadonlyArray<ReleaseGroup>, context: RenderContext) => string;

export const RENDERERS: Readonly<Record<OutputFormat, Renderer>> = {
  text: renderText,
  markdown: renderMarkdown,
  json: renderJson,
  html: renderHtml,
};

export function renderReleases(
  format: OutputFormat,
  groups: ReadonlyArray<ReleaseGroup>,
  context: RenderContext
): string {
  return RENDERERS[format](groups, context);
}

export { renderText, renderMarkdown, renderJson, renderHtml };
export { buildJsonReport } from "./json.js";
export type { JsonReport, JsonRelease, JsonReleaseItem } from "./json.js";
export { computeStatistics, plainTextOf } from "./shared.js";
export { CATEGORY_STYLES } from "./html.js";

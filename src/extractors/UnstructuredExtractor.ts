import type { HTMLElement } from "node-html-parser";
import type { DateTime } from "luxon";
import { MIN_UNSTRUCTURED_TEXT_LENGTH, REMOVED_TAGS } from "../constants.js";
import { isWithinWindow, type PayloadLookup } from "../ReleaseCollection.js";
import { hasReleaseRole } from "../utils/categorizer.js";
import { findAllDateMatches, findDateMatch, parseDate } from "../utils/date-parser.js";
import { flattenText, nextElementSibling, previousElementSibling, tagNameOf, textNodesOf } from "../utils/dom.js";
import type { PlatformProfile, ReleaseGroup } from "../types.js";
import { toItem } from "./StructuredExtractor.js";

/**
 * Receives each group as soon as it is found, so later candidates are checked against it.
 */
export interface GroupSink extends PayloadLookup {
  add(group: ReleaseGroup): boolean;
}

/**
 * Fallback extraction for pages without date headers.
 *
 * Pass A looks at role-marked `div`s and searches their neighbourhood for a date.
 * Pass B scans every text node for embedded dates and uses the parent element as
 * the item. Both passes emit single-item groups and skip payloads already in `sink`.
 */
export class UnstructuredExtractor {
  constructor(
    private readonly profile: PlatformProfile,
    private readonly sourceUrl: string,
    private readonly cutoff: DateTime
  ) {}

  extract(root: HTMLElement, sink: GroupSink): void {
    this.scanRoleMarkedElements(root, sink);
    this.scanTextNodes(root, sink);
  }

  private scanRoleMarkedElements(root: HTMLElement, sink: GroupSink): void {
    for (const element of root.getElementsByTagName("div")) {
      if (!hasReleaseRole(element)) {
        continue;
      }
      const found = this.findNearbyDate(element);
      if (found && isWithinWindow(found.date, this.cutoff)) {
        this.emit(element, found.date, found.dateText, sink);
      }
    }
  }

  // Previous sibling, parent, next sibling. Only the first matching pattern of each is parsed.
  private findNearbyDate(element: HTMLElement): { date: DateTime; dateText: string } | null {
    const neighbours = [previousElementSibling(element), element.parentNode, nextElementSibling(element)];
    for (const neighbour of neighbours) {
      if (!neighbour) {
        continue;
      }
      const dateText = findDateMatch(flattenText(neighbour), this.profile.datePatterns);
      const date = dateText ? parseDate(dateText) : null;
      if (date && dateText) {
        return { date, dateText };
      }
    }
    return null;
  }

  private scanTextNodes(root: HTMLElement, sink: GroupSink): void {
    for (const node of textNodesOf(root)) {
      const text = node.text.trim();
      if (!text) {
        continue;
      }

      const parent: HTMLElement | null = node.parentNode;
      if (!parent || REMOVED_TAGS.includes(tagNameOf(parent))) {
        continue;
      }

      for (const dateText of findAllDateMatches(text, this.profile.datePatterns)) {
        const date = parseDate(dateText);
        if (isWithinWindow(date, this.cutoff)) {
          this.emit(parent, date, dateText, sink);
        }
      }
    }
  }

  private emit(element: HTMLElement, date: DateTime, dateText: string, sink: GroupSink): void {
    const item = toItem(element, MIN_UNSTRUCTURED_TEXT_LENGTH);
    if (!item || sink.hasPayload(item.raw)) {
      return;
    }
    sink.add({ date, dateText, items: [item], sourceUrl: this.sourceUrl });
  }
}

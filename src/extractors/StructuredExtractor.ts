import { HTMLElement } from "node-html-parser";
import type { DateTime } from "luxon";
import { LIST_TAGS, MIN_STRUCTURED_TEXT_LENGTH } from "../constants.js";
import { categorize, hasReleaseRole, roleHintOf } from "../utils/categorizer.js";
import { firstCapture, parseDate } from "../utils/date-parser.js";
import { collectLinks, flattenText, tagNameOf } from "../utils/dom.js";
import type { PlatformProfile, ReleaseGroup, ReleaseItem } from "../types.js";

interface HeaderDate {
  date: DateTime;
  dateText: string;
}

/**
 * Builds one release group per date-bearing header by walking the header's
 * following siblings up to the next header.
 */
export class StructuredExtractor {
  constructor(
    private readonly profile: PlatformProfile,
    private readonly sourceUrl: string
  ) {}

  extract(root: HTMLElement): ReleaseGroup[] {
    const groups: ReleaseGroup[] = [];

    for (const headerTag of this.profile.headerTags) {
      for (const header of root.getElementsByTagName(headerTag)) {
        const headerDate = this.readHeaderDate(header);
        if (!headerDate) {
          continue;
        }

        const items = this.collectSection(header);
        if (items.length > 0) {
          groups.push({ ...headerDate, items, sourceUrl: this.sourceUrl });
        }
      }
    }

    return groups;
  }

  // A pattern that matches but does not parse lets the next pattern try.
  private readHeaderDate(header: HTMLElement): HeaderDate | null {
    const text = flattenText(header);
    for (const pattern of this.profile.datePatterns) {
      const dateText = firstCapture(text, pattern);
      const date = dateText ? parseDate(dateText) : null;
      if (date && dateText) {
        return { date, dateText };
      }
    }
    return null;
  }

  // One pass over the parent's children, starting after the header.
  private collectSection(header: HTMLElement): ReleaseItem[] {
    const items: ReleaseItem[] = [];
    const parent: HTMLElement | null = header.parentNode;
    if (!parent) {
      return items;
    }

    const siblings = parent.childNodes;
    for (let index = siblings.indexOf(header) + 1; index > 0 && index < siblings.length; index++) {
      const sibling = siblings[index];
      if (!(sibling instanceof HTMLElement)) {
        continue;
      }
      if (this.profile.headerTags.includes(tagNameOf(sibling))) {
        break;
      }
      items.push(...this.itemsFrom(sibling));
    }

    return items;
  }

  private itemsFrom(element: HTMLElement): ReleaseItem[] {
    const tag = tagNameOf(element);

    if (hasReleaseRole(element)) {
      const item = toItem(element, MIN_STRUCTURED_TEXT_LENGTH);
      return item ? [item] : [];
    }

    if (!this.profile.contentTags.includes(tag)) {
      return [];
    }

    if (LIST_TAGS.includes(tag)) {
      return element
        .getElementsByTagName("li")
        .map((entry) => toItem(entry, 0))
        .filter((item): item is ReleaseItem => item !== null);
    }

    const item = toItem(element, MIN_STRUCTURED_TEXT_LENGTH);
    return item ? [item] : [];
  }
}

/**
 * Turns an element into a release item when its flattened text is longer than `minLength`.
 */
export function toItem(element: HTMLElement, minLength: number): ReleaseItem | null {
  const text = flattenText(element);
  if (!text || text.length <= minLength) {
    return null;
  }
  return {
    raw: element.outerHTML,
    category: categorize(roleHintOf(element), text),
    links: collectLinks(element),
  };
}

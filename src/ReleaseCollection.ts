import type { DateTime } from "luxon";
import { DAYS_PER_MONTH } from "./constants.js";
import type { ReleaseGroup } from "./types.js";

/**
 * Read-only view used by extractors to check for already-emitted payloads.
 */
export interface PayloadLookup {
  hasPayload(raw: string): boolean;
}

/**
 * Run-scoped accumulator of release groups.
 *
 * Groups with no items are rejected, and every raw payload added is indexed so
 * the fallback extractor can avoid emitting the same fragment twice.
 */
export class ReleaseCollection implements PayloadLookup {
  private readonly groups: ReleaseGroup[] = [];
  private readonly payloads = new Set<string>();

  add(group: ReleaseGroup): boolean {
    if (group.items.length === 0) {
      return false;
    }
    this.groups.push(group);
    for (const item of group.items) {
      this.payloads.add(item.raw);
    }
    return true;
  }

  hasPayload(raw: string): boolean {
    return this.payloads.has(raw);
  }

  get size(): number {
    return this.groups.length;
  }

  toArray(): ReleaseGroup[] {
    return [...this.groups];
  }
}

/**
 * Start of the retention window: the start of `now`'s day minus `months * 30` days.
 */
export function computeCutoff(months: number, now: DateTime): DateTime {
  return now.toUTC().startOf("day").minus({ days: months * DAYS_PER_MONTH });
}

export function isWithinWindow(date: DateTime | null, cutoff: DateTime): date is DateTime {
  return date !== null && date.toMillis() >= cutoff.toMillis();
}

export function filterByCutoff(groups: ReadonlyArray<ReleaseGroup>, cutoff: DateTime): ReleaseGroup[] {
  return groups.filter((group) => isWithinWindow(group.date, cutoff));
}

/** Newest first. Stable, so groups sharing a date keep discovery order. */
export function sortByDateDescending(groups: ReadonlyArray<ReleaseGroup>): ReleaseGroup[] {
  return [...groups].sort((a, b) => millisOf(b.date) - millisOf(a.date));
}

function millisOf(date: DateTime | null): number {
  return date ? date.toMillis() : Number.NEGATIVE_INFINITY;
}

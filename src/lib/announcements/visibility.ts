/**
 * @fileoverview Display ordering and the active-window filter.
 *
 * Two views, intentionally different:
 *  - public dashboard: only records inside [start_date, end_date), oldest start first
 *  - staff listing: every record, newest start first
 * @module lib/announcements/visibility
 */
import { parseIsoTimestamp } from '@/lib/utils/dates';
import type { Announcement } from '@/types/announcement';

/**
 * Records whose window contains `now` (start inclusive, end exclusive).
 * Records with a missing or unparseable date are skipped.
 */
export function selectActiveAnnouncements(
  announcements: readonly Announcement[],
  now: Date,
): Announcement[] {
  const t = now.getTime();
  const active: { announcement: Announcement; start: number }[] = [];

  for (const announcement of announcements) {
    const start = parseIsoTimestamp(announcement.start_date);
    const end = parseIsoTimestamp(announcement.end_date);
    if (start === null || end === null) continue;
    if (start <= t && t < end) active.push({ announcement, start });
  }

  return active
    .sort((a, b) => a.start - b.start || a.announcement.id.localeCompare(b.announcement.id))
    .map((entry) => entry.announcement);
}

function startKey(announcement: Announcement): number {
  return parseIsoTimestamp(announcement.start_date) ?? Number.NEGATIVE_INFINITY;
}

/** Staff listing order: newest start first, unparseable starts last. */
export function sortForListing(announcements: readonly Announcement[]): Announcement[] {
  return [...announcements].sort((a, b) => {
    const ka = startKey(a);
    const kb = startKey(b);
    if (ka === kb) return a.id.localeCompare(b.id);
    return kb > ka ? 1 : -1;
  });
}

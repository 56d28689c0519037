import type { ReportGroup, ReportItem } from '../domain/index.js';
import { MEETINGS_ORIGIN } from '../domain/index.js';

/**
 * Partitions merged items by origin.
 *
 * Meetings share one synthetic group that always comes first. Other
 * groups appear in the order their origin is first seen, so a sequence
 * ordered by recency puts the most recently touched origin on top.
 * Empty groups are never emitted.
 */
export function group(items: readonly ReportItem[]): ReportGroup[] {
  const meetings: ReportItem[] = [];
  const byOrigin = new Map<string, ReportItem[]>();

  for (const item of items) {
    if (item.kind === 'Meeting') {
      meetings.push(item);
      continue;
    }

    const bucket = byOrigin.get(item.origin);
    if (bucket === undefined) {
      byOrigin.set(item.origin, [item]);
    } else {
      bucket.push(item);
    }
  }

  const groups: ReportGroup[] = [];
  if (meetings.length > 0) {
    groups.push({ origin: MEETINGS_ORIGIN, items: meetings });
  }
  for (const [origin, bucket] of byOrigin) {
    groups.push({ origin, items: bucket });
  }

  return groups;
}

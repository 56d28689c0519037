import type { ReportGroup, ReportItem } from '../domain/index.js';
import { compareText, itemLabel } from './ordering.js';

function compareItems(a: ReportItem, b: ReportItem): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime()
    || compareText(itemLabel(a), itemLabel(b))
    || compareText(a.title, b.title)
  );
}

/** Orders a group's items oldest first; equal timestamps fall back to url (or title). */
export function sort(reportGroup: ReportGroup): ReportGroup {
  return {
    origin: reportGroup.origin,
    items: [...reportGroup.items].sort(compareItems),
  };
}

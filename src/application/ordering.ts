import type { ReportItem } from '../domain/index.js';

/**
 * Code-unit string comparison.
 * `localeCompare` is avoided so output does not depend on the host locale.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Secondary sort key of an item: its url, or its title when it has none. */
export function itemLabel(item: Pick<ReportItem, 'url' | 'title'>): string {
  return item.url ?? item.title;
}

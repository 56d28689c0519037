import type { EventKind, ReportItem, ReportModel } from '../domain/index.js';

const KIND_LABELS: Readonly<Record<EventKind, string>> = {
  PullRequest: 'PR',
  Issue: 'Issue',
  Meeting: 'Meeting',
};

export const EMPTY_REPORT_TEXT = 'No activity found.';

function renderItem(item: ReportItem): string {
  const parts = [`[${KIND_LABELS[item.kind]}]`, `(${item.actions.join(', ')})`, item.title];
  if (item.kind !== 'Meeting' && item.url !== null) {
    parts.push(item.url);
  }
  return parts.join(' ');
}

/**
 * Plain-text report:
 *
 * ```
 * - owner/repo:
 *   * [PR] (opened, merged) Add retries https://github.com/owner/repo/pull/1
 * ```
 */
export function renderText(model: ReportModel): string {
  if (model.groups.length === 0) return EMPTY_REPORT_TEXT;

  const lines: string[] = [];
  for (const reportGroup of model.groups) {
    lines.push(`- ${reportGroup.origin}:`);
    for (const item of reportGroup.items) {
      lines.push(`  * ${renderItem(item)}`);
    }
  }
  return lines.join('\n');
}

/** Lossless JSON form; timestamps become ISO-8601 strings. */
export function renderJson(model: ReportModel): string {
  return JSON.stringify(model, null, 2);
}

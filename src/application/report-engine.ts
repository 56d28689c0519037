import type { Logger } from 'pino';
import type { RawEvent, ReportConfig, ReportModel, ReportWindow } from '../domain/index.js';
import { assertValidWindow } from './report-window.js';
import { normalizeBatch } from './normalizer.js';
import { merge } from './merger.js';
import { group } from './grouper.js';
import { sort } from './sorter.js';

/**
 * Report engine: one deterministic pass over a fully fetched batch.
 *
 * 1. Validates the window (throws ValidationError before any work).
 * 2. Normalizes raw events, dropping unknown, incomplete and out-of-window ones.
 * 3. Merges events that reference the same item.
 * 4. Groups by origin (meetings first).
 * 5. Sorts each group chronologically.
 *
 * No I/O and no clock reads; the logger only receives diagnostics.
 */
export function buildReport(
  rawEvents: readonly RawEvent[],
  window: ReportWindow,
  config: ReportConfig,
  log?: Logger,
): ReportModel {
  assertValidWindow(window);

  const { events, stats } = normalizeBatch(rawEvents, window, config);
  log?.debug({ ...stats }, 'Raw events normalized');

  if (stats.incomplete > 0) {
    log?.debug({ incomplete: stats.incomplete }, 'Dropped raw events with missing fields');
  }

  const items = merge(events);
  const groups = group(items).map(sort);

  log?.debug(
    { items: items.length, groups: groups.length },
    'Report built',
  );

  return { groups };
}

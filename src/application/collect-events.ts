import type { Logger } from 'pino';
import type { EventSource, RawEvent, ReportWindow } from '../domain/index.js';

/**
 * Fetches every source concurrently and concatenates their events.
 *
 * All-or-nothing: if one source rejects, the whole collection rejects
 * and no report is built from the rest.
 */
export async function collectRawEvents(
  sources: readonly EventSource[],
  window: ReportWindow,
  log: Logger,
): Promise<RawEvent[]> {
  const batches = await Promise.all(
    sources.map(async (source) => {
      const events = await source.fetchRawEvents(window);
      log.debug({ source: source.name, count: events.length }, 'Raw events fetched');
      return events;
    }),
  );

  return batches.flat();
}

import type { RawEvent, ReportWindow } from './event.js';

/**
 * Anything that can produce raw events for a window.
 *
 * The report engine only ever sees the RawEvent shape, never a
 * source's own representation.
 */
export interface EventSource {
  readonly name: string;
  fetchRawEvents(window: ReportWindow): Promise<RawEvent[]>;
}

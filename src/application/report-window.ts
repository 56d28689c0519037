import type { ReportWindow } from '../domain/index.js';
import { ValidationError } from '../domain/index.js';

/**
 * Rejects a window that cannot contain any event.
 * Runs before normalization; an empty window is a caller bug, not an empty report.
 */
export function assertValidWindow(window: ReportWindow): void {
  const since = window.since.getTime();
  const until = window.until.getTime();

  if (Number.isNaN(since) || Number.isNaN(until)) {
    throw new ValidationError('Report window contains an invalid date');
  }

  if (since >= until) {
    throw new ValidationError(
      `Report window is empty: since (${window.since.toISOString()}) must be before until (${window.until.toISOString()})`,
    );
  }
}

/** `since` inclusive, `until` exclusive. */
export function isWithinWindow(timestamp: Date, window: ReportWindow): boolean {
  const t = timestamp.getTime();
  return t >= window.since.getTime() && t < window.until.getTime();
}

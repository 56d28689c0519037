import { DateTime } from 'luxon';
import type { ReportWindow } from '../domain/index.js';
import { ValidationError } from '../domain/index.js';

/** Luxon weekday numbers (Monday = 1). */
const WEEKDAYS: ReadonlyMap<string, number> = new Map([
  ['monday', 1], ['mon', 1],
  ['tuesday', 2], ['tue', 2],
  ['wednesday', 3], ['wed', 3],
  ['thursday', 4], ['thu', 4],
  ['friday', 5], ['fri', 5],
  ['saturday', 6], ['sat', 6],
  ['sunday', 7], ['sun', 7],
]);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface ResolveOptions {
  readonly now: Date;
  /** IANA zone the day boundaries are computed in. */
  readonly zone: string;
}

/**
 * Resolves a day shortcut to the start of that day in `zone`.
 *
 * Accepts `today`, `yesterday`, a weekday name (the most recent one
 * strictly before today, so `friday` on a Friday means a week ago) or
 * an ISO date `YYYY-MM-DD`.
 */
export function resolveDay(input: string, options: ResolveOptions): Date {
  const today = DateTime.fromJSDate(options.now, { zone: options.zone }).startOf('day');
  if (!today.isValid) {
    throw new ValidationError(`Invalid time zone "${options.zone}"`);
  }

  const value = input.trim().toLowerCase();

  if (value === 'today') return today.toJSDate();
  if (value === 'yesterday') return today.minus({ days: 1 }).toJSDate();

  const weekday = WEEKDAYS.get(value);
  if (weekday !== undefined) {
    const daysBack = (today.weekday - weekday + 7) % 7 || 7;
    return today.minus({ days: daysBack }).toJSDate();
  }

  if (ISO_DATE.test(value)) {
    const date = DateTime.fromISO(value, { zone: options.zone });
    if (date.isValid) return date.startOf('day').toJSDate();
  }

  throw new ValidationError(
    `Cannot resolve "${input}": use today, yesterday, a weekday name or YYYY-MM-DD`,
  );
}

/**
 * Builds the report window from CLI shortcuts.
 * `since` defaults to yesterday; `until` defaults to `now`.
 */
export function resolveWindow(
  shortcuts: { readonly since?: string | undefined; readonly until?: string | undefined },
  options: ResolveOptions,
): ReportWindow {
  const since = resolveDay(shortcuts.since ?? 'yesterday', options);
  const until = shortcuts.until === undefined ? options.now : resolveDay(shortcuts.until, options);
  return { since, until };
}

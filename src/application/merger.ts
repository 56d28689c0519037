import type { Action, Event, EventKind, ReportItem } from '../domain/index.js';
import { ACTION_PRIORITY } from '../domain/index.js';
import { compareText, itemLabel } from './ordering.js';

interface MergeEntry {
  readonly origin: string;
  readonly url: string | null;
  kind: EventKind;
  title: string;
  timestamp: Date;
  readonly actions: Action[];
}

/**
 * Identity of a report item.
 *
 * With a url: `(origin, url)`. Without one (meetings): only an identical
 * `(origin, title, timestamp)` is the same item.
 */
/**
 * GitHub reports a comment on a pull request as an issue comment whose
 * link is the `/pull/N` url, so the same item can arrive as both kinds.
 * The pull request label wins regardless of event order.
 */
const KIND_PRECEDENCE: Readonly<Record<EventKind, number>> = {
  PullRequest: 0,
  Issue: 1,
  Meeting: 2,
};

function strongerKind(a: EventKind, b: EventKind): EventKind {
  return KIND_PRECEDENCE[b] < KIND_PRECEDENCE[a] ? b : a;
}

function mergeKey(origin: string, url: string | null, title: string, timestamp: Date): string {
  if (url !== null) return `url\u0000${origin}\u0000${url}`;
  return `title\u0000${origin}\u0000${title}\u0000${timestamp.toISOString()}`;
}

/**
 * Chronological order with a canonical fallback, so folding the same
 * multiset in any input order yields the same result.
 */
function compareEvents(a: Event, b: Event): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime()
    || ACTION_PRIORITY[a.action] - ACTION_PRIORITY[b.action]
    || compareText(a.origin, b.origin)
    || compareText(itemLabel(a), itemLabel(b))
    || compareText(a.title, b.title)
  );
}

function compareItemsChronologically(a: ReportItem, b: ReportItem): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime()
    || compareText(a.origin, b.origin)
    || compareText(itemLabel(a), itemLabel(b))
    || compareText(a.title, b.title)
  );
}

/** Most recent activity first; this is the sequence the grouper reads. */
function compareByRecency(a: ReportItem, b: ReportItem): number {
  return (
    b.timestamp.getTime() - a.timestamp.getTime()
    || compareText(a.origin, b.origin)
    || compareText(itemLabel(a), itemLabel(b))
  );
}

function toItems(entries: Iterable<MergeEntry>): ReportItem[] {
  const items: ReportItem[] = [];
  for (const entry of entries) {
    items.push({
      origin: entry.origin,
      kind: entry.kind,
      title: entry.title,
      url: entry.url,
      actions: [...entry.actions],
      timestamp: entry.timestamp,
    });
  }
  return items.sort(compareByRecency);
}

/**
 * Folds events that reference the same item into one ReportItem.
 *
 * - `actions` is the union of contributing actions in order of first
 *   occurrence; same-instant actions fall back to ACTION_PRIORITY.
 * - `timestamp` and `title` come from the latest contributor; `kind`
 *   is the pull request label when any contributor is a pull request.
 * - The returned sequence is ordered most recent first.
 */
export function merge(events: readonly Event[]): ReportItem[] {
  const entries = new Map<string, MergeEntry>();

  for (const event of [...events].sort(compareEvents)) {
    const key = mergeKey(event.origin, event.url, event.title, event.timestamp);
    const entry = entries.get(key);

    if (entry === undefined) {
      entries.set(key, {
        origin: event.origin,
        url: event.url,
        kind: event.kind,
        title: event.title,
        timestamp: event.timestamp,
        actions: [event.action],
      });
      continue;
    }

    if (!entry.actions.includes(event.action)) {
      entry.actions.push(event.action);
    }

    // Input is sorted ascending, so this event is the latest seen so far.
    entry.timestamp = event.timestamp;
    entry.title = event.title;
    entry.kind = strongerKind(entry.kind, event.kind);
  }

  return toItems(entries.values());
}

/**
 * Merges items that may already be the output of {@link merge}.
 *
 * Action order of each contributing item is kept; actions of later
 * items are appended when new. Items with unique keys pass through
 * unchanged, which makes `mergeItems(merge(events))` equal `merge(events)`.
 */
export function mergeItems(items: readonly ReportItem[]): ReportItem[] {
  const entries = new Map<string, MergeEntry>();

  for (const item of [...items].sort(compareItemsChronologically)) {
    const key = mergeKey(item.origin, item.url, item.title, item.timestamp);
    const entry = entries.get(key);

    if (entry === undefined) {
      entries.set(key, {
        origin: item.origin,
        url: item.url,
        kind: item.kind,
        title: item.title,
        timestamp: item.timestamp,
        actions: [...item.actions],
      });
      continue;
    }

    for (const action of item.actions) {
      if (!entry.actions.includes(action)) entry.actions.push(action);
    }
    entry.timestamp = item.timestamp;
    entry.title = item.title;
    entry.kind = strongerKind(entry.kind, item.kind);
  }

  return toItems(entries.values());
}

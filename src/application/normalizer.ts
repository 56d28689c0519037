import type {
  Action,
  Event,
  EventKind,
  RawEvent,
  ReportConfig,
  ReportWindow,
} from '../domain/index.js';
import { MEETINGS_ORIGIN } from '../domain/index.js';
import { isWithinWindow } from './report-window.js';

/** Why raw events were left out of the report. */
export interface NormalizeStats {
  readonly total: number;
  readonly accepted: number;
  /** Timestamp outside `[since, until)`. */
  readonly outsideWindow: number;
  /** `(kind, action)` pair the vocabulary does not know. */
  readonly unrecognized: number;
  /** Missing title or unparseable timestamp. */
  readonly incomplete: number;
  /** Recognized but switched off by config (issue comments, self-reviews). */
  readonly excluded: number;
}

export interface NormalizeResult {
  readonly events: Event[];
  readonly stats: NormalizeStats;
}

type Mapping =
  | { readonly outcome: 'mapped'; readonly kind: EventKind; readonly action: Action }
  | { readonly outcome: 'unrecognized' }
  | { readonly outcome: 'excluded' };

const UNRECOGNIZED: Mapping = { outcome: 'unrecognized' };
const EXCLUDED: Mapping = { outcome: 'excluded' };

function mapped(kind: EventKind, action: Action): Mapping {
  return { outcome: 'mapped', kind, action };
}

/**
 * GitHub events API vocabulary.
 *
 * A closed pull request only counts when it was merged. Reviews of the
 * viewer's own pull requests are replies to feedback, not reviews.
 */
function mapGithub(raw: RawEvent, config: ReportConfig): Mapping {
  const ownPullRequest = config.viewer !== undefined && raw.author === config.viewer;

  switch (raw.kind) {
    case 'PullRequestEvent':
      if (raw.action === 'opened') return mapped('PullRequest', 'opened');
      if (raw.action === 'closed' && raw.merged === true) return mapped('PullRequest', 'merged');
      return UNRECOGNIZED;

    case 'PullRequestReviewEvent':
      if (raw.action !== 'submitted' && raw.action !== 'created') return UNRECOGNIZED;
      return ownPullRequest ? EXCLUDED : mapped('PullRequest', 'reviewed');

    case 'PullRequestReviewCommentEvent':
      if (raw.action !== 'created') return UNRECOGNIZED;
      return ownPullRequest ? EXCLUDED : mapped('PullRequest', 'reviewed');

    case 'IssuesEvent':
      return raw.action === 'opened' ? mapped('Issue', 'opened') : UNRECOGNIZED;

    case 'IssueCommentEvent':
      if (raw.action !== 'created') return UNRECOGNIZED;
      return config.includeIssueComments ? mapped('Issue', 'commented') : EXCLUDED;

    default:
      return UNRECOGNIZED;
  }
}

/** Calendar entries count only once confirmed (declined and cancelled are dropped). */
function mapCalendar(raw: RawEvent): Mapping {
  if (raw.kind === 'event' && raw.action === 'confirmed') return mapped('Meeting', 'attended');
  return UNRECOGNIZED;
}

function mapRawEvent(raw: RawEvent, config: ReportConfig): Mapping {
  switch (raw.source) {
    case 'github':
      return mapGithub(raw, config);
    case 'calendar':
      return mapCalendar(raw);
    default:
      return UNRECOGNIZED;
  }
}

function parseTimestamp(value: string | undefined): Date | null {
  if (value === undefined || value === '') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Converts raw events into canonical events and counts everything dropped.
 *
 * Checks run in a fixed order: vocabulary first (so an unknown upstream
 * event type is never reported as incomplete), then required fields,
 * then the window.
 */
export function normalizeBatch(
  rawEvents: readonly RawEvent[],
  window: ReportWindow,
  config: ReportConfig,
): NormalizeResult {
  const events: Event[] = [];
  let outsideWindow = 0;
  let unrecognized = 0;
  let incomplete = 0;
  let excluded = 0;

  for (const raw of rawEvents) {
    const mapping = mapRawEvent(raw, config);

    if (mapping.outcome === 'unrecognized') {
      unrecognized++;
      continue;
    }
    if (mapping.outcome === 'excluded') {
      excluded++;
      continue;
    }

    const title = raw.title?.trim() ?? '';
    const timestamp = parseTimestamp(raw.timestamp);
    if (title === '' || timestamp === null) {
      incomplete++;
      continue;
    }

    if (!isWithinWindow(timestamp, window)) {
      outsideWindow++;
      continue;
    }

    const isMeeting = mapping.kind === 'Meeting';

    events.push({
      origin: isMeeting ? MEETINGS_ORIGIN : raw.origin,
      kind: mapping.kind,
      action: mapping.action,
      title,
      url: isMeeting || !raw.url ? null : raw.url,
      timestamp,
    });
  }

  return {
    events,
    stats: {
      total: rawEvents.length,
      accepted: events.length,
      outsideWindow,
      unrecognized,
      incomplete,
      excluded,
    },
  };
}

/** Canonical events only; see {@link normalizeBatch} for the drop counters. */
export function normalize(
  rawEvents: readonly RawEvent[],
  window: ReportWindow,
  config: ReportConfig,
): Event[] {
  return normalizeBatch(rawEvents, window, config).events;
}

/**
 * Core domain types for the standup event model.
 *
 * A RawEvent is what a source hands over; an Event is the canonical
 * shape the report engine works on. Neither carries framework types.
 */

/** Where a raw event came from. Each source speaks its own vocabulary. */
export type EventSourceName = 'github' | 'calendar';

/**
 * Source-specific event record.
 *
 * `kind` and `action` are kept verbatim from the upstream API
 * (`PullRequestEvent` / `closed`, `event` / `confirmed`, ...).
 * `title` and `timestamp` are optional here because upstream payloads
 * do not always carry them; the normalizer drops such records.
 */
export interface RawEvent {
  readonly source: EventSourceName;
  /** Grouping key, e.g. `owner/repo`. */
  readonly origin: string;
  /** Upstream identifier of the underlying item (PR id, issue id, calendar event id). */
  readonly subject: string;
  readonly kind: string;
  readonly action: string;
  readonly title?: string | undefined;
  readonly url?: string | null | undefined;
  readonly timestamp?: string | undefined; // ISO-8601
  /** Pull requests only: set when a `closed` action was a merge. */
  readonly merged?: boolean | undefined;
  /** Login of the item's author, where the source reports one. */
  readonly author?: string | undefined;
}

export type EventKind = 'PullRequest' | 'Issue' | 'Meeting';

export type Action = 'opened' | 'merged' | 'reviewed' | 'commented' | 'attended';

/**
 * Tie-break order for actions that happened at the same instant.
 * Lower sorts first.
 */
export const ACTION_PRIORITY: Readonly<Record<Action, number>> = {
  opened: 0,
  reviewed: 1,
  commented: 2,
  merged: 3,
  attended: 4,
};

/** Canonical event produced by the normalizer. */
export interface Event {
  readonly origin: string;
  readonly kind: EventKind;
  readonly action: Action;
  readonly title: string;
  readonly url: string | null;
  readonly timestamp: Date;
}

/** Half-open interval `[since, until)`. */
export interface ReportWindow {
  readonly since: Date;
  readonly until: Date;
}

/** Options the engine recognizes. Always passed in, never read from ambient state. */
export interface ReportConfig {
  readonly includeIssueComments: boolean;
  /** Login of the person the report is for; their own PRs are not counted as reviewed. */
  readonly viewer?: string | undefined;
}

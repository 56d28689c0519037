import type { Action, EventKind } from './event.js';

/** Origin of the synthetic group that collects every meeting. */
export const MEETINGS_ORIGIN = 'meetings';

/**
 * One line of the report.
 *
 * `actions` is duplicate-free and never empty; its order is the order
 * in which the actions first happened.
 */
export interface ReportItem {
  readonly origin: string;
  readonly kind: EventKind;
  readonly title: string;
  readonly url: string | null;
  readonly actions: readonly Action[];
  /** Latest contributing timestamp. */
  readonly timestamp: Date;
}

export interface ReportGroup {
  readonly origin: string;
  readonly items: readonly ReportItem[];
}

export interface ReportModel {
  readonly groups: readonly ReportGroup[];
}

import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Event, RawEvent, ReportItem, ReportWindow } from '../src/domain/index.js';

/** Friday 2026-10-16, UTC. */
export const WINDOW: ReportWindow = {
  since: new Date('2026-10-16T00:00:00Z'),
  until: new Date('2026-10-17T00:00:00Z'),
};

export const PR_URL = 'https://github.com/acme/api/pull/1';

/**
 * Factory for raw GitHub events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRawEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    source: 'github',
    origin: 'acme/api',
    subject: '1',
    kind: 'PullRequestEvent',
    action: 'opened',
    title: 'Add retries',
    url: PR_URL,
    timestamp: '2026-10-16T09:00:00Z',
    ...overrides,
  };
}

/** Factory for canonical events. */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    origin: 'acme/api',
    kind: 'PullRequest',
    action: 'opened',
    title: 'Add retries',
    url: PR_URL,
    timestamp: new Date('2026-10-16T09:00:00Z'),
    ...overrides,
  };
}

/** Factory for report items. */
export function makeItem(overrides: Partial<ReportItem> = {}): ReportItem {
  return {
    origin: 'acme/api',
    kind: 'PullRequest',
    title: 'Add retries',
    url: PR_URL,
    actions: ['opened'],
    timestamp: new Date('2026-10-16T09:00:00Z'),
    ...overrides,
  };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

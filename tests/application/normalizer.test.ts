import { describe, it, expect } from 'vitest';
import { normalize, normalizeBatch } from '../../src/application/normalizer.js';
import type { ReportConfig } from '../../src/domain/index.js';
import { PR_URL, WINDOW, makeRawEvent } from '../helpers.js';

const config: ReportConfig = { includeIssueComments: false, viewer: 'octo' };

describe('normalize', () => {
  // --- GitHub vocabulary ---

  it('maps an opened pull request to the canonical shape', () => {
    const events = normalize([makeRawEvent()], WINDOW, config);

    expect(events).toEqual([
      {
        origin: 'acme/api',
        kind: 'PullRequest',
        action: 'opened',
        title: 'Add retries',
        url: PR_URL,
        timestamp: new Date('2026-10-16T09:00:00Z'),
      },
    ]);
  });

  it('maps a merged close to merged', () => {
    const events = normalize([makeRawEvent({ action: 'closed', merged: true })], WINDOW, config);
    expect(events.map((e) => e.action)).toEqual(['merged']);
  });

  it('drops a pull request closed without merging', () => {
    const result = normalizeBatch([makeRawEvent({ action: 'closed', merged: false })], WINDOW, config);
    expect(result.events).toEqual([]);
    expect(result.stats.unrecognized).toBe(1);
  });

  it('maps submitted and created reviews to reviewed', () => {
    const events = normalize(
      [
        makeRawEvent({ kind: 'PullRequestReviewEvent', action: 'submitted', author: 'someone' }),
        makeRawEvent({ kind: 'PullRequestReviewEvent', action: 'created', author: 'someone' }),
        makeRawEvent({ kind: 'PullRequestReviewCommentEvent', action: 'created', author: 'someone' }),
      ],
      WINDOW,
      config,
    );

    expect(events.map((e) => [e.kind, e.action])).toEqual([
      ['PullRequest', 'reviewed'],
      ['PullRequest', 'reviewed'],
      ['PullRequest', 'reviewed'],
    ]);
  });

  it('excludes reviews on the viewer\'s own pull requests', () => {
    const result = normalizeBatch(
      [
        makeRawEvent({ kind: 'PullRequestReviewEvent', action: 'submitted', author: 'octo' }),
        makeRawEvent({ kind: 'PullRequestReviewCommentEvent', action: 'created', author: 'octo' }),
      ],
      WINDOW,
      config,
    );

    expect(result.events).toEqual([]);
    expect(result.stats.excluded).toBe(2);
  });

  it('keeps own-PR reviews when no viewer is configured', () => {
    const events = normalize(
      [makeRawEvent({ kind: 'PullRequestReviewEvent', action: 'submitted', author: 'octo' })],
      WINDOW,
      { includeIssueComments: false },
    );
    expect(events).toHaveLength(1);
  });

  it('maps opened issues and drops other issue actions', () => {
    const url = 'https://github.com/acme/api/issues/7';
    const result = normalizeBatch(
      [
        makeRawEvent({ kind: 'IssuesEvent', action: 'opened', url }),
        makeRawEvent({ kind: 'IssuesEvent', action: 'closed', url }),
      ],
      WINDOW,
      config,
    );

    expect(result.events.map((e) => [e.kind, e.action, e.url])).toEqual([['Issue', 'opened', url]]);
    expect(result.stats.unrecognized).toBe(1);
  });

  it('drops issue comments when includeIssueComments is false', () => {
    const result = normalizeBatch(
      [makeRawEvent({ kind: 'IssueCommentEvent', action: 'created' })],
      WINDOW,
      config,
    );
    expect(result.events).toEqual([]);
    expect(result.stats.excluded).toBe(1);
  });

  it('maps issue comments to commented when includeIssueComments is true', () => {
    const events = normalize(
      [makeRawEvent({ kind: 'IssueCommentEvent', action: 'created' })],
      WINDOW,
      { ...config, includeIssueComments: true },
    );
    expect(events.map((e) => [e.kind, e.action])).toEqual([['Issue', 'commented']]);
  });

  it('silently drops unknown event types', () => {
    const result = normalizeBatch(
      [makeRawEvent({ kind: 'PushEvent', action: '', title: undefined })],
      WINDOW,
      config,
    );
    expect(result.events).toEqual([]);
    expect(result.stats).toEqual({
      total: 1,
      accepted: 0,
      outsideWindow: 0,
      unrecognized: 1,
      incomplete: 0,
      excluded: 0,
    });
  });

  // --- calendar vocabulary ---

  it('maps confirmed calendar entries to url-less meetings', () => {
    const events = normalize(
      [
        makeRawEvent({
          source: 'calendar',
          origin: 'team@example.com',
          kind: 'event',
          action: 'confirmed',
          title: 'Daily sync',
          url: 'https://calendar.example.com/event?eid=1',
        }),
      ],
      WINDOW,
      config,
    );

    expect(events).toEqual([
      {
        origin: 'meetings',
        kind: 'Meeting',
        action: 'attended',
        title: 'Daily sync',
        url: null,
        timestamp: new Date('2026-10-16T09:00:00Z'),
      },
    ]);
  });

  it('drops declined and cancelled calendar entries', () => {
    const result = normalizeBatch(
      [
        makeRawEvent({ source: 'calendar', kind: 'event', action: 'declined' }),
        makeRawEvent({ source: 'calendar', kind: 'event', action: 'cancelled' }),
      ],
      WINDOW,
      config,
    );
    expect(result.events).toEqual([]);
    expect(result.stats.unrecognized).toBe(2);
  });

  // --- window ---

  it('includes an event exactly at since and excludes one exactly at until', () => {
    const result = normalizeBatch(
      [
        makeRawEvent({ subject: 'a', timestamp: '2026-10-16T00:00:00Z' }),
        makeRawEvent({ subject: 'b', timestamp: '2026-10-17T00:00:00Z' }),
        makeRawEvent({ subject: 'c', timestamp: '2026-10-15T23:59:59.999Z' }),
      ],
      WINDOW,
      config,
    );

    expect(result.events.map((e) => e.timestamp.toISOString())).toEqual(['2026-10-16T00:00:00.000Z']);
    expect(result.stats.outsideWindow).toBe(2);
  });

  // --- incomplete records ---

  it('drops and counts events missing a title or a usable timestamp', () => {
    const result = normalizeBatch(
      [
        makeRawEvent({ title: undefined }),
        makeRawEvent({ title: '   ' }),
        makeRawEvent({ timestamp: undefined }),
        makeRawEvent({ timestamp: 'not a date' }),
      ],
      WINDOW,
      config,
    );

    expect(result.events).toEqual([]);
    expect(result.stats.incomplete).toBe(4);
  });

  it('trims titles and turns an empty url into null', () => {
    const events = normalize([makeRawEvent({ title: '  Add retries ', url: '' })], WINDOW, config);
    expect(events[0]?.title).toBe('Add retries');
    expect(events[0]?.url).toBeNull();
  });
});

import type { Logger } from 'pino';
import type { EventSource, RawEvent, ReportWindow } from '../../domain/index.js';
import { SourceError } from '../../domain/index.js';
import { fetchJson } from '../http/index.js';
import type { FetchFn } from '../http/index.js';
import { githubEventSchema } from './github-schema.js';
import type { GithubEvent } from './github-schema.js';
import { parseLinkHeader } from './link-header.js';

const SOURCE_NAME = 'github';
const DEFAULT_BASE_URL = 'https://api.github.com';
const PER_PAGE = 100;
// GitHub serves at most 300 events per user feed; this only guards against a looping Link header.
const MAX_PAGES = 10;

export interface GithubSourceOptions {
  readonly username: string;
  readonly token: string;
  readonly log: Logger;
  readonly fetchFn?: FetchFn;
  readonly baseUrl?: string;
}

interface GithubPage {
  readonly events: GithubEvent[];
  readonly next: string | undefined;
}

function createdAt(event: GithubEvent): number {
  return event.created_at ? new Date(event.created_at).getTime() : Number.NaN;
}

/**
 * Converts a GitHub event to the source-neutral RawEvent shape.
 * Vocabulary (`PullRequestEvent`, `closed`, ...) is passed through untouched.
 */
export function toRawEvent(event: GithubEvent): RawEvent {
  const { pull_request: pullRequest, issue, action } = event.payload;
  const subject = pullRequest ?? issue;

  return {
    source: 'github',
    origin: event.repo.name,
    subject: subject !== undefined ? String(subject.id) : event.id,
    kind: event.type,
    action: action ?? '',
    title: subject?.title,
    url: subject?.html_url ?? null,
    timestamp: event.created_at ?? undefined,
    merged: pullRequest?.merged,
    author: subject?.user?.login,
  };
}

/**
 * Reads a user's public + private activity feed (`/users/{user}/events`).
 *
 * The feed is newest first. Pages are followed through the `Link`
 * header until an event older than `since` shows up or the feed ends.
 * A feed that ends before reaching `since` is logged as a warning:
 * GitHub only keeps the most recent events.
 */
export class GithubEventSource implements EventSource {
  readonly name = SOURCE_NAME;

  private readonly username: string;
  private readonly token: string;
  private readonly log: Logger;
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;

  constructor(options: GithubSourceOptions) {
    this.username = options.username;
    this.token = options.token;
    this.log = options.log;
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  }

  async fetchRawEvents(window: ReportWindow): Promise<RawEvent[]> {
    const since = window.since.getTime();
    const events: GithubEvent[] = [];
    let url: string | undefined =
      `${this.baseUrl}/users/${encodeURIComponent(this.username)}/events?per_page=${PER_PAGE}&page=1`;
    let reachedSince = false;

    for (let page = 1; page <= MAX_PAGES && url !== undefined; page++) {
      const result: GithubPage = await this.fetchPage(url);
      events.push(...result.events);

      if (result.events.some((event) => createdAt(event) < since)) {
        reachedSince = true;
        break;
      }
      url = result.next;
    }

    const oldest = events.at(-1);
    if (!reachedSince && oldest !== undefined) {
      this.log.warn(
        { user: this.username, since: window.since.toISOString(), oldest_event_at: oldest.created_at },
        'Events since the requested date are unavailable',
      );
    }

    this.log.debug({ user: this.username, count: events.length }, 'GitHub events fetched');
    return events.map(toRawEvent);
  }

  private async fetchPage(url: string): Promise<GithubPage> {
    const { body, headers } = await fetchJson(SOURCE_NAME, this.fetchFn, url, {
      headers: {
        Authorization: `token ${this.token}`,
        Accept: 'application/vnd.github+json',
        'User-Agent': 'standup-digest',
      },
    });

    if (!Array.isArray(body)) {
      throw new SourceError(SOURCE_NAME, 'expected an array of events');
    }

    const events: GithubEvent[] = [];
    let skipped = 0;
    for (const item of body) {
      const parsed = githubEventSchema.safeParse(item);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.log.debug({ skipped }, 'Skipped malformed GitHub events');
    }

    return { events, next: parseLinkHeader(headers.get('link')).get('next') };
  }
}

import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import type { EventSource, RawEvent, ReportWindow } from '../../domain/index.js';
import { MEETINGS_ORIGIN, SourceError } from '../../domain/index.js';
import { fetchJson } from '../http/index.js';
import type { FetchFn } from '../http/index.js';
import { calendarEventSchema, calendarListSchema, eventsPageSchema } from './google-schema.js';
import type { CalendarEvent } from './google-schema.js';

const SOURCE_NAME = 'google-calendar';
const API_BASE = 'https://www.googleapis.com/calendar/v3';
const MAX_RESULTS = 250;

/** Anything that can produce a bearer token (see GoogleSession). */
export interface AccessTokenProvider {
  accessToken(): Promise<string>;
}

export interface CalendarSourceOptions {
  readonly calendarId: string;
  readonly tokens: AccessTokenProvider;
  /** Zone all-day events are anchored in. */
  readonly zone: string;
  readonly log: Logger;
  readonly fetchFn?: FetchFn;
}

export interface CalendarSummary {
  readonly id: string;
  readonly summary: string;
  readonly primary: boolean;
}

function startTimestamp(event: CalendarEvent, zone: string): string | undefined {
  if (event.start?.dateTime) return event.start.dateTime;
  if (event.start?.date) {
    const day = DateTime.fromISO(event.start.date, { zone });
    return day.isValid ? (day.toISO() ?? undefined) : undefined;
  }
  return undefined;
}

/**
 * Converts a calendar entry to a RawEvent. A meeting the user declined
 * carries the `declined` action whatever the event status is.
 */
export function toRawEvent(event: CalendarEvent, zone: string): RawEvent {
  const declined = event.attendees?.some(
    (attendee) => attendee.self === true && attendee.responseStatus === 'declined',
  ) ?? false;

  return {
    source: 'calendar',
    origin: MEETINGS_ORIGIN,
    subject: event.id,
    kind: 'event',
    action: declined ? 'declined' : (event.status ?? ''),
    title: event.summary,
    url: event.htmlLink ?? null,
    timestamp: startTimestamp(event, zone),
  };
}

/** Google Calendar v3 events of one calendar, expanded to single instances. */
export class GoogleCalendarSource implements EventSource {
  readonly name = SOURCE_NAME;

  private readonly calendarId: string;
  private readonly tokens: AccessTokenProvider;
  private readonly zone: string;
  private readonly log: Logger;
  private readonly fetchFn: FetchFn;

  constructor(options: CalendarSourceOptions) {
    this.calendarId = options.calendarId;
    this.tokens = options.tokens;
    this.zone = options.zone;
    this.log = options.log;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetchRawEvents(window: ReportWindow): Promise<RawEvent[]> {
    const events: RawEvent[] = [];
    let pageToken: string | undefined;
    let skipped = 0;

    do {
      const params = new URLSearchParams({
        singleEvents: 'true',
        orderBy: 'startTime',
        timeMin: window.since.toISOString(),
        timeMax: window.until.toISOString(),
        maxResults: String(MAX_RESULTS),
      });
      if (pageToken !== undefined) params.set('pageToken', pageToken);

      const body = await this.get(
        `${API_BASE}/calendars/${encodeURIComponent(this.calendarId)}/events?${params.toString()}`,
      );
      const page = eventsPageSchema.safeParse(body);
      if (!page.success) {
        throw new SourceError(SOURCE_NAME, 'unexpected events response');
      }

      for (const item of page.data.items) {
        const parsed = calendarEventSchema.safeParse(item);
        if (parsed.success) {
          events.push(toRawEvent(parsed.data, this.zone));
        } else {
          skipped++;
        }
      }
      pageToken = page.data.nextPageToken;
    } while (pageToken !== undefined);

    if (skipped > 0) {
      this.log.debug({ skipped }, 'Skipped malformed calendar events');
    }
    this.log.debug({ calendar: this.calendarId, count: events.length }, 'Calendar events fetched');

    return events;
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    const calendars: CalendarSummary[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams();
      if (pageToken !== undefined) params.set('pageToken', pageToken);

      const body = await this.get(`${API_BASE}/users/me/calendarList?${params.toString()}`);
      const page = calendarListSchema.safeParse(body);
      if (!page.success) {
        throw new SourceError(SOURCE_NAME, 'unexpected calendar list response');
      }

      for (const item of page.data.items) {
        calendars.push({ id: item.id, summary: item.summary ?? item.id, primary: item.primary ?? false });
      }
      pageToken = page.data.nextPageToken;
    } while (pageToken !== undefined);

    return calendars;
  }

  private async get(url: string): Promise<unknown> {
    const accessToken = await this.tokens.accessToken();
    const { body } = await fetchJson(SOURCE_NAME, this.fetchFn, url, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    return body;
  }
}

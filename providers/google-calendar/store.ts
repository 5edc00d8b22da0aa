/**
 * Google Calendar implementation of CalendarStore
 *
 * Calendars are resolved by their display name (summaryOverride, then
 * summary). Events are listed with recurring series expanded into
 * instances, ordered by start time.
 */

import type {
  CalendarHandle,
  EventFields,
  EventRef,
  StoredEvent,
} from '../../schemas/index.js';
import type { CalendarStore } from '../types.js';
import { CalendarNotFoundError } from '../../src/errors.js';
import { googleCalendarNormalizer } from '../../normalizers/index.js';
import {
  getAccessToken,
  requestCalendarAPI,
  sendCalendarRequest,
} from './fetch.js';
import {
  GoogleCalendarEventsResponseSchema,
  GoogleCalendarListResponseSchema,
  GoogleInsertedEventSchema,
} from './types.js';
import type {
  FetchFn,
  GoogleCalendarEvent,
  GoogleCalendarListEntry,
  GoogleCalendarStoreOptions,
} from './types.js';

/** Upper bound on events read from a single query */
const MAX_EVENTS_PER_QUERY = 2500;

export class GoogleCalendarStore implements CalendarStore {
  private readonly fetchFn: FetchFn;
  private readonly options: GoogleCalendarStoreOptions;
  private accessToken: string | null = null;
  private calendars: GoogleCalendarListEntry[] | null = null;

  constructor(options: GoogleCalendarStoreOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async listCalendars(): Promise<string[]> {
    const entries = await this.loadCalendarList();
    return entries.map(displayName);
  }

  async findCalendar(name: string): Promise<CalendarHandle> {
    const entries = await this.loadCalendarList();
    const entry = entries.find((e) => displayName(e) === name || e.summary === name);

    if (!entry) {
      throw new CalendarNotFoundError(name, entries.map(displayName));
    }

    return { id: entry.id, name: displayName(entry) };
  }

  async queryEvents(calendar: CalendarHandle, start: Date, end: Date): Promise<StoredEvent[]> {
    const token = await this.token();
    const raw: GoogleCalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      const params: Record<string, string> = {
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
        singleEvents: 'true', // Expand recurring events
        orderBy: 'startTime',
        maxResults: '250',
        fields: 'items(id,summary,description,location,start,end,attendees,transparency,status),nextPageToken',
      };

      if (pageToken) {
        params.pageToken = pageToken;
      }

      const response = await requestCalendarAPI(
        this.fetchFn,
        token,
        `/calendars/${encodeURIComponent(calendar.id)}/events`,
        GoogleCalendarEventsResponseSchema,
        { params }
      );

      raw.push(...response.items);
      pageToken = response.nextPageToken;

      if (raw.length >= MAX_EVENTS_PER_QUERY) {
        console.warn(`[google-calendar] Reached ${MAX_EVENTS_PER_QUERY} events for '${calendar.name}', stopping pagination`);
        break;
      }
    } while (pageToken);

    return googleCalendarNormalizer.normalizeAll(raw, calendar.id);
  }

  async createEvent(calendar: CalendarHandle, fields: EventFields): Promise<EventRef> {
    const token = await this.token();
    const created = await requestCalendarAPI(
      this.fetchFn,
      token,
      `/calendars/${encodeURIComponent(calendar.id)}/events`,
      GoogleInsertedEventSchema,
      { method: 'POST', body: googleCalendarNormalizer.toBody(fields) }
    );

    return { calendarId: calendar.id, eventId: created.id };
  }

  async updateEvent(ref: EventRef, fields: EventFields): Promise<void> {
    const token = await this.token();
    await sendCalendarRequest(this.fetchFn, token, eventPath(ref), {
      method: 'PATCH',
      body: googleCalendarNormalizer.toBody(fields),
    });
  }

  async deleteEvent(ref: EventRef): Promise<void> {
    const token = await this.token();
    await sendCalendarRequest(this.fetchFn, token, eventPath(ref), { method: 'DELETE' });
  }

  /**
   * Drop the cached token and calendar list so the next call re-reads both
   */
  async forceRefresh(): Promise<void> {
    this.accessToken = null;
    this.calendars = null;
  }

  private async token(): Promise<string> {
    if (!this.accessToken) {
      this.accessToken = await getAccessToken(this.fetchFn, this.options.credentials);
    }
    return this.accessToken;
  }

  private async loadCalendarList(): Promise<GoogleCalendarListEntry[]> {
    if (this.calendars) {
      return this.calendars;
    }

    const token = await this.token();
    const entries: GoogleCalendarListEntry[] = [];
    let pageToken: string | undefined;

    do {
      const params: Record<string, string> = { maxResults: '250' };
      if (pageToken) {
        params.pageToken = pageToken;
      }

      const response = await requestCalendarAPI(
        this.fetchFn,
        token,
        '/users/me/calendarList',
        GoogleCalendarListResponseSchema,
        { params }
      );

      entries.push(...response.items);
      pageToken = response.nextPageToken;
    } while (pageToken);

    this.calendars = entries;
    return entries;
  }
}

function displayName(entry: GoogleCalendarListEntry): string {
  return entry.summaryOverride ?? entry.summary;
}

function eventPath(ref: EventRef): string {
  return `/calendars/${encodeURIComponent(ref.calendarId)}/events/${encodeURIComponent(ref.eventId)}`;
}

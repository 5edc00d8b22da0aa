/**
 * Google Calendar event normalizer
 */

import type { Attendee, EventFields, StoredEvent } from '../schemas/index.js';
import type {
  GoogleCalendarDateTime,
  GoogleCalendarEvent,
  GoogleEventBody,
} from '../providers/google-calendar/types.js';
import type { EventNormalizer } from './types.js';
import { formatLocalDate, parseTimestamp } from './utils.js';

/**
 * Resolve a Google start/end value; all-day values carry `date` only
 */
function parseDateTime(dt: GoogleCalendarDateTime | undefined): { instant: Date; allDay: boolean } | null {
  if (!dt) {
    return null;
  }

  if (dt.dateTime) {
    const instant = parseTimestamp(dt.dateTime);
    return instant ? { instant, allDay: false } : null;
  }

  if (dt.date) {
    const instant = parseTimestamp(dt.date);
    return instant ? { instant, allDay: true } : null;
  }

  return null;
}

function toDateTime(date: Date, allDay: boolean): GoogleCalendarDateTime {
  return allDay ? { date: formatLocalDate(date) } : { dateTime: date.toISOString() };
}

function normalizeAttendees(event: GoogleCalendarEvent): Attendee[] {
  return (event.attendees ?? []).map((attendee) => ({
    email: attendee.email,
    displayName: attendee.displayName,
    responseStatus: attendee.responseStatus,
    self: attendee.self,
    organizer: attendee.organizer,
  }));
}

/**
 * Normalize a Google Calendar event to a StoredEvent
 */
export function normalizeGoogleEvent(event: GoogleCalendarEvent, calendarId: string): StoredEvent | null {
  // Cancelled instances of recurring events still show up in listings
  if (event.status === 'cancelled') {
    return null;
  }

  const start = parseDateTime(event.start);
  const end = parseDateTime(event.end);
  if (!start || !end) {
    return null;
  }

  return {
    ref: { calendarId, eventId: event.id },
    title: event.summary ?? '',
    start: start.instant,
    end: end.instant,
    allDay: start.allDay,
    attendees: normalizeAttendees(event),
    location: event.location || undefined,
    notes: event.description,
    availability: event.transparency === 'transparent' ? 'free' : 'busy',
  };
}

/**
 * Build the insert/patch body for a destination event. `location` is always
 * sent so a patch clears a location the source no longer has.
 */
export function toGoogleEventBody(fields: EventFields): GoogleEventBody {
  return {
    summary: fields.title,
    description: fields.notes,
    location: fields.location ?? '',
    start: toDateTime(fields.start, fields.allDay),
    end: toDateTime(fields.end, fields.allDay),
    transparency: fields.availability === 'free' ? 'transparent' : 'opaque',
  };
}

export const googleCalendarNormalizer: EventNormalizer<GoogleCalendarEvent, GoogleEventBody> = {
  normalize: normalizeGoogleEvent,
  normalizeAll(items, calendarId) {
    const events: StoredEvent[] = [];
    for (const item of items) {
      const event = normalizeGoogleEvent(item, calendarId);
      if (event) {
        events.push(event);
      }
    }
    return events;
  },
  toBody: toGoogleEventBody,
};

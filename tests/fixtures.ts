import type { Attendee, CalendarEvent, StoredEvent, SyncOptions } from '../schemas/index.js';

/** Fixed reference time: 15 Jan 2024, 08:00 local */
export const NOW = new Date(2024, 0, 15, 8, 0);

/**
 * Local time on 15 Jan 2024 (or another day offset)
 */
export function at(hour: number, minute: number = 0, dayOffset: number = 0): Date {
  return new Date(2024, 0, 15 + dayOffset, hour, minute);
}

export function createEvent(overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    title: 'Standup',
    start: at(9, 0),
    end: at(9, 15),
    allDay: false,
    attendees: [],
    ...overrides,
  };
}

export function createStoredEvent(
  overrides: Partial<StoredEvent> = {},
  eventId: string = 'evt-1'
): StoredEvent {
  return {
    ref: { calendarId: 'Mirror', eventId },
    ...createEvent(),
    ...overrides,
  };
}

export const SELF_ACCEPTED: Attendee = { email: 'me@example.com', self: true, responseStatus: 'accepted' };
export const SELF_DECLINED: Attendee = { email: 'me@example.com', self: true, responseStatus: 'declined' };
export const OTHER_DECLINED: Attendee = { email: 'colleague@example.com', responseStatus: 'declined' };

export function syncOptions(overrides: Partial<SyncOptions> = {}): SyncOptions {
  return {
    days: 7,
    sourceCalendar: 'Work',
    destinationCalendar: 'Mirror',
    excludeDeclined: false,
    excludeAllDay: false,
    excludeTitlePatterns: [],
    forceRefresh: false,
    forceRecreate: false,
    ...overrides,
  };
}

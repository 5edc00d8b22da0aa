/**
 * Calendar store capability shared by all providers
 */

import type {
  CalendarHandle,
  EventFields,
  EventRef,
  StoredEvent,
} from '../schemas/index.js';

/**
 * A calendar backend that can be read from and written to.
 *
 * Source calendars are only ever read; the destination is written through
 * createEvent/updateEvent/deleteEvent.
 */
export interface CalendarStore {
  /** Names of every calendar visible to the account */
  listCalendars(): Promise<string[]>;
  /**
   * Resolve a calendar by name
   * @throws CalendarNotFoundError carrying the available names
   */
  findCalendar(name: string): Promise<CalendarHandle>;
  /** Events overlapping [start, end), ordered by start */
  queryEvents(calendar: CalendarHandle, start: Date, end: Date): Promise<StoredEvent[]>;
  createEvent(calendar: CalendarHandle, fields: EventFields): Promise<EventRef>;
  updateEvent(ref: EventRef, fields: EventFields): Promise<void>;
  deleteEvent(ref: EventRef): Promise<void>;
  /** Best-effort request to re-read upstream sources before querying */
  forceRefresh?(): Promise<void>;
}

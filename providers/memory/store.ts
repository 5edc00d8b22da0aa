/**
 * In-process CalendarStore
 *
 * Holds calendars and events in memory. Reads return copies, so a query
 * result is a snapshot that later writes do not change. Writes can be made
 * to fail per item to exercise error isolation.
 */

import type {
  CalendarEvent,
  CalendarHandle,
  EventFields,
  EventRef,
  StoredEvent,
} from '../../schemas/index.js';
import type { CalendarStore } from '../types.js';
import { CalendarNotFoundError } from '../../src/errors.js';

export type MemoryOperation =
  | 'listCalendars'
  | 'findCalendar'
  | 'queryEvents'
  | 'createEvent'
  | 'updateEvent'
  | 'deleteEvent'
  | 'forceRefresh';

/**
 * Recorded store call
 */
export interface MemoryCall {
  operation: MemoryOperation;
  calendar?: string;
  title?: string;
}

/**
 * Decides whether a write should fail; receives the operation and the event title
 */
export type FailurePredicate = (operation: 'createEvent' | 'updateEvent' | 'deleteEvent', title: string) => boolean;

function cloneEvent(event: StoredEvent): StoredEvent {
  return {
    ...event,
    ref: { ...event.ref },
    start: new Date(event.start.getTime()),
    end: new Date(event.end.getTime()),
    attendees: event.attendees.map((a) => ({ ...a })),
  };
}

export class MemoryCalendarStore implements CalendarStore {
  /** Every call made against the store, in order */
  readonly calls: MemoryCall[] = [];
  private readonly calendars = new Map<string, StoredEvent[]>();
  private failWhen: FailurePredicate | null = null;
  private nextId = 1;

  constructor(calendarNames: string[] = []) {
    for (const name of calendarNames) {
      this.addCalendar(name);
    }
  }

  addCalendar(name: string): CalendarHandle {
    if (!this.calendars.has(name)) {
      this.calendars.set(name, []);
    }
    return { id: name, name };
  }

  /**
   * Insert an event directly, bypassing call recording and failure injection
   */
  seed(calendarName: string, event: CalendarEvent): EventRef {
    const events = this.eventsOf(calendarName);
    const ref = { calendarId: calendarName, eventId: `evt-${this.nextId++}` };
    events.push(cloneEvent({ ...event, ref }));
    return ref;
  }

  /**
   * Current contents of a calendar, in insertion order
   */
  eventsIn(calendarName: string): StoredEvent[] {
    return this.eventsOf(calendarName).map(cloneEvent);
  }

  /**
   * Make subsequent writes fail when the predicate matches; null clears it
   */
  setFailurePredicate(predicate: FailurePredicate | null): void {
    this.failWhen = predicate;
  }

  async listCalendars(): Promise<string[]> {
    this.calls.push({ operation: 'listCalendars' });
    return [...this.calendars.keys()];
  }

  async findCalendar(name: string): Promise<CalendarHandle> {
    this.calls.push({ operation: 'findCalendar', calendar: name });
    if (!this.calendars.has(name)) {
      throw new CalendarNotFoundError(name, [...this.calendars.keys()]);
    }
    return { id: name, name };
  }

  async queryEvents(calendar: CalendarHandle, start: Date, end: Date): Promise<StoredEvent[]> {
    this.calls.push({ operation: 'queryEvents', calendar: calendar.name });
    return this.eventsOf(calendar.id)
      .filter((event) => event.start.getTime() < end.getTime() && event.end.getTime() > start.getTime())
      .map(cloneEvent)
      .sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  async createEvent(calendar: CalendarHandle, fields: EventFields): Promise<EventRef> {
    this.calls.push({ operation: 'createEvent', calendar: calendar.name, title: fields.title });
    this.maybeFail('createEvent', fields.title);

    const ref = { calendarId: calendar.id, eventId: `evt-${this.nextId++}` };
    this.eventsOf(calendar.id).push(this.fromFields(ref, fields, []));
    return ref;
  }

  async updateEvent(ref: EventRef, fields: EventFields): Promise<void> {
    this.calls.push({ operation: 'updateEvent', calendar: ref.calendarId, title: fields.title });
    this.maybeFail('updateEvent', fields.title);

    const events = this.eventsOf(ref.calendarId);
    const index = events.findIndex((e) => e.ref.eventId === ref.eventId);
    if (index === -1) {
      throw new Error(`Event ${ref.eventId} not found in '${ref.calendarId}'`);
    }
    events[index] = this.fromFields(ref, fields, events[index].attendees);
  }

  async deleteEvent(ref: EventRef): Promise<void> {
    const events = this.eventsOf(ref.calendarId);
    const index = events.findIndex((e) => e.ref.eventId === ref.eventId);
    const title = index === -1 ? '' : events[index].title;

    this.calls.push({ operation: 'deleteEvent', calendar: ref.calendarId, title });
    this.maybeFail('deleteEvent', title);

    if (index === -1) {
      throw new Error(`Event ${ref.eventId} not found in '${ref.calendarId}'`);
    }
    events.splice(index, 1);
  }

  async forceRefresh(): Promise<void> {
    this.calls.push({ operation: 'forceRefresh' });
  }

  private eventsOf(calendarId: string): StoredEvent[] {
    const events = this.calendars.get(calendarId);
    if (!events) {
      throw new CalendarNotFoundError(calendarId, [...this.calendars.keys()]);
    }
    return events;
  }

  private maybeFail(operation: 'createEvent' | 'updateEvent' | 'deleteEvent', title: string): void {
    if (this.failWhen?.(operation, title)) {
      throw new Error(`Simulated ${operation} failure for '${title}'`);
    }
  }

  private fromFields(ref: EventRef, fields: EventFields, attendees: StoredEvent['attendees']): StoredEvent {
    return {
      ref,
      title: fields.title,
      start: new Date(fields.start.getTime()),
      end: new Date(fields.end.getTime()),
      allDay: fields.allDay,
      attendees: attendees.map((a) => ({ ...a })),
      location: fields.location,
      notes: fields.notes,
      availability: fields.availability,
    };
  }
}

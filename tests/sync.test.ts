import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CalendarNotFoundError,
  MemoryCalendarStore,
  StoreUnavailableError,
  buildSyncWindow,
  deriveIdentity,
  readTag,
  runSync,
  writeTag,
} from '../src/index.js';
import { NOW, at, createEvent, syncOptions, SELF_ACCEPTED, SELF_DECLINED } from './fixtures.js';

function writeCalls(store: MemoryCalendarStore) {
  return store.calls.filter(
    (c) => c.operation === 'createEvent' || c.operation === 'updateEvent' || c.operation === 'deleteEvent'
  );
}

describe('buildSyncWindow', () => {
  it('should span from local midnight today through the end of day N', () => {
    const window = buildSyncWindow(7, NOW);
    expect(window.start).toEqual(new Date(2024, 0, 15));
    expect(window.end).toEqual(new Date(2024, 0, 23));
  });

  it('should cover only today for zero days', () => {
    const window = buildSyncWindow(0, at(23, 59));
    expect(window.start).toEqual(new Date(2024, 0, 15));
    expect(window.end).toEqual(new Date(2024, 0, 16));
  });
});

describe('runSync', () => {
  let store: MemoryCalendarStore;

  beforeEach(() => {
    store = new MemoryCalendarStore(['Work', 'Mirror']);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should mirror a new event with its tag and source notes', async () => {
    store.seed('Work', createEvent({ notes: 'Agenda', location: 'Room 1' }));

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary.mode).toBe('sync');
    expect(summary.created).toBe(1);
    const [mirrored] = store.eventsIn('Mirror');
    const identity = deriveIdentity(createEvent());
    expect(mirrored.title).toBe('Standup');
    expect(mirrored.location).toBe('Room 1');
    expect(mirrored.notes).toBe(`SOURCE_ID: ${identity}\nAgenda`);
    expect(mirrored.availability).toBe('busy');
  });

  it('should make no writes on a second run over unchanged data', async () => {
    store.seed('Work', createEvent({ attendees: [SELF_ACCEPTED] }));
    store.seed('Work', createEvent({ title: 'Planning', start: at(13), end: at(14), attendees: [SELF_DECLINED] }));

    await runSync(store, syncOptions(), { now: NOW });
    const writesAfterFirstRun = writeCalls(store).length;
    const second = await runSync(store, syncOptions(), { now: NOW });

    expect(writesAfterFirstRun).toBe(2);
    expect(writeCalls(store)).toHaveLength(2);
    expect(second).toMatchObject({ created: 0, updated: 0, deleted: 0, unchanged: 2, failed: 0 });
  });

  it('should replace the mirror when the source event is renamed', async () => {
    const ref = store.seed('Work', createEvent({ title: 'Standup' }));
    await runSync(store, syncOptions(), { now: NOW });

    await store.updateEvent(ref, {
      title: 'Daily Standup',
      start: at(9),
      end: at(9, 15),
      allDay: false,
      notes: '',
      availability: 'busy',
    });
    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary).toMatchObject({ created: 1, deleted: 1, updated: 0 });
    expect(store.eventsIn('Mirror').map((e) => e.title)).toEqual(['Daily Standup']);
  });

  it('should leave untagged destination events alone', async () => {
    store.seed('Mirror', createEvent({ title: 'Dentist', start: at(16), end: at(17), notes: 'Personal' }));

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary.deleted).toBe(0);
    expect(store.eventsIn('Mirror').map((e) => e.title)).toEqual(['Dentist']);
  });

  it('should flip a mirror to free when the user declines', async () => {
    const source = createEvent({ attendees: [SELF_DECLINED] });
    const identity = deriveIdentity(source);
    store.seed('Work', source);
    store.seed('Mirror', { ...createEvent(), notes: writeTag('Mine', identity), availability: 'busy' });

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary).toMatchObject({ updated: 1, created: 0, deleted: 0 });
    const [mirror] = store.eventsIn('Mirror');
    expect(mirror.availability).toBe('free');
    expect(mirror.notes).toBe(`SOURCE_ID: ${identity}\nMine`);
  });

  it('should drop excluded events from the destination', async () => {
    store.seed('Work', createEvent({ title: 'Focus time', start: at(10), end: at(12) }));
    store.seed('Work', createEvent());
    await runSync(store, syncOptions(), { now: NOW });
    expect(store.eventsIn('Mirror')).toHaveLength(2);

    const summary = await runSync(store, syncOptions({ excludeTitlePatterns: ['focus'] }), { now: NOW });

    expect(summary).toMatchObject({ found: 2, filtered: 1, deleted: 1, unchanged: 1 });
    expect(store.eventsIn('Mirror').map((e) => e.title)).toEqual(['Standup']);
  });

  it('should ignore events outside the window', async () => {
    store.seed('Work', createEvent({ title: 'Yesterday', start: at(9, 0, -1), end: at(10, 0, -1) }));
    store.seed('Work', createEvent({ title: 'Next month', start: at(9, 0, 30), end: at(10, 0, 30) }));
    store.seed('Work', createEvent({ title: 'Day seven', start: at(9, 0, 7), end: at(10, 0, 7) }));

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary.found).toBe(1);
    expect(store.eventsIn('Mirror').map((e) => e.title)).toEqual(['Day seven']);
  });

  it('should never touch the destination in list mode', async () => {
    store.seed('Work', createEvent());

    const summary = await runSync(store, syncOptions({ destinationCalendar: undefined }), { now: NOW });

    expect(summary.mode).toBe('list');
    expect(summary.candidates).toHaveLength(1);
    expect(store.calls).toEqual([
      { operation: 'findCalendar', calendar: 'Work' },
      { operation: 'queryEvents', calendar: 'Work' },
    ]);
  });

  it('should fail with the available names when the destination is missing', async () => {
    store.seed('Work', createEvent());

    const run = runSync(store, syncOptions({ destinationCalendar: 'Personal' }), { now: NOW });

    await expect(run).rejects.toBeInstanceOf(CalendarNotFoundError);
    await expect(run).rejects.toThrow("Calendar 'Personal' not found\nAvailable calendars:\n  - Work\n  - Mirror");
    expect(writeCalls(store)).toHaveLength(0);
  });

  it('should fail before any write when the source is missing', async () => {
    const run = runSync(store, syncOptions({ sourceCalendar: 'Home' }), { now: NOW });

    await expect(run).rejects.toBeInstanceOf(CalendarNotFoundError);
    expect(store.calls).toEqual([{ operation: 'findCalendar', calendar: 'Home' }]);
  });

  it('should wrap unexpected store errors as StoreUnavailableError', async () => {
    vi.spyOn(store, 'queryEvents').mockRejectedValue(new Error('socket hang up'));

    const run = runSync(store, syncOptions(), { now: NOW });

    await expect(run).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(run).rejects.toThrow("Failed to read events from 'Work': socket hang up");
  });

  it('should refresh the store first when forced', async () => {
    await runSync(store, syncOptions({ forceRefresh: true }), { now: NOW });
    expect(store.calls[0]).toEqual({ operation: 'forceRefresh' });
  });

  it('should not refresh the store by default', async () => {
    await runSync(store, syncOptions(), { now: NOW });
    expect(store.calls.some((c) => c.operation === 'forceRefresh')).toBe(false);
  });

  it('should recreate every mirror when forced', async () => {
    store.seed('Work', createEvent());
    await runSync(store, syncOptions(), { now: NOW });
    const [before] = store.eventsIn('Mirror');

    const summary = await runSync(store, syncOptions({ forceRecreate: true }), { now: NOW });

    expect(summary).toMatchObject({ created: 1, deleted: 1, unchanged: 0 });
    const [after] = store.eventsIn('Mirror');
    expect(after.ref.eventId).not.toBe(before.ref.eventId);
    expect(readTag(after.notes)).toBe(readTag(before.notes));
  });

  it('should delete later duplicates of a tagged event', async () => {
    const event = createEvent();
    const tagged = { ...event, notes: writeTag('', deriveIdentity(event)), availability: 'busy' as const };
    store.seed('Work', event);
    store.seed('Mirror', tagged);
    store.seed('Mirror', tagged);

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary).toMatchObject({ unchanged: 1, deleted: 1 });
    expect(store.eventsIn('Mirror')).toHaveLength(1);
  });

  it('should report per-item failures and continue', async () => {
    store.seed('Work', createEvent({ title: 'Good', start: at(9), end: at(10) }));
    store.seed('Work', createEvent({ title: 'Bad', start: at(10), end: at(11) }));
    store.setFailurePredicate((_operation, title) => title === 'Bad');

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary).toMatchObject({ created: 1, failed: 1 });
    expect(summary.failures[0]).toMatchObject({ operation: 'create', title: 'Bad' });
    expect(store.eventsIn('Mirror').map((e) => e.title)).toEqual(['Good']);
  });

  it('should warn about colliding identities and mirror the last one', async () => {
    store.seed('Work', createEvent({ location: 'Room A' }));
    store.seed('Work', createEvent({ location: 'Room B' }));

    const summary = await runSync(store, syncOptions(), { now: NOW });

    expect(summary.created).toBe(1);
    expect(summary.collisions).toHaveLength(1);
    expect(store.eventsIn('Mirror')[0].location).toBe('Room B');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

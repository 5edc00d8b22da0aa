/**
 * Identity and fingerprint derivation
 *
 * Identity keys an event across runs from its title and time bounds only,
 * so renaming or moving an event yields a different identity (the old copy
 * is deleted and a new one created). Fingerprint covers the fields whose
 * change triggers an update of an already-mirrored event.
 */

import { createHash } from 'node:crypto';
import type { Availability, CalendarEvent, Candidate } from '../schemas/index.js';
import { isDeclined } from './filters.js';
import type { CurrentAccount } from './filters.js';

const UNTITLED = 'Untitled';

/**
 * Title as used for identity: surrounding whitespace removed, empty becomes "Untitled"
 */
export function normalizeTitle(title: string | undefined): string {
  const trimmed = (title ?? '').trim();
  return trimmed.length > 0 ? trimmed : UNTITLED;
}

/**
 * 128-bit identity as 32 lowercase hex characters
 */
export function deriveIdentity(event: Pick<CalendarEvent, 'title' | 'start' | 'end'>): string {
  const key = `${normalizeTitle(event.title)}|${event.start.toISOString()}|${event.end.toISOString()}`;
  return createHash('md5').update(key).digest('hex');
}

export function availabilityFor(declined: boolean): Availability {
  return declined ? 'free' : 'busy';
}

/**
 * Digest over title, start, end and availability
 */
export function computeFingerprint(fields: {
  title: string;
  start: Date;
  end: Date;
  availability: Availability;
}): string {
  const canonical = JSON.stringify({
    title: fields.title,
    start: fields.start.toISOString(),
    end: fields.end.toISOString(),
    availability: fields.availability,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

/**
 * Attach identity, fingerprint and declined status to filtered events
 */
export function buildCandidates(events: CalendarEvent[], account: CurrentAccount): Candidate[] {
  return events.map((event) => {
    const declined = isDeclined(event, account);
    return {
      identity: deriveIdentity(event),
      fingerprint: computeFingerprint({
        title: event.title,
        start: event.start,
        end: event.end,
        availability: availabilityFor(declined),
      }),
      declined,
      event,
    };
  });
}

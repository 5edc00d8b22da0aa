/**
 * Filter pipeline for source events
 *
 * Each option contributes an independent keep-predicate; an event survives
 * only if every active predicate keeps it, so predicate order does not
 * matter. Source ordering is preserved.
 */

import type { Attendee, CalendarEvent, FilterOptions } from '../schemas/index.js';

/**
 * Identifies the account the sync runs as among an event's attendees
 */
export interface CurrentAccount {
  isCurrentAccount(attendee: Attendee): boolean;
}

/**
 * Current account resolved from the store's `self` flag, or from a
 * configured email address when one is given
 */
export function createCurrentAccount(email?: string): CurrentAccount {
  const normalized = email?.trim().toLowerCase();
  return {
    isCurrentAccount(attendee) {
      if (normalized) {
        return attendee.email.trim().toLowerCase() === normalized;
      }
      return attendee.self === true;
    },
  };
}

/**
 * True when the current account is an attendee with a declined response.
 * Events without attendees, or where the account only organizes, are never declined.
 */
export function isDeclined(event: CalendarEvent, account: CurrentAccount): boolean {
  const me = event.attendees.find((attendee) => account.isCurrentAccount(attendee));
  return me?.responseStatus === 'declined';
}

/**
 * Trim patterns, drop empty ones and lower-case the rest
 */
export function normalizePatterns(patterns: string[]): string[] {
  return patterns.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0);
}

/**
 * Split a comma-separated pattern list
 */
export function parsePatternList(value: string): string[] {
  return normalizePatterns(value.split(','));
}

export function matchesTitlePattern(title: string, patterns: string[]): boolean {
  const lower = title.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

type KeepPredicate = (event: CalendarEvent) => boolean;

function buildPredicates(options: FilterOptions, account: CurrentAccount): KeepPredicate[] {
  const predicates: KeepPredicate[] = [];

  if (options.excludeAllDay) {
    predicates.push((event) => !event.allDay);
  }

  if (options.excludeDeclined) {
    predicates.push((event) => !isDeclined(event, account));
  }

  const patterns = normalizePatterns(options.excludeTitlePatterns);
  if (patterns.length > 0) {
    predicates.push((event) => !matchesTitlePattern(event.title, patterns));
  }

  return predicates;
}

/**
 * Apply the configured exclusions to a list of events
 */
export function filterEvents<T extends CalendarEvent>(
  events: T[],
  options: FilterOptions,
  account: CurrentAccount
): T[] {
  const predicates = buildPredicates(options, account);
  if (predicates.length === 0) {
    return [...events];
  }
  return events.filter((event) => predicates.every((keep) => keep(event)));
}

/**
 * Availability written to destination events
 */
export type Availability = 'busy' | 'free';

/**
 * Participation status of a single attendee
 */
export type ResponseStatus = 'needsAction' | 'declined' | 'tentative' | 'accepted';

/**
 * Attendee participation record
 */
export interface Attendee {
  email: string;
  displayName?: string;
  responseStatus?: ResponseStatus;
  /** True when this attendee is the account the store is authenticated as */
  self?: boolean;
  organizer?: boolean;
}

/**
 * Calendar event as read from a store
 */
export interface CalendarEvent {
  title: string;
  start: Date;
  end: Date;
  allDay: boolean;
  attendees: Attendee[];
  location?: string;
  notes?: string;
  availability?: Availability;
}

/**
 * Opaque reference to an event inside a store
 */
export interface EventRef {
  calendarId: string;
  eventId: string;
}

/**
 * Event read from a store, with its reference
 */
export interface StoredEvent extends CalendarEvent {
  ref: EventRef;
}

/**
 * Fields written on create/update
 */
export interface EventFields {
  title: string;
  start: Date;
  end: Date;
  allDay: boolean;
  location?: string;
  notes: string;
  availability: Availability;
}

/**
 * Resolved calendar
 */
export interface CalendarHandle {
  id: string;
  name: string;
}

/**
 * Filter configuration
 */
export interface FilterOptions {
  excludeDeclined: boolean;
  excludeAllDay: boolean;
  /** Case-insensitive title substrings */
  excludeTitlePatterns: string[];
}

/**
 * Time window for querying events (start inclusive, end exclusive)
 */
export interface SyncWindow {
  start: Date;
  end: Date;
}

/**
 * Filtered source event with its derived identity
 */
export interface Candidate {
  identity: string;
  fingerprint: string;
  declined: boolean;
  event: CalendarEvent;
}

/**
 * Destination event carrying a SOURCE_ID tag
 */
export interface TrackedEvent {
  identity: string;
  fingerprint: string;
  event: StoredEvent;
}

export type DeleteReason = 'orphan' | 'duplicate' | 'recreate';

export interface PendingUpdate {
  candidate: Candidate;
  tracked: TrackedEvent;
}

export interface PendingDelete {
  tracked: TrackedEvent;
  reason: DeleteReason;
}

/**
 * Two source candidates hashing to the same identity
 */
export interface IdentityCollisionWarning {
  identity: string;
  title: string;
  /** Number of candidates that shared this identity */
  occurrences: number;
}

/**
 * Output of reconciliation
 */
export interface ReconciliationResult {
  toCreate: Candidate[];
  toUpdate: PendingUpdate[];
  unchanged: Candidate[];
  toDelete: PendingDelete[];
  collisions: IdentityCollisionWarning[];
}

export type MutationOperation = 'create' | 'update' | 'delete';

/**
 * One failed mutation
 */
export interface MutationFailure {
  operation: MutationOperation;
  identity: string;
  title: string;
  message: string;
}

/**
 * Aggregate result of applying a reconciliation
 */
export interface ApplyResult {
  created: number;
  updated: number;
  deleted: number;
  failed: number;
  failures: MutationFailure[];
}

export type SyncMode = 'list' | 'sync';

/**
 * Final report of a run
 */
export interface SyncSummary {
  mode: SyncMode;
  sourceCalendar: string;
  destinationCalendar?: string;
  window: SyncWindow;
  /** Events returned by the source query */
  found: number;
  /** Candidates surviving the filter pipeline */
  filtered: number;
  created: number;
  updated: number;
  unchanged: number;
  deleted: number;
  failed: number;
  failures: MutationFailure[];
  collisions: IdentityCollisionWarning[];
  candidates: Candidate[];
}

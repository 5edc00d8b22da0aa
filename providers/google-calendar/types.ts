/**
 * Google Calendar provider configuration and API types
 *
 * API payloads are described as zod schemas so responses are checked
 * before they reach the sync engine.
 * https://developers.google.com/calendar/api/v3/reference/events
 */

import { z } from 'zod';
import type { GoogleCredentials } from '../../schemas/index.js';

/**
 * Injectable fetch function. Defaults to globalThis.fetch.
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Options for constructing a Google Calendar store
 */
export interface GoogleCalendarStoreOptions {
  credentials: GoogleCredentials;
  fetchFn?: FetchFn;
}

/**
 * Google Calendar Event Attendee (minimal fields)
 */
export const GoogleCalendarAttendeeSchema = z.object({
  email: z.string(),
  displayName: z.string().optional(),
  responseStatus: z.enum(['needsAction', 'declined', 'tentative', 'accepted']).optional(),
  self: z.boolean().optional(),
  organizer: z.boolean().optional(),
});

/**
 * Google Calendar Event DateTime
 */
export const GoogleCalendarDateTimeSchema = z.object({
  /** For all-day events */
  date: z.string().optional(),
  /** For timed events (RFC3339 timestamp) */
  dateTime: z.string().optional(),
  timeZone: z.string().optional(),
});

/**
 * Google Calendar Event (fields used for mirroring)
 */
export const GoogleCalendarEventSchema = z.object({
  id: z.string(),
  summary: z.string().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
  start: GoogleCalendarDateTimeSchema.optional(),
  end: GoogleCalendarDateTimeSchema.optional(),
  attendees: z.array(GoogleCalendarAttendeeSchema).optional(),
  transparency: z.enum(['opaque', 'transparent']).optional(),
  status: z.enum(['confirmed', 'tentative', 'cancelled']).optional(),
});

/**
 * Google Calendar Events List Response
 */
export const GoogleCalendarEventsResponseSchema = z.object({
  items: z.array(GoogleCalendarEventSchema).default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Entry from users/me/calendarList
 */
export const GoogleCalendarListEntrySchema = z.object({
  id: z.string(),
  summary: z.string(),
  summaryOverride: z.string().optional(),
  accessRole: z.string().optional(),
  primary: z.boolean().optional(),
});

export const GoogleCalendarListResponseSchema = z.object({
  items: z.array(GoogleCalendarListEntrySchema).default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Google OAuth Token Response
 */
export const GoogleTokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

/**
 * Response to an event insert
 */
export const GoogleInsertedEventSchema = z.object({
  id: z.string(),
});

export type GoogleCalendarAttendee = z.infer<typeof GoogleCalendarAttendeeSchema>;
export type GoogleCalendarDateTime = z.infer<typeof GoogleCalendarDateTimeSchema>;
export type GoogleCalendarEvent = z.infer<typeof GoogleCalendarEventSchema>;
export type GoogleCalendarEventsResponse = z.infer<typeof GoogleCalendarEventsResponseSchema>;
export type GoogleCalendarListEntry = z.infer<typeof GoogleCalendarListEntrySchema>;
export type GoogleTokenResponse = z.infer<typeof GoogleTokenResponseSchema>;

/**
 * Request body for event insert/patch
 */
export interface GoogleEventBody {
  summary: string;
  description: string;
  location: string;
  start: GoogleCalendarDateTime;
  end: GoogleCalendarDateTime;
  transparency: 'opaque' | 'transparent';
}

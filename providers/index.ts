/**
 * Calendar store implementations
 *
 * Each provider implements CalendarStore:
 * - Resolves calendars by name
 * - Returns events as CalendarEvent records ordered by start
 * - Writes destination events from EventFields
 */

export type { CalendarStore } from './types.js';
export * from './google-calendar/index.js';
export * from './memory/index.js';

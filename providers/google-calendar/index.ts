/**
 * Google Calendar provider
 *
 * Uses the Google Calendar REST API to read source events and write
 * destination events.
 */

export * from './types.js';
export * from './fetch.js';
export * from './store.js';

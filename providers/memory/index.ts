/**
 * In-memory provider, used for dry runs and tests
 */

export * from './store.js';

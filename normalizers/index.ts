/**
 * Normalizers for converting provider-specific events to StoredEvent
 *
 * Each normalizer:
 * - Maps raw provider events to StoredEvent, dropping cancelled ones
 * - Resolves all-day dates to local midnight
 * - Builds provider request bodies from EventFields
 */

// Types
export * from './types.js';

// Provider normalizers
export * from './google-calendar.js';

// Utility functions
export * from './utils.js';

/**
 * Calendar Mirror
 *
 * Main exports for embedding the sync engine.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Calendar stores
export * from '../providers/index.js';

// Sync engine
export * from './errors.js';
export * from './filters.js';
export * from './identity.js';
export * from './tags.js';
export * from './reconcile.js';
export * from './apply.js';
export * from './sync.js';
export * from './report.js';
export * from './config.js';
export * from './lock.js';

/**
 * Data contracts: TypeScript types and their runtime schemas
 */

export * from './types.js';
export * from './validation.js';

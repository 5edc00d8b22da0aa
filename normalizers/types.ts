/**
 * Provider-agnostic normalization interfaces
 */

import type { EventFields, StoredEvent } from '../schemas/index.js';

/**
 * Two-way mapping between a provider's raw event shape and StoredEvent
 */
export interface EventNormalizer<TRaw, TBody> {
  /** Convert a raw provider event; null when it should be ignored (e.g. cancelled) */
  normalize(raw: TRaw, calendarId: string): StoredEvent | null;
  /** Convert multiple raw items, dropping ignored ones */
  normalizeAll(items: TRaw[], calendarId: string): StoredEvent[];
  /** Build the provider request body for a create/update */
  toBody(fields: EventFields): TBody;
}

/**
 * Destination reconciliation
 *
 * Compares filtered source candidates against the tagged events found in
 * the destination and partitions them into create, update, unchanged and
 * delete sets. Pure: reads nothing but its arguments.
 */

import type {
  Candidate,
  IdentityCollisionWarning,
  PendingDelete,
  PendingUpdate,
  ReconciliationResult,
  StoredEvent,
  TrackedEvent,
} from '../schemas/index.js';
import { computeFingerprint } from './identity.js';
import { readTag } from './tags.js';

export interface ReconcileOptions {
  /** Delete every tracked event and create every candidate afresh */
  forceRecreate?: boolean;
}

/**
 * Tagged destination events with their identity and recomputed fingerprint,
 * in scan order. Untagged events are left out.
 */
export function trackDestinationEvents(events: StoredEvent[]): TrackedEvent[] {
  const tracked: TrackedEvent[] = [];

  for (const event of events) {
    const identity = readTag(event.notes);
    if (!identity) {
      continue;
    }

    tracked.push({
      identity,
      fingerprint: computeFingerprint({
        title: event.title,
        start: event.start,
        end: event.end,
        availability: event.availability ?? 'busy',
      }),
      event,
    });
  }

  return tracked;
}

/**
 * Collapse candidates sharing an identity. The last one in iteration order
 * supplies the content; its position is that of the first occurrence.
 */
function indexCandidates(candidates: Candidate[]): {
  byIdentity: Map<string, Candidate>;
  collisions: IdentityCollisionWarning[];
} {
  const byIdentity = new Map<string, Candidate>();
  const occurrences = new Map<string, number>();

  for (const candidate of candidates) {
    byIdentity.set(candidate.identity, candidate);
    occurrences.set(candidate.identity, (occurrences.get(candidate.identity) ?? 0) + 1);
  }

  const collisions: IdentityCollisionWarning[] = [];
  for (const [identity, count] of occurrences) {
    if (count > 1) {
      const winner = byIdentity.get(identity);
      collisions.push({ identity, title: winner?.event.title ?? '', occurrences: count });
    }
  }

  return { byIdentity, collisions };
}

/**
 * Partition candidates and destination events.
 *
 * The first destination event seen for an identity is authoritative; any
 * later event with the same tag is deleted as a duplicate, whether or not
 * the identity is still in the source.
 */
export function reconcile(
  candidates: Candidate[],
  destinationEvents: StoredEvent[],
  options: ReconcileOptions = {}
): ReconciliationResult {
  const { byIdentity, collisions } = indexCandidates(candidates);

  const trackedByIdentity = new Map<string, TrackedEvent>();
  const toDelete: PendingDelete[] = [];

  for (const tracked of trackDestinationEvents(destinationEvents)) {
    if (trackedByIdentity.has(tracked.identity)) {
      toDelete.push({ tracked, reason: 'duplicate' });
    } else {
      trackedByIdentity.set(tracked.identity, tracked);
    }
  }

  const toCreate: Candidate[] = [];
  const toUpdate: PendingUpdate[] = [];
  const unchanged: Candidate[] = [];

  if (options.forceRecreate) {
    for (const tracked of trackedByIdentity.values()) {
      toDelete.push({ tracked, reason: 'recreate' });
    }
    toCreate.push(...byIdentity.values());
    return { toCreate, toUpdate, unchanged, toDelete, collisions };
  }

  for (const [identity, candidate] of byIdentity) {
    const tracked = trackedByIdentity.get(identity);
    if (!tracked) {
      toCreate.push(candidate);
    } else if (tracked.fingerprint !== candidate.fingerprint) {
      toUpdate.push({ candidate, tracked });
    } else {
      unchanged.push(candidate);
    }
  }

  for (const [identity, tracked] of trackedByIdentity) {
    if (!byIdentity.has(identity)) {
      toDelete.push({ tracked, reason: 'orphan' });
    }
  }

  return { toCreate, toUpdate, unchanged, toDelete, collisions };
}

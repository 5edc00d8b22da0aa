/**
 * Mutation applier
 *
 * Writes a reconciliation result to the destination calendar. Every item is
 * attempted independently: a failed create, update or delete is recorded
 * and the remaining items still run.
 */

import type {
  ApplyResult,
  CalendarHandle,
  Candidate,
  EventFields,
  MutationFailure,
  MutationOperation,
  ReconciliationResult,
  TrackedEvent,
} from '../schemas/index.js';
import type { CalendarStore } from '../providers/index.js';
import { errorMessage } from './errors.js';
import { availabilityFor } from './identity.js';
import { writeTag } from './tags.js';

/**
 * Destination fields for a candidate. `baseNotes` is the note text the tag
 * is written into: the source notes on create, the destination's current
 * notes on update.
 */
export function buildEventFields(candidate: Candidate, baseNotes: string | undefined): EventFields {
  const { event } = candidate;
  return {
    title: event.title,
    start: event.start,
    end: event.end,
    allDay: event.allDay,
    location: event.location,
    notes: writeTag(baseNotes, candidate.identity),
    availability: availabilityFor(candidate.declined),
  };
}

const OPERATION_VERBS: Record<MutationOperation, string> = {
  create: 'creating',
  update: 'updating',
  delete: 'deleting',
};

export class MutationApplier {
  constructor(
    private readonly store: CalendarStore,
    private readonly destination: CalendarHandle
  ) {}

  async create(candidate: Candidate): Promise<void> {
    await this.store.createEvent(this.destination, buildEventFields(candidate, candidate.event.notes));
  }

  async update(tracked: TrackedEvent, candidate: Candidate): Promise<void> {
    await this.store.updateEvent(tracked.event.ref, buildEventFields(candidate, tracked.event.notes));
  }

  async delete(tracked: TrackedEvent): Promise<void> {
    await this.store.deleteEvent(tracked.event.ref);
  }

  /**
   * Apply creates, then updates, then deletes
   */
  async apply(result: ReconciliationResult): Promise<ApplyResult> {
    const outcome: ApplyResult = { created: 0, updated: 0, deleted: 0, failed: 0, failures: [] };

    for (const candidate of result.toCreate) {
      if (await this.attempt(outcome, 'create', candidate.identity, candidate.event.title, () => this.create(candidate))) {
        outcome.created++;
      }
    }

    for (const { candidate, tracked } of result.toUpdate) {
      if (await this.attempt(outcome, 'update', candidate.identity, candidate.event.title, () => this.update(tracked, candidate))) {
        outcome.updated++;
      }
    }

    for (const { tracked } of result.toDelete) {
      if (await this.attempt(outcome, 'delete', tracked.identity, tracked.event.title, () => this.delete(tracked))) {
        outcome.deleted++;
      }
    }

    return outcome;
  }

  private async attempt(
    outcome: ApplyResult,
    operation: MutationOperation,
    identity: string,
    title: string,
    action: () => Promise<void>
  ): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error) {
      const failure: MutationFailure = { operation, identity, title, message: errorMessage(error) };
      console.error(`[sync] Error ${OPERATION_VERBS[operation]} event '${title}': ${failure.message}`);
      outcome.failures.push(failure);
      outcome.failed++;
      return false;
    }
  }
}

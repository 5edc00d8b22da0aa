/**
 * Sync orchestrator
 *
 * One run: fetch source events, filter, derive identities, then (when a
 * destination is given) reconcile against the destination and apply the
 * result. Without a destination the run stops after identity derivation
 * and the destination is never touched.
 *
 * Nothing is kept between runs; the SOURCE_ID tags in the destination are
 * the only continuity.
 */

import type {
  CalendarHandle,
  StoredEvent,
  SyncOptions,
  SyncSummary,
  SyncWindow,
} from '../schemas/index.js';
import type { CalendarStore } from '../providers/index.js';
import { MutationApplier } from './apply.js';
import { StoreUnavailableError, SyncSetupError, errorMessage } from './errors.js';
import { createCurrentAccount, filterEvents } from './filters.js';
import type { CurrentAccount } from './filters.js';
import { buildCandidates } from './identity.js';
import { reconcile } from './reconcile.js';

export interface SyncDependencies {
  /** Account whose responses decide "declined"; defaults to the attendee `self` flag */
  account?: CurrentAccount;
  /** Reference time for the window; defaults to now */
  now?: Date;
}

/**
 * Window from the start of today through the end of the day `days` days ahead
 */
export function buildSyncWindow(days: number, now: Date = new Date()): SyncWindow {
  const start = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const end = new Date(now.getFullYear(), now.getMonth(), now.getDate() + days + 1);
  return { start, end };
}

/**
 * Run a setup call; anything other than a SyncSetupError means the store
 * could not be reached
 */
async function setupStep<T>(description: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof SyncSetupError) {
      throw error;
    }
    throw new StoreUnavailableError(`Failed to ${description}: ${errorMessage(error)}`, { cause: error });
  }
}

async function queryCalendar(
  store: CalendarStore,
  name: string,
  window: SyncWindow
): Promise<{ calendar: CalendarHandle; events: StoredEvent[] }> {
  const calendar = await setupStep(`find calendar '${name}'`, () => store.findCalendar(name));
  const events = await setupStep(`read events from '${name}'`, () =>
    store.queryEvents(calendar, window.start, window.end)
  );
  return { calendar, events };
}

/**
 * Execute one sync (or list) run
 * @throws SyncSetupError before any destination write when setup fails
 */
export async function runSync(
  store: CalendarStore,
  options: SyncOptions,
  deps: SyncDependencies = {}
): Promise<SyncSummary> {
  const account = deps.account ?? createCurrentAccount();
  const window = buildSyncWindow(options.days, deps.now);

  if (options.forceRefresh && store.forceRefresh) {
    console.error('[sync] Forcing calendar refresh...');
    await setupStep('refresh calendar sources', async () => {
      await store.forceRefresh?.();
    });
  }

  console.error(
    `[sync] Fetching events from ${window.start.toISOString()} to ${window.end.toISOString()} from '${options.sourceCalendar}'`
  );
  const source = await queryCalendar(store, options.sourceCalendar, window);

  const filtered = filterEvents(
    source.events,
    {
      excludeDeclined: options.excludeDeclined,
      excludeAllDay: options.excludeAllDay,
      excludeTitlePatterns: options.excludeTitlePatterns,
    },
    account
  );
  const candidates = buildCandidates(filtered, account);

  console.error(`[sync] ${source.events.length} event(s) found, ${candidates.length} after filters`);

  const summary: SyncSummary = {
    mode: 'list',
    sourceCalendar: options.sourceCalendar,
    window,
    found: source.events.length,
    filtered: candidates.length,
    created: 0,
    updated: 0,
    unchanged: 0,
    deleted: 0,
    failed: 0,
    failures: [],
    collisions: [],
    candidates,
  };

  if (!options.destinationCalendar) {
    return summary;
  }

  const destination = await queryCalendar(store, options.destinationCalendar, window);

  const result = reconcile(candidates, destination.events, { forceRecreate: options.forceRecreate });
  for (const collision of result.collisions) {
    console.warn(
      `[sync] Identity collision: ${collision.occurrences} source events share identity ${collision.identity} ('${collision.title}'); the last one is mirrored`
    );
  }

  console.error(
    `[sync] Syncing to '${options.destinationCalendar}': ${result.toCreate.length} to create, ${result.toUpdate.length} to update, ${result.toDelete.length} to delete, ${result.unchanged.length} unchanged`
  );

  const applier = new MutationApplier(store, destination.calendar);
  const applied = await applier.apply(result);

  return {
    ...summary,
    mode: 'sync',
    destinationCalendar: options.destinationCalendar,
    created: applied.created,
    updated: applied.updated,
    unchanged: result.unchanged.length,
    deleted: applied.deleted,
    failed: applied.failed,
    failures: applied.failures,
    collisions: result.collisions,
  };
}

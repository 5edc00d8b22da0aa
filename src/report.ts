/**
 * Run summary rendering, as text for logs and as JSON for tooling
 */

import type { Candidate, SyncSummary } from '../schemas/index.js';
import { extractFirstLine, truncateText } from '../normalizers/index.js';

const SEPARATOR = '-'.repeat(50);

/**
 * One block per candidate: title, times, location and flags
 */
export function formatEventListing(candidates: Candidate[]): string {
  return candidates
    .map(({ event, declined }) =>
      [
        `Title: ${event.title}`,
        `Start: ${event.start.toISOString()}`,
        `End: ${event.end.toISOString()}`,
        `Location: ${truncateText(event.location) ?? 'No location'}`,
        `All Day: ${event.allDay}`,
        `Declined by User: ${declined}`,
        SEPARATOR,
      ].join('\n')
    )
    .join('\n');
}

/**
 * Human-readable summary; failures are itemized when present
 */
export function formatSummary(summary: SyncSummary): string {
  const lines: string[] = [];

  if (summary.mode === 'list') {
    lines.push(`Found ${summary.found} event(s) in '${summary.sourceCalendar}', ${summary.filtered} after filters`);
    return lines.join('\n');
  }

  lines.push(`Sync complete: '${summary.sourceCalendar}' -> '${summary.destinationCalendar ?? ''}'`);
  lines.push(`  Found: ${summary.found}`);
  lines.push(`  Filtered: ${summary.filtered}`);
  lines.push(`  Created: ${summary.created}`);
  lines.push(`  Updated: ${summary.updated}`);
  lines.push(`  Unchanged: ${summary.unchanged}`);
  lines.push(`  Deleted: ${summary.deleted}`);
  lines.push(`  Failed: ${summary.failed}`);

  if (summary.failures.length > 0) {
    lines.push('Failures:');
    for (const failure of summary.failures) {
      const message = extractFirstLine(failure.message, 200) ?? 'unknown error';
      lines.push(`  - ${failure.operation} '${failure.title}' (${failure.identity}): ${message}`);
    }
  }

  if (summary.collisions.length > 0) {
    lines.push('Identity collisions:');
    for (const collision of summary.collisions) {
      lines.push(`  - '${collision.title}' x${collision.occurrences} (${collision.identity})`);
    }
  }

  return lines.join('\n');
}

/**
 * JSON-safe view of a summary (dates as ISO strings)
 */
export interface SummaryJson {
  mode: SyncSummary['mode'];
  sourceCalendar: string;
  destinationCalendar?: string;
  window: { start: string; end: string };
  counts: {
    found: number;
    filtered: number;
    created: number;
    updated: number;
    unchanged: number;
    deleted: number;
    failed: number;
  };
  failures: SyncSummary['failures'];
  collisions: SyncSummary['collisions'];
  events: Array<{
    identity: string;
    title: string;
    start: string;
    end: string;
    allDay: boolean;
    declined: boolean;
    location?: string;
  }>;
}

export function toSummaryJson(summary: SyncSummary): SummaryJson {
  return {
    mode: summary.mode,
    sourceCalendar: summary.sourceCalendar,
    destinationCalendar: summary.destinationCalendar,
    window: { start: summary.window.start.toISOString(), end: summary.window.end.toISOString() },
    counts: {
      found: summary.found,
      filtered: summary.filtered,
      created: summary.created,
      updated: summary.updated,
      unchanged: summary.unchanged,
      deleted: summary.deleted,
      failed: summary.failed,
    },
    failures: summary.failures,
    collisions: summary.collisions,
    events: summary.candidates.map(({ identity, declined, event }) => ({
      identity,
      title: event.title,
      start: event.start.toISOString(),
      end: event.end.toISOString(),
      allDay: event.allDay,
      declined,
      location: event.location,
    })),
  };
}

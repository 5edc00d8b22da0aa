/**
 * Error types for calendar mirroring
 *
 * Setup errors are fatal and abort a run before any destination mutation.
 * Per-item mutation failures are never thrown out of a run; they are
 * collected into the summary instead.
 */

/** Base class for failures that abort a run before mutation. */
export class SyncSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncSetupError';
  }
}

/** No calendar with the requested name exists in the store. */
export class CalendarNotFoundError extends SyncSetupError {
  readonly calendarName: string;
  readonly availableNames: string[];

  constructor(calendarName: string, availableNames: string[]) {
    const listing = availableNames.length > 0
      ? availableNames.map((name) => `  - ${name}`).join('\n')
      : '  (none)';
    super(`Calendar '${calendarName}' not found\nAvailable calendars:\n${listing}`);
    this.name = 'CalendarNotFoundError';
    this.calendarName = calendarName;
    this.availableNames = availableNames;
  }
}

/** The calendar store could not be reached during setup. */
export class StoreUnavailableError extends SyncSetupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'StoreUnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Invalid configuration file or command-line options. */
export class ConfigError extends SyncSetupError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Another run already holds the lock for a destination calendar. */
export class LockHeldError extends SyncSetupError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super(`Another sync is already running for this destination (lock: ${lockPath})`);
    this.name = 'LockHeldError';
    this.lockPath = lockPath;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

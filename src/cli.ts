/**
 * Command-line surface: argument parsing and the top-level run
 */

import { tmpdir } from 'node:os';
import type { Config } from '../schemas/index.js';
import type { CalendarStore } from '../providers/index.js';
import { GoogleCalendarStore } from '../providers/index.js';
import { DEFAULT_CONFIG_PATH, loadConfig, resolveSyncOptions } from './config.js';
import type { CliOverrides } from './config.js';
import { ConfigError, SyncSetupError } from './errors.js';
import { createCurrentAccount } from './filters.js';
import { acquireLock } from './lock.js';
import type { ReleaseLock } from './lock.js';
import { formatEventListing, formatSummary, toSummaryJson } from './report.js';
import { runSync } from './sync.js';

export interface CliArgs extends CliOverrides {
  config?: string;
  lockDir?: string;
  json?: boolean;
  help?: boolean;
}

export const HELP_TEXT = `
Calendar Mirror

Mirrors events from a source calendar into a destination calendar. Without
--do-sync the filtered source events are only listed.

Usage:
  npx tsx src/run.ts [options]

Options:
  --days <n>                 Days from today to include (default: 7)
  --source-calendar <name>   Source calendar name (alias: --calendar)
  --do-sync <name>           Destination calendar to sync into
  --exclude-declined-events  Skip events you have declined
  --exclude-all-day-events   Skip all-day events
  --exclude-title <list>     Comma-separated title patterns to skip (case-insensitive)
  --force-sync               Ask the store to refresh its sources first
  --force-recreate           Delete and recreate every mirrored event
  --config <path>            Path to config file (default: ./config.json)
  --lock-dir <path>          Directory for the per-destination lock file (default: OS temp dir)
  --json                     Print the summary as JSON on stdout
  --help                     Show this help message

Examples:
  npx tsx src/run.ts --source-calendar Work --days 14
  npx tsx src/run.ts --source-calendar Work --do-sync Mirror --exclude-title "Focus Time,1:1"
`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse argv (without node and script path)
 * @throws ConfigError on unknown flags or missing values
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--days': {
        const raw = requireValue(arg, nextArg);
        if (!/^\d+$/.test(raw)) {
          throw new ConfigError(`--days must be a non-negative integer, got '${raw}'`);
        }
        result.days = parseInt(raw, 10);
        i++;
        break;
      }
      case '--source-calendar':
      case '--calendar':
        result.sourceCalendar = requireValue(arg, nextArg);
        i++;
        break;
      case '--do-sync':
        result.destinationCalendar = requireValue(arg, nextArg);
        i++;
        break;
      case '--exclude-declined-events':
        result.excludeDeclined = true;
        break;
      case '--exclude-all-day-events':
        result.excludeAllDay = true;
        break;
      case '--exclude-title':
        result.excludeTitle = requireValue(arg, nextArg);
        i++;
        break;
      case '--force-sync':
        result.forceSync = true;
        break;
      case '--force-recreate':
        result.forceRecreate = true;
        break;
      case '--config':
        result.config = requireValue(arg, nextArg);
        i++;
        break;
      case '--lock-dir':
        result.lockDir = requireValue(arg, nextArg);
        i++;
        break;
      case '--json':
        result.json = true;
        break;
      case '--help':
        result.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

export interface CliDependencies {
  createStore?: (config: Config) => CalendarStore;
  now?: Date;
}

function defaultStore(config: Config): CalendarStore {
  return new GoogleCalendarStore({ credentials: config.google.credentials });
}

/**
 * Run the CLI and return the process exit code.
 * 0 on completion (even with failed mutations), 1 on setup failures.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error(HELP_TEXT);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  let release: ReleaseLock | null = null;
  try {
    const configPath = args.config ?? DEFAULT_CONFIG_PATH;
    const config = await loadConfig(configPath);
    const options = resolveSyncOptions(args, config.sync);
    const store = (deps.createStore ?? defaultStore)(config);
    const account = createCurrentAccount(config.google.accountEmail);

    if (options.destinationCalendar) {
      release = await acquireLock(args.lockDir ?? config.sync.lockDir ?? tmpdir(), options.destinationCalendar);
    }

    const summary = await runSync(store, options, { account, now: deps.now });

    if (args.json) {
      console.log(JSON.stringify(toSummaryJson(summary), null, 2));
    } else {
      if (summary.candidates.length > 0) {
        console.log(formatEventListing(summary.candidates));
      }
      console.log(formatSummary(summary));
    }
    return 0;
  } catch (error) {
    if (error instanceof SyncSetupError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    if (release) {
      await release();
    }
  }
}

/**
 * Configuration loading and option resolution
 */

import {
  formatValidationErrors,
  safeValidateConfig,
  safeValidateSyncOptions,
} from '../schemas/index.js';
import type { Config, SyncDefaults, SyncOptions } from '../schemas/index.js';
import { ConfigError, errorMessage } from './errors.js';
import { normalizePatterns, parsePatternList } from './filters.js';

export const DEFAULT_CONFIG_PATH = './config.json';
export const DEFAULT_DAYS = 7;

/**
 * Options given on the command line; unset values fall back to the config file
 */
export interface CliOverrides {
  days?: number;
  sourceCalendar?: string;
  destinationCalendar?: string;
  excludeDeclined?: boolean;
  excludeAllDay?: boolean;
  /** Comma-separated title patterns */
  excludeTitle?: string;
  forceSync?: boolean;
  forceRecreate?: boolean;
}

/**
 * Load and validate the configuration file
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const fs = await import('fs/promises');

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(`Failed to read config file: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${errorMessage(error)}`);
  }

  const result = safeValidateConfig(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file: ${configPath}`, formatValidationErrors(result.error));
  }
  return result.data;
}

/**
 * Merge command-line overrides onto config defaults and validate the result
 */
export function resolveSyncOptions(cli: CliOverrides, defaults: SyncDefaults = {}): SyncOptions {
  const excludeTitlePatterns = cli.excludeTitle !== undefined
    ? parsePatternList(cli.excludeTitle)
    : normalizePatterns(defaults.excludeTitlePatterns ?? []);

  const result = safeValidateSyncOptions({
    days: cli.days ?? defaults.days ?? DEFAULT_DAYS,
    sourceCalendar: cli.sourceCalendar ?? defaults.sourceCalendar ?? '',
    destinationCalendar: cli.destinationCalendar,
    excludeDeclined: cli.excludeDeclined ?? defaults.excludeDeclined ?? false,
    excludeAllDay: cli.excludeAllDay ?? defaults.excludeAllDay ?? false,
    excludeTitlePatterns,
    forceRefresh: cli.forceSync ?? false,
    forceRecreate: cli.forceRecreate ?? false,
  });

  if (!result.success) {
    throw new ConfigError('Invalid options', formatValidationErrors(result.error));
  }
  return result.data;
}

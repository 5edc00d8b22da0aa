/**
 * Zod schemas for runtime validation of configuration and run options
 */

import { z } from 'zod';

/** Longest window a run may cover, in days */
export const MAX_SYNC_DAYS = 3650;

/**
 * Google OAuth credentials (refresh token flow)
 */
export const GoogleCredentialsSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  refreshToken: z.string().min(1, 'refreshToken is required'),
});

/**
 * Google Calendar store configuration
 */
export const GoogleStoreConfigSchema = z.object({
  credentials: GoogleCredentialsSchema,
  /** Email of the account whose responses decide "declined"; defaults to the attendee `self` flag */
  accountEmail: z.string().email().optional(),
});

/**
 * Defaults for a run, overridable from the command line. The destination
 * is only ever taken from --do-sync, so a run without it stays a listing.
 */
export const SyncDefaultsSchema = z.object({
  days: z.number().int().nonnegative().max(MAX_SYNC_DAYS).optional(),
  sourceCalendar: z.string().min(1).optional(),
  excludeDeclined: z.boolean().optional(),
  excludeAllDay: z.boolean().optional(),
  excludeTitlePatterns: z.array(z.string()).optional(),
  lockDir: z.string().min(1).optional(),
});

/**
 * Configuration file structure
 */
export const ConfigSchema = z.object({
  google: GoogleStoreConfigSchema,
  sync: SyncDefaultsSchema.default({}),
});

/**
 * Fully resolved options for a single run
 */
export const SyncOptionsSchema = z.object({
  days: z
    .number()
    .int('days must be an integer')
    .nonnegative('days must be non-negative')
    .max(MAX_SYNC_DAYS, `days must be at most ${MAX_SYNC_DAYS}`),
  sourceCalendar: z.string().min(1, 'Source calendar name is required'),
  destinationCalendar: z.string().min(1).optional(),
  excludeDeclined: z.boolean(),
  excludeAllDay: z.boolean(),
  excludeTitlePatterns: z.array(z.string()),
  forceRefresh: z.boolean(),
  forceRecreate: z.boolean(),
});

export type GoogleCredentials = z.infer<typeof GoogleCredentialsSchema>;
export type GoogleStoreConfig = z.infer<typeof GoogleStoreConfigSchema>;
export type SyncDefaults = z.infer<typeof SyncDefaultsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type SyncOptions = z.infer<typeof SyncOptionsSchema>;

/**
 * Validate a parsed configuration file
 * @throws ZodError if validation fails
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data);
}

/**
 * Validate a configuration file safely (returns result object)
 */
export function safeValidateConfig(data: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(data);
}

/**
 * Validate resolved run options safely (returns result object)
 */
export function safeValidateSyncOptions(data: unknown): z.SafeParseReturnType<unknown, SyncOptions> {
  return SyncOptionsSchema.safeParse(data);
}

/**
 * Format Zod errors into `path: message` lines
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}

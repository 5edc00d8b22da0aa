import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  ConfigSchema,
  MAX_SYNC_DAYS,
  SyncOptionsSchema,
  formatValidationErrors,
  safeValidateConfig,
  safeValidateSyncOptions,
  validateConfig,
} from '../schemas/index.js';

const validConfig = {
  google: {
    credentials: {
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh-token',
    },
  },
};

const validOptions = {
  days: 7,
  sourceCalendar: 'Work',
  excludeDeclined: false,
  excludeAllDay: false,
  excludeTitlePatterns: [],
  forceRefresh: false,
  forceRecreate: false,
};

describe('ConfigSchema', () => {
  it('should accept a minimal config and default the sync section', () => {
    const config = validateConfig(validConfig);
    expect(config.sync).toEqual({});
    expect(config.google.accountEmail).toBeUndefined();
  });

  it('should accept sync defaults', () => {
    const result = ConfigSchema.safeParse({
      ...validConfig,
      sync: { days: 14, sourceCalendar: 'Work', excludeTitlePatterns: ['Focus'], lockDir: '/var/run/mirror' },
    });
    expect(result.success).toBe(true);
  });

  it('should report a missing credential by path', () => {
    const result = safeValidateConfig({
      google: { credentials: { clientId: 'test-client-id', clientSecret: 'test-secret' } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['google.credentials.refreshToken: Required']);
    }
  });

  it('should reject empty credentials with a readable message', () => {
    const result = safeValidateConfig({
      google: { credentials: { ...validConfig.google.credentials, clientId: '' } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['google.credentials.clientId: clientId is required']);
    }
  });

  it('should reject a malformed account email', () => {
    const result = safeValidateConfig({ google: { ...validConfig.google, accountEmail: 'not-an-email' } });
    expect(result.success).toBe(false);
  });

  it('should reject negative default days', () => {
    const result = safeValidateConfig({ ...validConfig, sync: { days: -1 } });
    expect(result.success).toBe(false);
  });

  it('should reject default days beyond the window cap', () => {
    expect(safeValidateConfig({ ...validConfig, sync: { days: MAX_SYNC_DAYS + 1 } }).success).toBe(false);
  });

  it('should not take a destination from the config file', () => {
    const config = validateConfig({ ...validConfig, sync: { sourceCalendar: 'Work', destinationCalendar: 'Mirror' } });
    expect(config.sync).toEqual({ sourceCalendar: 'Work' });
  });

  it('should throw ZodError from validateConfig', () => {
    expect(() => validateConfig({})).toThrow(ZodError);
  });
});

describe('SyncOptionsSchema', () => {
  it('should accept resolved options', () => {
    expect(SyncOptionsSchema.safeParse(validOptions).success).toBe(true);
  });

  it('should require a source calendar', () => {
    const result = safeValidateSyncOptions({ ...validOptions, sourceCalendar: '' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['sourceCalendar: Source calendar name is required']);
    }
  });

  it('should reject negative and fractional days', () => {
    const negative = safeValidateSyncOptions({ ...validOptions, days: -1 });
    const fractional = safeValidateSyncOptions({ ...validOptions, days: 1.5 });

    expect(negative.success).toBe(false);
    if (!negative.success) {
      expect(formatValidationErrors(negative.error)).toEqual(['days: days must be non-negative']);
    }
    expect(fractional.success).toBe(false);
    if (!fractional.success) {
      expect(formatValidationErrors(fractional.error)).toEqual(['days: days must be an integer']);
    }
  });

  it('should accept zero days', () => {
    expect(safeValidateSyncOptions({ ...validOptions, days: 0 }).success).toBe(true);
  });

  it('should cap the window length', () => {
    expect(safeValidateSyncOptions({ ...validOptions, days: MAX_SYNC_DAYS }).success).toBe(true);

    const result = safeValidateSyncOptions({ ...validOptions, days: 99999999999 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['days: days must be at most 3650']);
    }
  });
});

/**
 * Tests for configuration validator
 */

import { validateConfig } from './validator';
import type { PetCareUserConfig } from '$types';

// Valid base configuration for testing
const validConfig: PetCareUserConfig = {
  REGION: 'US',
  REQUEST_TIMEOUT_MS: 30000,
  RELAY_POLL_COOLDOWN_SEC: 420,
  RELAY_MAX_ATTEMPTS: 4,
  RELAY_RETRY_DELAY_MS: 3000,
  RELAY_SETTLE_DELAY_MS: 2000,
  RELAY_TYPE_CODE: null,
  MANUAL_PAUSE_WINDOW_SEC: 660,
  DUAL_STAGE_RESUME_MODELS: ['t4'],
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,
  CONSOLE_TIMESTAMPS: true,
  GLOBAL_LOG_LEVEL: 1
};

function fieldsOf(list: { field: string }[]): string[] {
  return list.map((entry) => entry.field);
}

describe('validateConfig', () => {
  it('should accept the base configuration without warnings', () => {
    const result = validateConfig(validConfig);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  describe('transport', () => {
    it('should reject an unknown region', () => {
      const result = validateConfig({ ...validConfig, REGION: 'EU' as unknown as 'US' });

      expect(result.valid).toBe(false);
      expect(fieldsOf(result.errors)).toEqual(['REGION']);
    });

    it('should reject a timeout below one second', () => {
      const result = validateConfig({ ...validConfig, REQUEST_TIMEOUT_MS: 500 });

      expect(fieldsOf(result.errors)).toEqual(['REQUEST_TIMEOUT_MS']);
    });

    it('should warn on a very long timeout', () => {
      const result = validateConfig({ ...validConfig, REQUEST_TIMEOUT_MS: 120000 });

      expect(result.valid).toBe(true);
      expect(fieldsOf(result.warnings)).toEqual(['REQUEST_TIMEOUT_MS']);
    });
  });

  describe('relay pacing', () => {
    it('should reject a cool-down shorter than five minutes', () => {
      const result = validateConfig({ ...validConfig, RELAY_POLL_COOLDOWN_SEC: 299 });

      expect(fieldsOf(result.errors)).toEqual(['RELAY_POLL_COOLDOWN_SEC']);
    });

    it('should reject zero attempts', () => {
      const result = validateConfig({ ...validConfig, RELAY_MAX_ATTEMPTS: 0 });

      expect(fieldsOf(result.errors)).toEqual(['RELAY_MAX_ATTEMPTS']);
    });

    it('should reject fractional attempts', () => {
      const result = validateConfig({ ...validConfig, RELAY_MAX_ATTEMPTS: 2.5 });

      expect(result.errors[0].message).toBe('RELAY_MAX_ATTEMPTS must be an integer (got 2.5)');
    });

    it('should accept a positive relay type code', () => {
      const result = validateConfig({ ...validConfig, RELAY_TYPE_CODE: 14 });

      expect(result.valid).toBe(true);
    });

    it('should reject a negative relay type code', () => {
      const result = validateConfig({ ...validConfig, RELAY_TYPE_CODE: -1 });

      expect(fieldsOf(result.errors)).toEqual(['RELAY_TYPE_CODE']);
    });

    it('should warn when retries outlast the cool-down', () => {
      const result = validateConfig({
        ...validConfig,
        RELAY_MAX_ATTEMPTS: 10,
        RELAY_RETRY_DELAY_MS: 60000
      });

      expect(result.valid).toBe(true);
      expect(fieldsOf(result.warnings)).toContain('RELAY_RETRY_DELAY_MS');
    });
  });

  describe('litter box', () => {
    it('should reject a pause window shorter than the device pause', () => {
      const result = validateConfig({ ...validConfig, MANUAL_PAUSE_WINDOW_SEC: 500 });

      expect(fieldsOf(result.errors)).toEqual(['MANUAL_PAUSE_WINDOW_SEC']);
    });

    it('should reject upper-case model names', () => {
      const result = validateConfig({ ...validConfig, DUAL_STAGE_RESUME_MODELS: ['T4'] });

      expect(result.errors).toEqual([
        { level: 'CRITICAL', field: 'DUAL_STAGE_RESUME_MODELS', message: 'DUAL_STAGE_RESUME_MODELS entry "T4" must be lower-case' }
      ]);
    });
  });

  describe('logging', () => {
    it('should reject an out-of-range global level', () => {
      const result = validateConfig({ ...validConfig, GLOBAL_LOG_LEVEL: 7 as unknown as 1 });

      expect(fieldsOf(result.errors)).toEqual(['GLOBAL_LOG_LEVEL']);
    });

    it('should warn when the console level is below the global level', () => {
      const result = validateConfig({ ...validConfig, CONSOLE_LOG_LEVEL: 0, GLOBAL_LOG_LEVEL: 2 });

      expect(result.valid).toBe(true);
      expect(fieldsOf(result.warnings)).toEqual(['CONSOLE_LOG_LEVEL']);
    });
  });
});

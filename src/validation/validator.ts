import type { PetCareUserConfig } from '$types';

import { addError, addWarning, validateBoolean, validateOneOf, validateRange } from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

const LOG_LEVEL_VALUES = [0, 1, 2, 3] as const;
const REGIONS = ['US', 'CN'] as const;

/**
 * Validate a user configuration
 *
 * @param config - Configuration to check
 * @returns Result with errors (fatal) and warnings (advisory)
 */
export function validateConfig(config: PetCareUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Transport
  validateOneOf(config.REGION, 'REGION', REGIONS, errors);
  validateRange(config.REQUEST_TIMEOUT_MS, 'REQUEST_TIMEOUT_MS',
    { min: 1000, max: 300000, recommendedMin: 10000, recommendedMax: 60000, integer: true }, errors, warnings);

  // Relay pacing
  validateRange(config.RELAY_POLL_COOLDOWN_SEC, 'RELAY_POLL_COOLDOWN_SEC',
    { min: 300, max: 86400, recommendedMin: 420, recommendedMax: 3600 }, errors, warnings);
  validateRange(config.RELAY_MAX_ATTEMPTS, 'RELAY_MAX_ATTEMPTS',
    { min: 1, max: 10, recommendedMin: 3, recommendedMax: 5, integer: true }, errors, warnings);
  validateRange(config.RELAY_RETRY_DELAY_MS, 'RELAY_RETRY_DELAY_MS',
    { min: 0, max: 60000, recommendedMin: 1000, recommendedMax: 10000 }, errors, warnings);
  validateRange(config.RELAY_SETTLE_DELAY_MS, 'RELAY_SETTLE_DELAY_MS',
    { min: 0, max: 30000, recommendedMin: 1000, recommendedMax: 5000 }, errors, warnings);

  if (config.RELAY_TYPE_CODE !== null) {
    validateRange(config.RELAY_TYPE_CODE, 'RELAY_TYPE_CODE', { min: 1, max: 0xFFFF, integer: true }, errors, warnings);
  }

  // Litter box
  validateRange(config.MANUAL_PAUSE_WINDOW_SEC, 'MANUAL_PAUSE_WINDOW_SEC',
    { min: 600, max: 3600, recommendedMin: 660, recommendedMax: 900 }, errors, warnings);

  for (const model of config.DUAL_STAGE_RESUME_MODELS) {
    if (model !== model.toLowerCase()) {
      addError(errors, 'DUAL_STAGE_RESUME_MODELS', `DUAL_STAGE_RESUME_MODELS entry "${model}" must be lower-case`);
    }
  }

  // Logging
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateBoolean(config.CONSOLE_TIMESTAMPS, 'CONSOLE_TIMESTAMPS', errors);
  validateOneOf(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', LOG_LEVEL_VALUES, errors);
  validateOneOf(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', LOG_LEVEL_VALUES, errors);

  if (config.CONSOLE_ENABLED && config.CONSOLE_LOG_LEVEL < config.GLOBAL_LOG_LEVEL) {
    addWarning(warnings, 'CONSOLE_LOG_LEVEL', 'CONSOLE_LOG_LEVEL is below GLOBAL_LOG_LEVEL; extra console detail is filtered out');
  }

  // Retries that outlast the cool-down overlap the next scheduled poll
  if (config.RELAY_MAX_ATTEMPTS * config.RELAY_RETRY_DELAY_MS > config.RELAY_POLL_COOLDOWN_SEC * 1000) {
    addWarning(warnings, 'RELAY_RETRY_DELAY_MS', 'RELAY_RETRY_DELAY_MS times RELAY_MAX_ATTEMPTS exceeds the poll cool-down');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Validation helper functions
 * Reusable checks that append to shared error and warning lists
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { RangeSpec, ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// FIELD VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateBoolean(value: unknown, field: string, errors: ValidationError[]): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a value is one of a fixed set
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param allowed - Accepted values
 * @param errors - Array to append errors to
 */
export function validateOneOf<T>(
  value: unknown,
  field: string,
  allowed: readonly T[],
  errors: ValidationError[]
): void {
  if (!allowed.some(function(candidate) { return candidate === value; })) {
    addError(errors, field, `${field} must be one of ${allowed.join(', ')} (got ${String(value)})`);
  }
}

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails).
 * Recommended range violations produce warnings (validation passes).
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param range - Bounds and integer requirement
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 */
export function validateRange(
  value: unknown,
  field: string,
  range: RangeSpec,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (range.integer && !isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${String(value)})`);
    return;
  }

  if (!isFiniteNumber(value) || value < range.min || value > range.max) {
    addError(errors, field, `${field} must be between ${range.min} and ${range.max} (got ${String(value)})`);
    return;
  }

  if (range.recommendedMin === undefined || range.recommendedMax === undefined) {
    return;
  }

  if (value < range.recommendedMin || value > range.recommendedMax) {
    addWarning(
      warnings,
      field,
      `${field} is outside recommended range ${range.recommendedMin}-${range.recommendedMax} (got ${value})`
    );
  }
}

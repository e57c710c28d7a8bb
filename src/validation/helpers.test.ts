/**
 * Unit tests for validation helper functions
 */

import { addError, addWarning, validateBoolean, validateOneOf, validateRange } from './helpers';
import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'REGION', 'Unknown region');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'REGION', message: 'Unknown region' }]);
    });

    it('should accumulate multiple errors', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'A', 'one');
      addError(errors, 'B', 'two');

      expect(errors.map((e) => e.field)).toEqual(['A', 'B']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationWarning[] = [];

      addWarning(warnings, 'RELAY_RETRY_DELAY_MS', 'Long delay');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'RELAY_RETRY_DELAY_MS', message: 'Long delay' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateBoolean()
  // ═══════════════════════════════════════════════════════════════

  describe('validateBoolean', () => {
    it('should accept true and false', () => {
      const errors: ValidationError[] = [];

      validateBoolean(true, 'FLAG', errors);
      validateBoolean(false, 'FLAG', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject non-boolean values', () => {
      const errors: ValidationError[] = [];

      validateBoolean(1, 'FLAG', errors);

      expect(errors[0].message).toBe('FLAG must be a boolean (got number)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateOneOf()
  // ═══════════════════════════════════════════════════════════════

  describe('validateOneOf', () => {
    it('should accept a listed value', () => {
      const errors: ValidationError[] = [];

      validateOneOf('CN', 'REGION', ['US', 'CN'], errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject an unlisted value', () => {
      const errors: ValidationError[] = [];

      validateOneOf('EU', 'REGION', ['US', 'CN'], errors);

      expect(errors[0].message).toBe('REGION must be one of US, CN (got EU)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateRange', () => {
    const range = { min: 0, max: 100, recommendedMin: 10, recommendedMax: 50 };

    it('should accept value inside recommended range', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(20, 'X', range, errors, warnings);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should accept critical bounds inclusively', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(0, 'X', range, errors, warnings);
      validateRange(100, 'X', range, errors, warnings);

      expect(errors).toHaveLength(0);
    });

    it('should warn outside recommended range', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(75, 'X', range, errors, warnings);

      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('X is outside recommended range 10-50 (got 75)');
    });

    it('should error outside critical range without warning', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(101, 'X', range, errors, warnings);

      expect(errors[0].message).toBe('X must be between 0 and 100 (got 101)');
      expect(warnings).toHaveLength(0);
    });

    it('should reject NaN and non-numbers', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(Number.NaN, 'X', range, errors, warnings);
      validateRange('5', 'X', range, errors, warnings);

      expect(errors).toHaveLength(2);
    });

    it('should reject fractions when an integer is required', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateRange(2.5, 'N', { min: 1, max: 10, integer: true }, errors, warnings);

      expect(errors[0].message).toBe('N must be an integer (got 2.5)');
    });
  });
});

export { validateConfig } from './validator';
export { addError, addWarning, validateBoolean, validateOneOf, validateRange } from './helpers';
export type { ValidationResult, ValidationError, ValidationWarning, RangeSpec } from './types';

export interface ValidationError {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Critical (error) and optional recommended (warning) bounds for a numeric field
 */
export interface RangeSpec {
  min: number;
  max: number;
  recommendedMin?: number;
  recommendedMax?: number;
  integer?: boolean;
}

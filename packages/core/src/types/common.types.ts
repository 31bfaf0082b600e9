/**
 * Base class for all Outcheck-specific errors.
 * Centralized here as it's used across modules (config, metadata, schemas).
 */
export class OutcheckError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Field-level error reported by the detailed validators.
 */
export type FieldError = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Standard validation result returned by every validateXDetailed function.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}

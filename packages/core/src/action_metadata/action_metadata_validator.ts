import type { ErrorObject } from "ajv";
import * as path from "path";
import { SchemaValidationCache } from "../schemas";
import type { FieldError, ValidationResult } from "../types";
import type { ActionMetadata, RunnerMetadata } from "./action_metadata.types";

export const METADATA_SCHEMAS_DIR = path.resolve(__dirname, "..", "..", "schemas");
export const ACTION_METADATA_SCHEMA_PATH = path.join(METADATA_SCHEMAS_DIR, "action_metadata_schema.yaml");
export const RUNNER_METADATA_SCHEMA_PATH = path.join(METADATA_SCHEMAS_DIR, "runner_metadata_schema.yaml");

function toFieldErrors(errors: ErrorObject[]): FieldError[] {
  return errors.map((error) => ({
    field: error.instancePath.replace("/", "") || error.params['missingProperty'] || "root",
    message: error.message || "Unknown validation error",
    value: error.data
  }));
}

function toValidationResult([isValid, errors]: [boolean, ErrorObject[]]): ValidationResult {
  return isValid ? { isValid: true, errors: [] } : { isValid: false, errors: toFieldErrors(errors) };
}

/**
 * Schema-based validation for action metadata
 */
export function validateActionMetadataSchema(data: unknown): [boolean, ErrorObject[]] {
  const validator = SchemaValidationCache.getValidator(ACTION_METADATA_SCHEMA_PATH);
  const isValid = validator(data);
  return [isValid, validator.errors ?? []];
}

/**
 * Type guard to check if data is valid action metadata
 */
export function isActionMetadata(data: unknown): data is ActionMetadata {
  const [isValid] = validateActionMetadataSchema(data);
  return isValid;
}

/**
 * Detailed validation with field-level error reporting
 */
export function validateActionMetadataDetailed(data: unknown): ValidationResult {
  return toValidationResult(validateActionMetadataSchema(data));
}

/**
 * Schema-based validation for runner metadata
 */
export function validateRunnerMetadataSchema(data: unknown): [boolean, ErrorObject[]] {
  const validator = SchemaValidationCache.getValidator(RUNNER_METADATA_SCHEMA_PATH);
  const isValid = validator(data);
  return [isValid, validator.errors ?? []];
}

export function isRunnerMetadata(data: unknown): data is RunnerMetadata {
  const [isValid] = validateRunnerMetadataSchema(data);
  return isValid;
}

export function validateRunnerMetadataDetailed(data: unknown): ValidationResult {
  return toValidationResult(validateRunnerMetadataSchema(data));
}

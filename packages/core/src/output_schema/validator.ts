import type { ErrorObject } from "ajv";
import { EXECUTION_STATUS_FAILED } from "../constants";
import type { ExecutionStatus } from "../constants";
import { createLogger } from "../logger";
import { SchemaValidationCache } from "../schemas";
import { hasOwnKey, isJsonObject } from "../types";
import type { JsonValue } from "../types";
import { formatDiagnostic } from "./diagnostic";
import type {
  EngineErrorPayload,
  ExecutionResult,
  OutputSchema,
  ValidateOutputResult,
  ValidationErrorPayload,
} from "./output_schema.types";

const logger = createLogger("[OutputSchema] ");

export const VALIDATION_ERROR_MESSAGE = "Error validating output. See error output for more details.";

/**
 * Value checked by the action layer. A result that is not a mapping, or has
 * no entry under the output key, has no output: it is checked as `null`.
 */
export function extractOutput(result: ExecutionResult, outputKey: string): JsonValue {
  if (!isJsonObject(result) || !hasOwnKey(result, outputKey)) {
    return null;
  }
  return result[outputKey] ?? null;
}

function runValidator(schema: OutputSchema, instance: JsonValue): [boolean, ErrorObject[]] {
  const validator = SchemaValidationCache.getValidatorFromSchema(schema);
  const isValid = validator(instance);
  return [isValid, validator.errors ?? []];
}

/**
 * Envelope layer: the whole result against the runner's schema.
 */
export function validateRunnerOutput(
  runnerSchema: OutputSchema,
  result: ExecutionResult
): [boolean, ErrorObject[]] {
  return runValidator(runnerSchema, result);
}

/**
 * Content layer: `result[outputKey]` against the action's schema.
 */
export function validateActionOutput(
  actionSchema: OutputSchema,
  result: ExecutionResult,
  outputKey: string
): [boolean, ErrorObject[]] {
  return runValidator(actionSchema, extractOutput(result, outputKey));
}

export function buildValidationErrorPayload(errors: ErrorObject[]): ValidationErrorPayload {
  const [first] = errors;
  return {
    error: first ? formatDiagnostic(first) : "Output does not match the schema",
    message: VALIDATION_ERROR_MESSAGE,
  };
}

function buildEngineErrorPayload(error: unknown): EngineErrorPayload {
  return {
    error: error instanceof Error ? error.message : String(error),
    traceback: error instanceof Error ? error.stack ?? "" : "",
    message: VALIDATION_ERROR_MESSAGE,
  };
}

/**
 * Validates an execution result against the runner schema, then its output
 * against the action schema.
 *
 * Never throws. The first failing layer replaces the result with an error
 * payload and the status with `failed`; the action schema is not consulted
 * when the runner layer fails. When both layers pass, `result` and `status`
 * are returned as received.
 */
export function validateOutput(
  runnerSchema: OutputSchema,
  actionSchema: OutputSchema,
  result: ExecutionResult,
  status: ExecutionStatus,
  outputKey: string
): ValidateOutputResult {
  try {
    logger.debug("Validating runner output", runnerSchema);
    const [runnerValid, runnerErrors] = validateRunnerOutput(runnerSchema, result);
    if (!runnerValid) {
      const payload = buildValidationErrorPayload(runnerErrors);
      logger.warn(`Runner output failed validation: ${payload.error}`);
      return [payload, EXECUTION_STATUS_FAILED];
    }

    logger.debug("Validating action output", actionSchema);
    const [actionValid, actionErrors] = validateActionOutput(actionSchema, result, outputKey);
    if (!actionValid) {
      const payload = buildValidationErrorPayload(actionErrors);
      logger.warn(`Action output failed validation: ${payload.error}`);
      return [payload, EXECUTION_STATUS_FAILED];
    }
  } catch (error) {
    logger.error("Failed to validate output.", error);
    return [buildEngineErrorPayload(error), EXECUTION_STATUS_FAILED];
  }

  return [result, status];
}

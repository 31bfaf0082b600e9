/**
 * OutputSchema - execution output validation and secret masking
 */

export type {
  ActionExecution,
  ClassifiedSchema,
  EngineErrorPayload,
  ExecutionResult,
  JsonSchemaType,
  MalformedSchema,
  OutputSchema,
  ValidateOutputResult,
  ValidationErrorPayload,
  WellFormedSchema,
} from "./output_schema.types";

export { classifyOutputSchema, isObjectTyped, isOutputSchema } from "./classify";
export { describeError, formatDiagnostic, formatInstancePath, formatSchemaPath } from "./diagnostic";
export {
  VALIDATION_ERROR_MESSAGE,
  buildValidationErrorPayload,
  extractOutput,
  validateActionOutput,
  validateOutput,
  validateRunnerOutput,
} from "./validator";
export { maskSecretOutput } from "./redactor";
export { OutputSchemaModule, DEFAULT_OUTPUT_KEY } from "./output_schema_module";
export type { MaskOptions, OutputSchemaModuleDependencies, ProcessedOutput } from "./output_schema_module";

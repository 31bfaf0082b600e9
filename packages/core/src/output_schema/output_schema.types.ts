import type { SchemaObject } from "ajv";
import type { ExecutionStatus } from "../constants";
import type { JsonValue } from "../types";

// ============================================================================
// Schema Types
// ============================================================================

export type JsonSchemaType =
  | "object"
  | "array"
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "null";

/**
 * JSON-Schema document describing an execution result or the action output
 * inside it. `secret` is an extension marking values that must be masked.
 */
export interface OutputSchema extends SchemaObject {
  type?: JsonSchemaType | JsonSchemaType[];
  properties?: Record<string, OutputSchema>;
  additionalProperties?: boolean | OutputSchema;
  secret?: boolean;
}

/**
 * Schema node that passed classification. Nested properties are classified too.
 */
export type WellFormedSchema = {
  kind: "well-formed";
  types: readonly JsonSchemaType[];
  properties: Readonly<Record<string, WellFormedSchema>> | null;
  secret: boolean;
  additionalProperties: boolean | null;
};

/**
 * Anything redaction cannot interpret: legacy flat-properties schemas,
 * bare descriptors, unknown types.
 */
export type MalformedSchema = {
  kind: "malformed";
  reason: string;
};

export type ClassifiedSchema = WellFormedSchema | MalformedSchema;

// ============================================================================
// Execution Types
// ============================================================================

export type ExecutionResult = JsonValue;

/**
 * The parts of an action execution record read by the validator and redactor.
 * `action.output_schema` is untyped on purpose: stored schemas may predate the
 * current format and are classified before use.
 */
export type ActionExecution = {
  action: {
    output_schema?: unknown;
  };
  runner: {
    output_key?: string;
    output_schema?: OutputSchema;
  };
};

/**
 * Result replacing the execution output when validation fails.
 */
export type ValidationErrorPayload = {
  error: string;
  message: string;
};

/**
 * Result replacing the execution output when the schema engine itself fails.
 */
export type EngineErrorPayload = {
  error: string;
  traceback: string;
  message: string;
};

export type ValidateOutputResult = [ExecutionResult, ExecutionStatus];

import { MASKED_ATTRIBUTE_VALUE } from "../constants";
import { hasOwnKey, isJsonObject } from "../types";
import type { JsonValue } from "../types";
import { classifyOutputSchema, isObjectTyped } from "./classify";
import type { ActionExecution, ExecutionResult, WellFormedSchema } from "./output_schema.types";

/**
 * Masks `value` according to `schema`. Returns `value` itself when nothing
 * under it is secret, otherwise a copy with the secret parts replaced.
 */
function maskValue(schema: WellFormedSchema, value: JsonValue): JsonValue {
  if (schema.secret) {
    return MASKED_ATTRIBUTE_VALUE;
  }
  if (!isObjectTyped(schema) || schema.properties === null || !isJsonObject(value)) {
    return value;
  }

  const properties = schema.properties;
  let changed = false;
  const entries: Array<[string, JsonValue]> = [];
  for (const [name, item] of Object.entries(value)) {
    const child = hasOwnKey(properties, name) ? properties[name] : undefined;
    const masked = child === undefined ? item : maskValue(child, item);
    if (masked !== item) {
      changed = true;
    }
    entries.push([name, masked]);
  }

  return changed ? Object.fromEntries(entries) : value;
}

/**
 * Replaces the values an action's output schema marks `secret` with
 * MASKED_ATTRIBUTE_VALUE.
 *
 * Only `execution.action.output_schema` and `execution.runner.output_key` are
 * read. A schema marked secret at its root hides the whole output, whatever
 * its shape; otherwise object properties are walked and masked field by field.
 *
 * Anything that cannot be interpreted (no result, an empty result, a missing
 * output key, a legacy or malformed schema, a value that does not have the
 * shape the schema describes) returns the result itself. The input is never
 * modified: when something is masked the returned result is a fresh copy.
 */
export function maskSecretOutput(execution: ActionExecution, result: ExecutionResult): ExecutionResult {
  if (!isJsonObject(result) || Object.keys(result).length === 0) {
    return result;
  }

  const outputKey = execution.runner.output_key;
  if (!outputKey || !hasOwnKey(result, outputKey)) {
    return result;
  }

  const schema = classifyOutputSchema(execution.action.output_schema);
  if (schema.kind === "malformed") {
    return result;
  }

  const output = result[outputKey] ?? null;
  if (maskValue(schema, output) === output) {
    return result;
  }

  // Masked results share nothing with the input.
  const copy = structuredClone(result);
  return { ...copy, [outputKey]: maskValue(schema, copy[outputKey] ?? null) };
}

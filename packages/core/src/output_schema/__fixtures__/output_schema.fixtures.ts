import type { OutputSchema } from '../output_schema.types';
import type { JsonObject } from '../../types';

export const OUTPUT_KEY = 'output';

export const ACTION_RESULT: JsonObject = {
  output: {
    output_1: 'Bobby',
    output_2: 5,
    output_3: 'shhh!',
    deep_output: {
      deep_item_1: 'Jindal',
    },
  },
};

export const RUNNER_OUTPUT_SCHEMA: OutputSchema = {
  type: 'object',
  properties: {
    output: { type: 'object' },
    error: { type: 'array' },
  },
  additionalProperties: false,
};

export const ACTION_OUTPUT_SCHEMA: OutputSchema = {
  type: 'object',
  properties: {
    output_1: { type: 'string' },
    output_2: { type: 'integer' },
    output_3: { type: 'string' },
    deep_output: {
      type: 'object',
      parameters: {
        deep_item_1: { type: 'string' },
      },
    },
  },
  additionalProperties: false,
};

export const ACTION_OUTPUT_SCHEMA_WITH_SECRET: OutputSchema = {
  type: 'object',
  properties: {
    output_1: { type: 'string' },
    output_2: { type: 'integer' },
    output_3: { type: 'string', secret: true },
    deep_output: {
      type: 'object',
      parameters: {
        deep_item_1: { type: 'string' },
      },
    },
  },
  additionalProperties: false,
};

export const RUNNER_OUTPUT_SCHEMA_FAIL: OutputSchema = {
  type: 'object',
  properties: {
    not_a_key_you_have: { type: 'string' },
  },
  additionalProperties: false,
};

export const ACTION_OUTPUT_SCHEMA_FAIL: OutputSchema = {
  type: 'object',
  properties: {
    not_a_key_you_have: { type: 'string' },
  },
  additionalProperties: false,
};

/** Pre-upgrade shape: the property map without its object wrapper. */
export const LEGACY_ACTION_OUTPUT_SCHEMA = {
  output_1: { type: 'string' },
  output_2: { type: 'integer' },
  output_3: { type: 'string', secret: true },
};

export const MALFORMED_ACTION_OUTPUT_SCHEMA_1 = { output_1: 'bool' };

export const MALFORMED_ACTION_OUTPUT_SCHEMA_2 = {
  type: 'object',
  properties: {
    output_1: 'bool',
  },
  additionalProperties: false,
};

/** One result per JSON value shape, keyed by schema type name. */
export const ACTION_RESULT_ALT_TYPES: Record<string, JsonObject> = {
  integer: { output: 42 },
  null: { output: null },
  number: { output: 1.234 },
  string: { output: 'foobar' },
  object: ACTION_RESULT,
  array: { output: [ACTION_RESULT] },
};

export const ACTION_RESULT_BOOLEANS: JsonObject[] = [
  { output: true },
  { output: false },
];

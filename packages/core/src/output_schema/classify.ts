import { isJsonObject } from "../types";
import type {
  ClassifiedSchema,
  JsonSchemaType,
  MalformedSchema,
  OutputSchema,
  WellFormedSchema,
} from "./output_schema.types";

const JSON_SCHEMA_TYPES: readonly JsonSchemaType[] = [
  "object",
  "array",
  "string",
  "number",
  "integer",
  "boolean",
  "null",
];

function isJsonSchemaType(value: unknown): value is JsonSchemaType {
  return typeof value === "string" && JSON_SCHEMA_TYPES.some((type) => type === value);
}

function malformed(reason: string): MalformedSchema {
  return { kind: "malformed", reason };
}

function readTypes(value: unknown): JsonSchemaType[] | null {
  if (isJsonSchemaType(value)) {
    return [value];
  }
  if (Array.isArray(value) && value.length > 0 && value.every(isJsonSchemaType)) {
    return value;
  }
  return null;
}

function classifyNode(node: unknown, path: string, requireType: boolean): ClassifiedSchema {
  if (!isJsonObject(node)) {
    return malformed(`${path}: descriptor must be a mapping`);
  }

  let types: readonly JsonSchemaType[] = [];
  if (node['type'] !== undefined) {
    const read = readTypes(node['type']);
    if (read === null) {
      return malformed(`${path}: unrecognized type ${JSON.stringify(node['type'])}`);
    }
    types = read;
  } else if (requireType) {
    return malformed(`${path}: missing type`);
  }

  const secret = node['secret'];
  if (secret !== undefined && typeof secret !== "boolean") {
    return malformed(`${path}: secret must be a boolean`);
  }

  let properties: Record<string, WellFormedSchema> | null = null;
  const rawProperties = node['properties'];
  if (rawProperties !== undefined) {
    if (!isJsonObject(rawProperties)) {
      return malformed(`${path}: properties must be a mapping`);
    }
    const entries: Array<[string, WellFormedSchema]> = [];
    for (const [name, descriptor] of Object.entries(rawProperties)) {
      const child = classifyNode(descriptor, `${path}.${name}`, false);
      if (child.kind === "malformed") {
        return child;
      }
      entries.push([name, child]);
    }
    properties = Object.fromEntries(entries);
  }

  const additionalProperties = node['additionalProperties'];

  return {
    kind: "well-formed",
    types,
    properties,
    secret: secret === true,
    additionalProperties: typeof additionalProperties === "boolean" ? additionalProperties : null,
  };
}

/**
 * Classifies an action output schema once, before any redaction decision.
 *
 * The root must carry a recognized `type`. Every nested property descriptor
 * must be a mapping; the first malformed node makes the whole schema
 * malformed. Legacy schemas (a bare map of property descriptors) fail the
 * root type check.
 */
export function classifyOutputSchema(schema: unknown): ClassifiedSchema {
  if (schema === undefined || schema === null) {
    return malformed("$: no output schema");
  }
  return classifyNode(schema, "$", true);
}

export function isObjectTyped(schema: WellFormedSchema): boolean {
  return schema.types.includes("object");
}

/**
 * True when the schema classifies as well-formed. Pass `classified` when the
 * schema has already been classified.
 */
export function isOutputSchema(
  schema: unknown,
  classified: ClassifiedSchema = classifyOutputSchema(schema)
): schema is OutputSchema {
  return classified.kind === "well-formed";
}

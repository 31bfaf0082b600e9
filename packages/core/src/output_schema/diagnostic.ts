import type { ErrorObject } from "ajv";

const INDENT = "    ";

function inline(value: unknown): string {
  return JSON.stringify(value) ?? "undefined";
}

function block(value: unknown): string {
  const rendered = JSON.stringify(value, null, 2) ?? "undefined";
  return rendered
    .split("\n")
    .map((line) => `${INDENT}${line}`)
    .join("\n");
}

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

function renderPath(segments: string[]): string {
  return segments
    .map((segment) => (/^\d+$/.test(segment) ? `[${segment}]` : `['${segment}']`))
    .join("");
}

/**
 * `#/properties/output/type` -> `['properties']['output']` (the failing keyword is dropped).
 */
export function formatSchemaPath(schemaPath: string): string {
  const segments = schemaPath
    .replace(/^#/, "")
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodePointerSegment);
  return renderPath(segments.slice(0, -1));
}

/**
 * `/output/0` -> `['output'][0]`.
 */
export function formatInstancePath(instancePath: string): string {
  const segments = instancePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodePointerSegment);
  return renderPath(segments);
}

/**
 * One-line description of a single schema violation.
 */
export function describeError(error: ErrorObject): string {
  const params = error.params;
  switch (error.keyword) {
    case "additionalProperties":
      return `Additional properties are not allowed ('${String(params['additionalProperty'])}' was unexpected)`;
    case "required":
      return `'${String(params['missingProperty'])}' is a required property`;
    case "type": {
      const expected = params['type'];
      const typeName = Array.isArray(expected) ? expected.join(", ") : String(expected);
      return `${inline(error.data)} is not of type '${typeName}'`;
    }
    case "enum":
      return `${inline(error.data)} is not one of ${inline(params['allowedValues'])}`;
    case "const":
      return `${inline(params['allowedValue'])} was expected`;
    default:
      return error.message ?? `failed '${error.keyword}' validation`;
  }
}

/**
 * Renders a validation error the way it is stored on a failed execution:
 * the violation, the failing schema fragment and the offending instance.
 * Expects errors produced in verbose mode (`parentSchema` and `data` set).
 */
export function formatDiagnostic(error: ErrorObject): string {
  return [
    describeError(error),
    "",
    `Failed validating '${error.keyword}' in schema${formatSchemaPath(error.schemaPath)}:`,
    block(error.parentSchema),
    "",
    `On instance${formatInstancePath(error.instancePath)}:`,
    block(error.data),
  ].join("\n");
}

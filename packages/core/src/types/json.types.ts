/**
 * JSON-compatible values as produced by an action and stored on its execution.
 */
export type JsonPrimitive = string | number | boolean | null;

export type JsonObject = { [key: string]: JsonValue };

export type JsonArray = JsonValue[];

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Narrows a value to a JSON mapping (not null, not an array).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasOwnKey(value: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

export type { FieldError, ValidationResult } from "./common.types";
export { OutcheckError } from "./common.types";
export type { JsonPrimitive, JsonObject, JsonArray, JsonValue } from "./json.types";
export { isJsonObject, hasOwnKey } from "./json.types";

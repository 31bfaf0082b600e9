export { SchemaValidationCache } from "./schema_cache";
export { SchemaLoadError } from "./errors";

import { OutcheckError } from "../types";

/**
 * Raised when a schema file cannot be read, parsed, or is not a mapping.
 */
export class SchemaLoadError extends OutcheckError {
  public readonly schemaPath: string;

  constructor(schemaPath: string, reason: string) {
    super(`Cannot load schema ${schemaPath}: ${reason}`, "SCHEMA_LOAD_ERROR");
    this.schemaPath = schemaPath;
  }
}

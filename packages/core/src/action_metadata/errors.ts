import { OutcheckError } from "../types";
import type { FieldError } from "../types";

/**
 * Raised when a metadata file cannot be read or parsed.
 */
export class MetadataLoadError extends OutcheckError {
  public readonly source: string;

  constructor(source: string, reason: string) {
    super(`Cannot load metadata from ${source}: ${reason}`, "METADATA_LOAD_ERROR");
    this.source = source;
  }
}

/**
 * Raised when an action or runner is not known to the loader.
 */
export class MetadataNotFoundError extends OutcheckError {
  public readonly kind: "action" | "runner";
  public readonly metadataName: string;

  constructor(kind: "action" | "runner", metadataName: string) {
    super(`${kind === "action" ? "Action" : "Runner"} not found: ${metadataName}`, "METADATA_NOT_FOUND");
    this.kind = kind;
    this.metadataName = metadataName;
  }
}

/**
 * Raised when a metadata document does not match its schema.
 */
export class MetadataValidationError extends OutcheckError {
  public readonly documentType: string;
  public readonly errors: FieldError[];

  constructor(documentType: string, errors: FieldError[]) {
    const details = errors.map((error) => `${error.field}: ${error.message}`).join(", ");
    super(`Invalid ${documentType}: ${details}`, "METADATA_VALIDATION_ERROR");
    this.documentType = documentType;
    this.errors = errors;
  }
}

import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { isJsonObject } from "../types";
import { SchemaLoadError } from "./errors";

function isSchemaObject(value: unknown): value is SchemaObject {
  return isJsonObject(value);
}

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 *
 * Errors are collected in verbose mode so diagnostics can show the failing
 * schema fragment and the instance data next to the message. Strict mode is
 * off: action authors put free-form keywords in output schemas.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true, strict: false });
      addFormats(this.ajv);
      // Redaction marker, not a validation rule.
      this.ajv.addKeyword({ keyword: "secret", schemaType: "boolean" });
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) {
      return cached;
    }

    let schema: unknown;
    try {
      schema = yaml.load(fs.readFileSync(schemaPath, "utf8"));
    } catch (error) {
      throw new SchemaLoadError(schemaPath, error instanceof Error ? error.message : String(error));
    }
    if (!isSchemaObject(schema)) {
      throw new SchemaLoadError(schemaPath, "document is not a mapping");
    }

    const validator = this.getAjv().compile(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * Compilation errors (an invalid schema) propagate to the caller.
   */
  static getValidatorFromSchema(schema: SchemaObject): ValidateFunction {
    const schemaKey = JSON.stringify(schema);
    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached;
    }

    // Two schemas sharing an $id would collide inside the shared Ajv instance.
    const { $id: _id, ...schemaWithoutId } = schema;

    const validator = this.getAjv().compile(schemaWithoutId);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size + this.schemaValidators.size,
      schemasLoaded: Array.from(this.validators.keys())
    };
  }
}

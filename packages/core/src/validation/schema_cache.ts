import Ajv from "ajv";
import type { AnySchemaObject, ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { SchemaValidationError } from "./errors";
import type { FieldError } from "./errors";

export const SCHEMA_DIR = path.resolve(__dirname, "../../schemas");

function isSchemaObject(value: unknown): value is AnySchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type SchemaName = "change_request_event" | "status_event" | "sync_config";

/**
 * Cache of compiled validators for the YAML schemas shipped with the package.
 * Each schema is registered under its file name, which is also its `$id`.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, useDefaults: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or compiles the validator for a schema file under SCHEMA_DIR.
   */
  static getValidator<T>(name: SchemaName): ValidateFunction<T> {
    const ajv = this.getAjv();
    if (!ajv.getSchema(name)) {
      const schemaContent = fs.readFileSync(path.join(SCHEMA_DIR, `${name}.yaml`), "utf8");
      const schema = yaml.load(schemaContent);
      if (!isSchemaObject(schema)) {
        throw new Error(`Schema ${name} is not an object`);
      }
      ajv.addSchema(schema);
    }

    const validator = ajv.getSchema<T>(name);
    if (!validator) {
      throw new Error(`Schema ${name} could not be compiled`);
    }
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.ajv = null;
  }
}

export function formatErrors(errors: ErrorObject[] | null | undefined): FieldError[] {
  return (errors ?? []).map((error) => ({
    field: error.instancePath || "/",
    message: error.message || "Validation failed",
  }));
}

/**
 * Validates `data` against a schema and returns it typed, or throws
 * SchemaValidationError listing every failing field.
 */
export function validateSchema<T>(name: SchemaName, data: unknown): T {
  const validator = SchemaValidationCache.getValidator<T>(name);
  if (validator(data)) {
    return data;
  }
  throw new SchemaValidationError(name, formatErrors(validator.errors));
}

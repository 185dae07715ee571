import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as yaml from "js-yaml";
import type { ValidationIssue } from "../validation/errors";

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Process-wide cache of compiled validators, keyed by schema file path.
 * Schemas are YAML files shipped next to the code that uses them.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, strict: false });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) return cached;

    const schemaContent = fs.readFileSync(schemaPath, "utf8");
    const schema = yaml.load(schemaContent, { schema: yaml.CORE_SCHEMA });
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema at ${schemaPath} is not an object`);
    }

    const validator = this.getAjv().compile(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.validators.size };
  }
}

/**
 * Flattens Ajv errors into `{field, message, value}` issues.
 * `field` is the top-level key that failed (or the missing property).
 */
export function toValidationIssues(
  errors: ErrorObject[] | null | undefined,
  data: unknown,
): ValidationIssue[] {
  if (!errors) return [];
  return errors.map((error) => {
    const missing = error.params["missingProperty"];
    const field = typeof missing === "string"
      ? missing
      : error.instancePath.split("/").filter(Boolean)[0] ?? "(root)";
    return {
      field,
      message: error.message ?? "is invalid",
      value: readField(data, field),
    };
  });
}

function readField(data: unknown, field: string): unknown {
  if (typeof data !== "object" || data === null) return undefined;
  return Object.entries(data).find(([key]) => key === field)?.[1];
}

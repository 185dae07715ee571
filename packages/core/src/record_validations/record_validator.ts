import type { ValidateFunction } from "ajv";
import { fileURLToPath } from "url";
import { SchemaValidationCache, toValidationIssues } from "../schemas/schema_cache";
import { toHeaderObject } from "../record_codec/header_object";
import { isValidRecordId } from "../utils/id_generator";
import { isRecommendedPriority, RECOMMENDED_PRIORITIES } from "../record_types";
import type { TaskdeckRecord } from "../record_types";
import type { ValidationIssue, ValidationResult } from "../validation/errors";

const RECORD_HEADER_SCHEMA_PATH = fileURLToPath(
  new URL("../record_schemas/record_header.schema.yaml", import.meta.url),
);

// --- Schema Validation ---
export function validateHeaderObjectSchema(
  data: unknown,
): [boolean, ValidateFunction["errors"]] {
  const validateSchema = SchemaValidationCache.getValidator(RECORD_HEADER_SCHEMA_PATH);
  const isValid = validateSchema(data) === true;
  return [isValid, validateSchema.errors];
}

/**
 * Validates an on-disk header mapping (snake_case keys, `type` for the kind).
 * Unknown keys are allowed.
 */
export function validateHeaderObject(data: unknown): ValidationResult {
  const [isValid, errors] = validateHeaderObjectSchema(data);
  return { isValid, errors: isValid ? [] : toValidationIssues(errors, data) };
}

/**
 * Validation applied before a record is written. Stricter than decoding:
 * the title must have visible text and the priority must be one of the
 * recommended values.
 */
export function validateRecordForWrite(record: TaskdeckRecord): ValidationResult {
  const { errors } = validateHeaderObject(toHeaderObject(record));
  const issues: ValidationIssue[] = [...errors];

  if (!isValidRecordId(record.id)) {
    issues.push({ field: "id", message: "must be a safe filename stem", value: record.id });
  }
  if (record.title.trim().length === 0) {
    issues.push({ field: "title", message: "must not be blank", value: record.title });
  }
  if (record.priority !== undefined && !isRecommendedPriority(record.priority)) {
    issues.push({
      field: "priority",
      message: `must be one of ${RECOMMENDED_PRIORITIES.join(", ")}`,
      value: record.priority,
    });
  }

  return { isValid: issues.length === 0, errors: dedupeIssues(issues) };
}

function dedupeIssues(issues: ValidationIssue[]): ValidationIssue[] {
  const seen = new Set<string>();
  return issues.filter((issue) => {
    const key = `${issue.field}:${issue.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

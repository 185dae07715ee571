import * as yaml from "js-yaml";
import { uniqueInOrder } from "../utils/array_utils";
import { ParseError } from "../validation/errors";
import { validateHeaderObject } from "../record_validations/record_validator";
import { isRecordKind, isRecordStatus, DEFAULT_STATUS } from "../record_types";
import type { TaskdeckRecord } from "../record_types";
import {
  NULLABLE_HEADER_KEYS,
  isKnownHeaderKey,
  isPlainObject,
  toHeaderObject,
} from "./header_object";

export const HEADER_DELIMITER = "---";

/**
 * Encodes a record as `---`, the YAML header, `---`, a blank line and the body.
 */
export function encodeRecord(record: TaskdeckRecord): string {
  const headerYaml = yaml.dump(toHeaderObject(record), {
    schema: yaml.CORE_SCHEMA,
    lineWidth: -1,
    noRefs: true,
  });
  return `${HEADER_DELIMITER}\n${headerYaml}${HEADER_DELIMITER}\n\n${record.body}`;
}

/**
 * Splits the header block from the body. The first line must be the
 * delimiter; the header ends at the next delimiter line. One blank line
 * after the closing delimiter is part of the separator. The body is
 * returned verbatim, line endings included.
 */
export function splitHeaderAndBody(
  content: string,
  source?: string,
): { headerText: string; body: string } {
  const text = content.replace(/^\uFEFF/, "");
  const lineBreak = /\r?\n/g;
  const headerLines: string[] = [];
  let lineStart = 0;
  let bodyStart = -1;

  let match = lineBreak.exec(text);
  while (match) {
    const line = text.slice(lineStart, match.index);
    const nextStart = match.index + match[0].length;
    if (lineStart === 0) {
      if (line !== HEADER_DELIMITER) {
        throw new ParseError("header", "missing opening delimiter line", source);
      }
    } else if (line === HEADER_DELIMITER) {
      bodyStart = nextStart;
      break;
    } else {
      headerLines.push(line);
    }
    lineStart = nextStart;
    match = lineBreak.exec(text);
  }

  if (bodyStart === -1) {
    const lastLine = text.slice(lineStart);
    if (lineStart === 0 && lastLine !== HEADER_DELIMITER) {
      throw new ParseError("header", "missing opening delimiter line", source);
    }
    if (lineStart === 0 || lastLine !== HEADER_DELIMITER) {
      throw new ParseError("header", "missing closing delimiter line", source);
    }
    bodyStart = text.length;
  }

  let body = text.slice(bodyStart);
  if (body.startsWith("\r\n")) {
    body = body.slice(2);
  } else if (body.startsWith("\n")) {
    body = body.slice(1);
  }

  return { headerText: headerLines.join("\n"), body };
}

/**
 * Decodes a record file. Missing optional keys stay absent; unknown keys
 * are kept in `extra`. Throws ParseError naming the offending key.
 */
export function decodeRecord(content: string, source?: string): TaskdeckRecord {
  const { headerText, body } = splitHeaderAndBody(content, source);

  let parsed: unknown;
  try {
    parsed = yaml.load(headerText, { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError("header", `malformed YAML (${reason})`, source);
  }
  if (!isPlainObject(parsed)) {
    throw new ParseError("header", "header block is not a mapping", source);
  }

  // `key: null` reads as an absent optional key
  for (const key of NULLABLE_HEADER_KEYS) {
    if (parsed[key] === null) delete parsed[key];
  }

  const result = validateHeaderObject(parsed);
  const firstIssue = result.errors[0];
  if (!result.isValid && firstIssue) {
    throw new ParseError(firstIssue.field, firstIssue.message, source);
  }

  const id = parsed["id"];
  const kind = parsed["type"];
  const title = parsed["title"];
  const status = parsed["status"] ?? DEFAULT_STATUS;
  const createdAt = parsed["created_at"];

  // The schema already checked these; the guards narrow the types.
  if (typeof id !== "string") throw new ParseError("id", "must be a string", source);
  if (!isRecordKind(kind)) throw new ParseError("type", "must be task, goal or note", source);
  if (typeof title !== "string") throw new ParseError("title", "must be a string", source);
  if (!isRecordStatus(status)) throw new ParseError("status", "unknown status", source);
  if (typeof createdAt !== "string") throw new ParseError("created_at", "must be a string", source);

  const record: TaskdeckRecord = {
    id,
    kind,
    title,
    status,
    tags: readTags(parsed["tags"]),
    createdAt,
    extra: {},
    body,
  };

  const priority = parsed["priority"];
  if (typeof priority === "string") record.priority = priority;
  const dueDate = parsed["due_date"];
  if (typeof dueDate === "string") record.dueDate = dueDate;
  const parentGoalId = parsed["parent_goal_id"];
  if (typeof parentGoalId === "string") record.parentGoalId = parentGoalId;

  for (const [key, value] of Object.entries(parsed)) {
    if (!isKnownHeaderKey(key)) record.extra[key] = value;
  }

  return record;
}

function readTags(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return uniqueInOrder(value.filter((tag): tag is string => typeof tag === "string"));
}

import { ValidationError } from "../validation/errors";
import { splitList, uniqueInOrder } from "../utils/array_utils";
import { isCalendarDate } from "../utils/date_utils";
import type { PatchField, TaskdeckRecord } from "../record_types";

/** Separator placed between the existing body and an appended note. */
export const NOTE_SEPARATOR = "\n\n";

export function normalizeBody(body: string): string {
  return body.replace(/\r\n/g, "\n");
}

/** Priorities are stored trimmed and lower-cased. */
export function normalizePriority(priority: string): string {
  return priority.trim().toLowerCase();
}

/**
 * Appends a note to a body, with a blank line between them.
 */
export function appendNote(body: string, note: string): string {
  const text = normalizeBody(note);
  return body.length === 0 ? text : `${body}${NOTE_SEPARATOR}${text}`;
}

/**
 * Reads a tag list from an array of strings or a comma-separated string.
 */
export function coerceTags(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (typeof value === "string") return uniqueInOrder(splitList(value));
  if (Array.isArray(value) && value.every((tag): tag is string => typeof tag === "string")) {
    return uniqueInOrder(value.map((tag) => tag.trim()).filter((tag) => tag.length > 0));
  }
  throw ValidationError.forField("tags", "must be a list of strings or a comma-separated string", value);
}

function requireString(field: string, value: unknown): string {
  if (typeof value !== "string") {
    throw ValidationError.forField(field, "must be a string", value);
  }
  return value;
}

function isCleared(value: unknown): boolean {
  return value === null || value === "";
}

/**
 * Returns a copy of `record` with one field changed. Status changes are
 * not handled here: they go through the store's transitionStatus.
 */
export function applyPatch(
  record: TaskdeckRecord,
  field: Exclude<PatchField, "status">,
  value: unknown,
): TaskdeckRecord {
  const next: TaskdeckRecord = { ...record, tags: [...record.tags], extra: { ...record.extra } };

  switch (field) {
    case "title":
      next.title = requireString("title", value).trim();
      return next;

    case "priority":
      if (isCleared(value)) {
        delete next.priority;
      } else {
        next.priority = normalizePriority(requireString("priority", value));
      }
      return next;

    case "tags":
      next.tags = coerceTags(value);
      return next;

    case "due_date":
      if (isCleared(value)) {
        delete next.dueDate;
        return next;
      }
      if (!isCalendarDate(value)) {
        throw ValidationError.forField("due_date", "must be a calendar date (YYYY-MM-DD)", value);
      }
      next.dueDate = value;
      return next;

    case "parent_goal_id":
      if (isCleared(value)) {
        delete next.parentGoalId;
      } else {
        next.parentGoalId = requireString("parent_goal_id", value).trim();
      }
      return next;

    case "body":
      next.body = normalizeBody(requireString("body", value));
      return next;

    case "notes": {
      const note = requireString("notes", value);
      if (note.trim().length === 0) {
        throw ValidationError.forField("notes", "must not be blank", value);
      }
      next.body = appendNote(record.body, note);
      return next;
    }
  }
}

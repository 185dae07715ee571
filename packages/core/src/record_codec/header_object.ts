import type { TaskdeckRecord } from "../record_types";

/** On-disk header keys, in the order they are written. */
export const KNOWN_HEADER_KEYS = [
  "id",
  "type",
  "title",
  "status",
  "priority",
  "tags",
  "due_date",
  "parent_goal_id",
  "created_at",
] as const;

export const NULLABLE_HEADER_KEYS = ["status", "priority", "tags", "due_date", "parent_goal_id"];

type KnownHeaderKey = (typeof KNOWN_HEADER_KEYS)[number];

export function isKnownHeaderKey(key: string): key is KnownHeaderKey {
  return KNOWN_HEADER_KEYS.some((known) => known === key);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds the on-disk header mapping for a record: known keys first in
 * their fixed order, then unrecognized keys in the order they were read.
 */
export function toHeaderObject(record: TaskdeckRecord): Record<string, unknown> {
  const header: Record<string, unknown> = {
    id: record.id,
    type: record.kind,
    title: record.title,
    status: record.status,
  };
  if (record.priority !== undefined) header["priority"] = record.priority;
  header["tags"] = [...record.tags];
  if (record.dueDate !== undefined) header["due_date"] = record.dueDate;
  if (record.parentGoalId !== undefined) header["parent_goal_id"] = record.parentGoalId;
  header["created_at"] = record.createdAt;

  for (const [key, value] of Object.entries(record.extra)) {
    if (!isKnownHeaderKey(key)) header[key] = value;
  }
  return header;
}


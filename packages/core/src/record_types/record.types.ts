export const RECORD_KINDS = ["task", "goal", "note"] as const;
export type RecordKind = (typeof RECORD_KINDS)[number];

export const RECORD_STATUSES = ["active", "next", "waiting", "done", "archived"] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

/** Priorities accepted on create/patch. Decoding tolerates other values. */
export const RECOMMENDED_PRIORITIES = ["high", "medium", "low"] as const;
export type Priority = (typeof RECOMMENDED_PRIORITIES)[number];

export const DEFAULT_STATUS: RecordStatus = "active";
export const DEFAULT_PRIORITY: Priority = "medium";
export const DEFAULT_KIND: RecordKind = "task";

/**
 * Header-only projection of a record. This is what the index holds and
 * what list queries return; it never carries the body.
 */
export interface RecordHeader {
  id: string;
  kind: RecordKind;
  title: string;
  status: RecordStatus;
  priority?: string;
  tags: string[];
  /** Calendar date, `YYYY-MM-DD`. */
  dueDate?: string;
  /** May point at a goal that no longer exists. */
  parentGoalId?: string;
  /** ISO-8601 timestamp, set once on create. */
  createdAt: string;
}

/**
 * A full record: header, unrecognized header keys kept verbatim, and body.
 */
export interface TaskdeckRecord extends RecordHeader {
  extra: Record<string, unknown>;
  body: string;
}

/** Input for `create`. The store fills id, createdAt and defaults. */
export interface RecordDraft {
  title: string;
  kind?: RecordKind;
  body?: string;
  status?: RecordStatus;
  priority?: string;
  tags?: string[];
  dueDate?: string;
  parentGoalId?: string;
}

/** Fields accepted by `patch`, named as they appear on disk. */
export const PATCH_FIELDS = [
  "title",
  "status",
  "priority",
  "tags",
  "due_date",
  "parent_goal_id",
  "body",
  "notes",
] as const;
export type PatchField = (typeof PATCH_FIELDS)[number];

export type RecordLocation = "active" | "archive";

export function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === "string" && RECORD_KINDS.some((kind) => kind === value);
}

export function isRecordStatus(value: unknown): value is RecordStatus {
  return typeof value === "string" && RECORD_STATUSES.some((status) => status === value);
}

export function isRecommendedPriority(value: unknown): value is Priority {
  return typeof value === "string" && RECOMMENDED_PRIORITIES.some((p) => p === value);
}

export function isPatchField(value: unknown): value is PatchField {
  return typeof value === "string" && PATCH_FIELDS.some((field) => field === value);
}

/** Projects a full record down to its header. */
export function toHeader(record: RecordHeader): RecordHeader {
  const header: RecordHeader = {
    id: record.id,
    kind: record.kind,
    title: record.title,
    status: record.status,
    tags: [...record.tags],
    createdAt: record.createdAt,
  };
  if (record.priority !== undefined) header.priority = record.priority;
  if (record.dueDate !== undefined) header.dueDate = record.dueDate;
  if (record.parentGoalId !== undefined) header.parentGoalId = record.parentGoalId;
  return header;
}

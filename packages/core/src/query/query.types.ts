import type { RecordHeader, RecordKind, RecordStatus } from "../record_types";

export const SORT_KEYS = ["due_date", "priority", "created_at"] as const;
export type SortKey = (typeof SORT_KEYS)[number];
export type SortDirection = "asc" | "desc";

/**
 * Conjunction of optional predicates over headers.
 */
export interface RecordFilter {
  status?: RecordStatus | RecordStatus[];
  /** Tag membership. */
  tag?: string;
  priority?: string;
  kind?: RecordKind;
  /** Inclusive due-date range, `YYYY-MM-DD`. Records without a due date never match a range. */
  dueFrom?: string;
  dueTo?: string;
  parentGoalId?: string;
  /** Archived records are left out unless set, or unless `status` asks for `archived`. */
  includeArchived?: boolean;
}

export interface ListQuery extends RecordFilter {
  sort?: SortKey;
  direction?: SortDirection;
  limit?: number;
}

export interface DailySummary {
  date: string;
  highPriority: RecordHeader[];
  dueToday: RecordHeader[];
  overdue: RecordHeader[];
  totalActive: number;
  highPriorityCount: number;
  dueTodayCount: number;
  overdueCount: number;
}

/** Anything that can hand out the current header projections. */
export interface HeaderSource {
  listHeaders(options?: { includeArchived?: boolean }): RecordHeader[];
}

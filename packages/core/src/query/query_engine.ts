import { ValidationError } from "../validation/errors";
import { isCalendarDate } from "../utils/date_utils";
import type { RecordHeader, RecordStatus } from "../record_types";
import {
  SORT_KEYS,
  type DailySummary,
  type HeaderSource,
  type ListQuery,
  type RecordFilter,
  type SortDirection,
  type SortKey,
} from "./query.types";

const PRIORITY_RANK: Record<string, number> = { high: 0, medium: 1, low: 2 };
const UNKNOWN_PRIORITY_RANK = 3;
const OPEN_STATUSES: RecordStatus[] = ["active", "next"];

export function isSortKey(value: unknown): value is SortKey {
  return typeof value === "string" && SORT_KEYS.some((key) => key === value);
}

export function priorityRank(priority: string | undefined): number | undefined {
  if (priority === undefined) return undefined;
  return PRIORITY_RANK[priority.toLowerCase()] ?? UNKNOWN_PRIORITY_RANK;
}

function sortValue(header: RecordHeader, key: SortKey): string | number | undefined {
  switch (key) {
    case "due_date":
      return header.dueDate;
    case "priority":
      return priorityRank(header.priority);
    case "created_at":
      return header.createdAt;
  }
}

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders by `key`; records without the key go last in either direction.
 * Ties fall back to creation time, then id, so results never depend on
 * the order files were found on disk.
 */
export function compareHeaders(key: SortKey, direction: SortDirection = "asc") {
  const sign = direction === "desc" ? -1 : 1;
  return (a: RecordHeader, b: RecordHeader): number => {
    const left = sortValue(a, key);
    const right = sortValue(b, key);
    if (left === undefined && right !== undefined) return 1;
    if (right === undefined && left !== undefined) return -1;
    if (left !== undefined && right !== undefined) {
      const order = compareValues(left, right);
      if (order !== 0) return sign * order;
    }
    return compareValues(a.createdAt, b.createdAt) || compareValues(a.id, b.id);
  };
}

export function matchesFilter(header: RecordHeader, filter: RecordFilter): boolean {
  if (filter.status !== undefined) {
    const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
    if (!statuses.includes(header.status)) return false;
  }
  if (filter.tag !== undefined && !header.tags.includes(filter.tag)) return false;
  if (filter.priority !== undefined && header.priority?.toLowerCase() !== filter.priority.toLowerCase()) {
    return false;
  }
  if (filter.kind !== undefined && header.kind !== filter.kind) return false;
  if (filter.parentGoalId !== undefined && header.parentGoalId !== filter.parentGoalId) return false;
  if (filter.dueFrom !== undefined || filter.dueTo !== undefined) {
    if (header.dueDate === undefined) return false;
    if (filter.dueFrom !== undefined && header.dueDate < filter.dueFrom) return false;
    if (filter.dueTo !== undefined && header.dueDate > filter.dueTo) return false;
  }
  return true;
}

function assertQuery(query: ListQuery): void {
  if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 1)) {
    throw ValidationError.forField("limit", "must be a positive integer", query.limit);
  }
  if (query.sort !== undefined && !isSortKey(query.sort)) {
    throw ValidationError.forField("sort", `must be one of ${SORT_KEYS.join(", ")}`, query.sort);
  }
  for (const field of ["dueFrom", "dueTo"] as const) {
    const value = query[field];
    if (value !== undefined && !isCalendarDate(value)) {
      throw ValidationError.forField(field, "must be a YYYY-MM-DD date", value);
    }
  }
}

/**
 * QueryEngine - filters, sorts and truncates header projections.
 * Works on the index only; bodies are never read.
 */
export class QueryEngine {
  constructor(private readonly source: HeaderSource) {}

  list(query: ListQuery = {}): RecordHeader[] {
    assertQuery(query);

    const statuses = query.status === undefined ? [] : Array.isArray(query.status) ? query.status : [query.status];
    const includeArchived = query.includeArchived === true || statuses.includes("archived");

    const matches = this.source
      .listHeaders({ includeArchived })
      .filter((header) => matchesFilter(header, query))
      .sort(compareHeaders(query.sort ?? "created_at", query.direction));

    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  /**
   * Today's view over active and next records: high priority ones by due
   * date, plus what is due today and what is overdue.
   */
  dailySummary(today: string): DailySummary {
    if (!isCalendarDate(today)) {
      throw ValidationError.forField("date", "must be a YYYY-MM-DD date", today);
    }

    const open = this.list({ status: OPEN_STATUSES, sort: "due_date" });
    const highPriority = open.filter((h) => h.priority?.toLowerCase() === "high");
    const dueToday = open.filter((h) => h.dueDate === today);
    const overdue = open.filter((h) => h.dueDate !== undefined && h.dueDate < today);

    return {
      date: today,
      highPriority,
      dueToday,
      overdue,
      totalActive: open.length,
      highPriorityCount: highPriority.length,
      dueTodayCount: dueToday.length,
      overdueCount: overdue.length,
    };
  }
}

export { QueryEngine, compareHeaders, matchesFilter, priorityRank, isSortKey } from "./query_engine";
export { SORT_KEYS } from "./query.types";
export type {
  DailySummary,
  HeaderSource,
  ListQuery,
  RecordFilter,
  SortDirection,
  SortKey,
} from "./query.types";

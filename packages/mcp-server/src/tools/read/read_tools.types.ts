import type { RecordStatus, SortKey } from '@taskdeck/core';

/**
 * Input types for the read-only tools.
 */

export interface ListTasksInput {
  status?: RecordStatus;
  tag?: string;
  priority?: string;
  sort?: SortKey;
  direction?: 'asc' | 'desc';
  limit?: number;
  include_archived?: boolean;
}

export interface ReadTaskDetailsInput {
  id: string;
}

export interface DailySummaryInput {
  /** YYYY-MM-DD; defaults to the server's local date */
  date?: string;
}

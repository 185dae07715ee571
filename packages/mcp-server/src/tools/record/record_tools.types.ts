import type { PatchField, Priority, RecordKind, RecordStatus } from '@taskdeck/core';

/**
 * Input types for the record mutation tools.
 */

export interface CreateTaskInput {
  title: string;
  body?: string;
  due_date?: string;
  priority?: Priority;
  tags?: string[];
  type?: RecordKind;
  status?: RecordStatus;
  parent_goal_id?: string;
}

export interface UpdateTaskInput {
  id: string;
  field: PatchField;
  /** `null` clears due_date and parent_goal_id; tags accept an array. */
  value: string | string[] | null;
}

export interface CompleteTaskInput {
  id: string;
  archive?: boolean;
}

export interface ArchiveTaskInput {
  id: string;
}

import {
  isTaskdeckError,
  LockContentionError,
  RecordNotFoundError,
  StoreIOError,
  SyncConflictError,
  ValidationError,
} from '@taskdeck/core';
import type { RecordHeader, SyncOutcome } from '@taskdeck/core';
import type { ToolResult } from '../server/mcp_server.types.js';

/**
 * Builds a successful ToolResult carrying JSON data.
 */
export function successResult<T>(data: T): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data) }],
  };
}

/**
 * Builds the standard error ToolResult.
 */
export function errorResult(
  message: string,
  code?: string,
  details?: Record<string, unknown>,
): ToolResult {
  const payload: { error: string; code?: string; details?: Record<string, unknown> } = {
    error: message,
  };
  if (code) payload.code = code;
  if (details) payload.details = details;

  return {
    content: [{ type: 'text', text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Maps a thrown error onto an error result, keeping the core's error code.
 */
export function failureResult(action: string, error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  if (!isTaskdeckError(error)) {
    return errorResult(`${action}: ${message}`, 'INTERNAL_ERROR');
  }
  return errorResult(`${action}: ${message}`, error.code, errorDetails(error));
}

function errorDetails(error: Error): Record<string, unknown> | undefined {
  if (error instanceof ValidationError) return { errors: error.errors };
  if (error instanceof RecordNotFoundError) return { id: error.recordId };
  if (error instanceof LockContentionError) return { holder: error.holder, timeoutMs: error.timeoutMs };
  if (error instanceof StoreIOError) return { path: error.filePath };
  if (error instanceof SyncConflictError) return { files: error.conflictedFiles };
  return undefined;
}

/** Header as agents see it: the same keys as the record file. */
export interface WireHeader {
  id: string;
  type: string;
  title: string;
  status: string;
  priority: string | null;
  tags: string[];
  due_date: string | null;
  parent_goal_id: string | null;
  created_at: string;
}

export function toWireHeader(header: RecordHeader): WireHeader {
  return {
    id: header.id,
    type: header.kind,
    title: header.title,
    status: header.status,
    priority: header.priority ?? null,
    tags: header.tags,
    due_date: header.dueDate ?? null,
    parent_goal_id: header.parentGoalId ?? null,
    created_at: header.createdAt,
  };
}

export interface WireMutation {
  record: WireHeader;
  sync: SyncOutcome;
}

export function toWireMutation(result: { record: RecordHeader; sync: SyncOutcome }): WireMutation {
  return { record: toWireHeader(result.record), sync: result.sync };
}

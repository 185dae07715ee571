/**
 * @taskdeck/core
 *
 * Interface contracts, pure logic and shared types. Filesystem and git
 * bound implementations live in `@taskdeck/core/fs`; in-memory stand-ins
 * used by tests live in `@taskdeck/core/memory`.
 */

export * as Records from "./record_types";
export * as Codec from "./record_codec";
export * as Index from "./record_index";
export * as Store from "./record_store";
export * as Lock from "./lock";
export * as Git from "./git";
export * as Sync from "./sync";
export * as Query from "./query";
export * as Config from "./config_manager";
export * as EventBus from "./event_bus";
export * as Watcher from "./store_watcher";
export * as Logging from "./logger";

// Record Adapter
export { RecordAdapter } from "./adapters/record_adapter";
export type {
  IRecordAdapter,
  MutationResult,
  RecordDetail,
  CreateRecordInput,
  CompleteOptions,
} from "./adapters/record_adapter";

// Errors
export {
  TaskdeckError,
  ParseError,
  ValidationError,
  RecordNotFoundError,
  isTaskdeckError,
} from "./validation/errors";
export type { TaskdeckErrorCode, ValidationIssue } from "./validation/errors";
export { LockContentionError } from "./lock";
export { StoreIOError } from "./record_store";
export { DataDirNotFoundError } from "./store_watcher";
export { ConfigError } from "./config_manager";
export { SyncError, SyncNetworkError, SyncTimeoutError, SyncConflictError } from "./sync";

// Frequently used types
export type {
  RecordHeader,
  TaskdeckRecord,
  RecordDraft,
  RecordKind,
  RecordStatus,
  RecordLocation,
  PatchField,
  Priority,
} from "./record_types";
export {
  RECORD_KINDS,
  RECORD_STATUSES,
  PATCH_FIELDS,
  isPatchField,
  isRecordStatus,
  isRecordKind,
} from "./record_types";
export type { SyncState, SyncOutcome, SyncPhase } from "./sync";
export type { DailySummary, ListQuery, RecordFilter, SortKey } from "./query";
export type { Goal, GoalUpdate, TaskdeckConfig, Workstream } from "./config_manager";
export type { TaskdeckContext, FsContextOptions } from "./context";

export { toCalendarDate, isCalendarDate } from "./utils/date_utils";
export { resolveDataDir, DEFAULT_DATA_DIR, DATA_DIR_ENV } from "./utils/data_dir";
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";

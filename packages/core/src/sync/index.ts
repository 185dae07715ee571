export { SyncEngine, buildCommitMessage, COMMIT_PREFIX, DEFAULT_BATCH_WINDOW_MS, DEFAULT_STEP_TIMEOUT_MS } from "./sync_engine";
export { SYNC_PHASES } from "./sync.types";
export type {
  ISyncEngine,
  SyncEngineDependencies,
  SyncEngineOptions,
  SyncMode,
  SyncMutation,
  SyncMutationResult,
  SyncOutcome,
  SyncOutcomeStatus,
  SyncPhase,
  SyncState,
} from "./sync.types";
export { SyncError, SyncNetworkError, SyncTimeoutError, SyncConflictError } from "./sync.errors";
export type { SyncStep } from "./sync.errors";

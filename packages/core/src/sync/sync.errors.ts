import { TaskdeckError, type TaskdeckErrorCode } from "../validation/errors";

/**
 * Base error class for sync failures. Sync errors are never thrown at the
 * caller of a write; they end up as `lastError` in the sync state.
 */
export class SyncError extends TaskdeckError {
  constructor(message: string, code: TaskdeckErrorCode = "SYNC_ERROR") {
    super(message, code);
    this.name = "SyncError";
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

/**
 * Pull or push failed for a reason worth retrying (network, auth, rejected push).
 */
export class SyncNetworkError extends SyncError {
  public readonly step: SyncStep;

  constructor(step: SyncStep, message: string) {
    super(`${step} failed: ${message}`, "SYNC_NETWORK_ERROR");
    this.name = "SyncNetworkError";
    this.step = step;
    Object.setPrototypeOf(this, SyncNetworkError.prototype);
  }
}

export class SyncTimeoutError extends SyncError {
  public readonly step: SyncStep;
  public readonly timeoutMs: number;

  constructor(step: SyncStep, timeoutMs: number) {
    super(`${step} timed out after ${timeoutMs}ms`, "SYNC_TIMEOUT");
    this.name = "SyncTimeoutError";
    this.step = step;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, SyncTimeoutError.prototype);
  }
}

/**
 * The remote copy conflicts with local commits and cannot be rebased
 * automatically. Cleared only by a successful manual sync.
 */
export class SyncConflictError extends SyncError {
  public readonly conflictedFiles: string[];

  constructor(conflictedFiles: string[]) {
    const files = conflictedFiles.length > 0 ? `: ${conflictedFiles.join(", ")}` : "";
    super(`Remote changes conflict with local edits${files}. Resolve them in the data directory, then sync again.`, "SYNC_CONFLICT");
    this.name = "SyncConflictError";
    this.conflictedFiles = conflictedFiles;
    Object.setPrototypeOf(this, SyncConflictError.prototype);
  }
}

export type SyncStep = "pull" | "commit" | "push";

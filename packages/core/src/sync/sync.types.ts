import type { IGitModule } from "../git";
import type { ILockManager } from "../lock";
import type { IRecordStore } from "../record_store";
import type { IEventStream } from "../event_bus";
import type { Logger } from "../logger";

export const SYNC_PHASES = ["Idle", "Pulling", "Committing", "Pushing", "PendingRetry", "SyncBlocked"] as const;
export type SyncPhase = (typeof SYNC_PHASES)[number];

/**
 * - `remote`: repository with a remote, full pull/commit/push cycle
 * - `local`: repository without a remote, commits only
 * - `disabled`: not a repository (or sync turned off), store writes only
 */
export type SyncMode = "remote" | "local" | "disabled";

/** What a caller of a write is told about the sync side of it. */
export type SyncOutcomeStatus = "synced" | "pending" | "blocked" | "local";

export interface SyncOutcome {
  status: SyncOutcomeStatus;
  phase: SyncPhase;
  error?: string;
}

export interface SyncState {
  phase: SyncPhase;
  mode: SyncMode;
  /** Mutations committed locally and not yet published. */
  pendingChanges: number;
  lastError: { code: string; message: string } | null;
  conflictedFiles: string[];
  lastSyncedAt: string | null;
}

/** One store mutation submitted to the engine. */
export interface SyncMutation<T> {
  /** One line for the commit message, e.g. `update <id> title`. */
  summary: string;
  apply: () => Promise<T>;
}

export interface SyncMutationResult<T> {
  value: T;
  outcome: SyncOutcome;
}

export interface SyncEngineOptions {
  enabled?: boolean;
  autoInit?: boolean;
  stepTimeoutMs?: number;
  batchWindowMs?: number;
  lockTimeoutMs?: number;
}

export interface SyncEngineDependencies {
  store: IRecordStore;
  lock: ILockManager;
  git: IGitModule;
  eventBus?: IEventStream;
  logger?: Logger;
  options?: SyncEngineOptions;
  now?: () => Date;
}

/**
 * ISyncEngine - runs store mutations under the lock, wrapped in a
 * pull/commit/push cycle. Sync failures never fail the mutation.
 */
export interface ISyncEngine {
  /** Detects the sync mode and seeds pending changes. Call once before submit. */
  initialize(): Promise<SyncState>;

  /**
   * Queues a mutation. Mutations submitted within the batch window share
   * one cycle. Rejects with the mutation's own error, or with
   * LockContentionError when the lock could not be taken.
   */
  submit<T>(mutation: SyncMutation<T>): Promise<SyncMutationResult<T>>;

  /** Manual retry: runs a cycle now, including a pull while blocked. */
  syncNow(): Promise<SyncOutcome>;

  /** Snapshot; never touches the network. */
  getState(): SyncState;

  /** Flushes queued mutations and cancels the batch timer. */
  close(): Promise<void>;
}

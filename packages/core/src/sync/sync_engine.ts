/**
 * SyncEngine - pull/commit/push around store mutations
 *
 * One cycle, under the cross-process lock:
 *   pull (skipped while blocked) -> reload the store -> apply the batched
 *   mutations in submission order -> commit -> push (skipped after a failed
 *   pull or while blocked)
 *
 * Failures of pull or push move the engine to PendingRetry or SyncBlocked;
 * the mutations are applied and committed regardless.
 *
 * @module sync
 */

import type { IGitModule } from "../git";
import { GitTimeoutError, RebaseConflictError } from "../git";
import type { ILockManager, LockHandle } from "../lock";
import type { IRecordStore } from "../record_store";
import type { IEventStream } from "../event_bus";
import { createLogger, type Logger } from "../logger";
import { errorMessage } from "../utils/fs_errors";
import { SyncConflictError, SyncError, SyncNetworkError, SyncTimeoutError, type SyncStep } from "./sync.errors";
import type {
  ISyncEngine,
  SyncEngineDependencies,
  SyncMode,
  SyncMutation,
  SyncMutationResult,
  SyncOutcome,
  SyncPhase,
  SyncState,
} from "./sync.types";

export const DEFAULT_STEP_TIMEOUT_MS = 15_000;
export const DEFAULT_BATCH_WINDOW_MS = 150;
export const COMMIT_PREFIX = "taskdeck:";

interface QueuedMutation {
  summary: string;
  /** Applies the mutation; false when it threw (the caller is already rejected). */
  apply(): Promise<boolean>;
  settle(outcome: SyncOutcome): void;
  fail(error: unknown): void;
}

export function buildCommitMessage(summaries: string[]): string {
  if (summaries.length === 1) {
    return `${COMMIT_PREFIX} ${summaries[0]}`;
  }
  if (summaries.length === 0) {
    return `${COMMIT_PREFIX} sync local changes`;
  }
  return `${COMMIT_PREFIX} ${summaries.length} changes\n\n${summaries.map((s) => `- ${s}`).join("\n")}`;
}

export class SyncEngine implements ISyncEngine {
  private readonly store: IRecordStore;
  private readonly lock: ILockManager;
  private readonly git: IGitModule;
  private readonly eventBus: IEventStream | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly enabled: boolean;
  private readonly autoInit: boolean;
  private readonly stepTimeoutMs: number;
  private readonly batchWindowMs: number;
  private readonly lockTimeoutMs: number | undefined;

  private state: SyncState = {
    phase: "Idle",
    mode: "disabled",
    pendingChanges: 0,
    lastError: null,
    conflictedFiles: [],
    lastSyncedAt: null,
  };

  private queue: QueuedMutation[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private cycleChain: Promise<void> = Promise.resolve();

  constructor(dependencies: SyncEngineDependencies) {
    this.store = dependencies.store;
    this.lock = dependencies.lock;
    this.git = dependencies.git;
    this.eventBus = dependencies.eventBus;
    this.logger = dependencies.logger ?? createLogger("[Sync] ");
    this.now = dependencies.now ?? (() => new Date());

    const options = dependencies.options ?? {};
    this.enabled = options.enabled ?? true;
    this.autoInit = options.autoInit ?? false;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.batchWindowMs = options.batchWindowMs ?? DEFAULT_BATCH_WINDOW_MS;
    this.lockTimeoutMs = options.lockTimeoutMs;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PUBLIC API
  // ═══════════════════════════════════════════════════════════════════════

  async initialize(): Promise<SyncState> {
    this.state.mode = await this.detectMode();

    if (this.state.mode !== "disabled") {
      if (await this.git.isRebaseInProgress()) {
        const files = await this.git.getConflictedFiles();
        this.block(files);
      } else if (this.state.mode === "remote") {
        this.state.pendingChanges = await this.git.countUnpushedCommits();
        if (this.state.pendingChanges > 0) {
          this.setPhase("PendingRetry");
        }
      }
    }

    this.logger.info(`Sync mode: ${this.state.mode} (${this.state.pendingChanges} unpublished)`);
    return this.getState();
  }

  submit<T>(mutation: SyncMutation<T>): Promise<SyncMutationResult<T>> {
    return new Promise<SyncMutationResult<T>>((resolve, reject) => {
      let applied: { value: T } | null = null;

      this.queue.push({
        summary: mutation.summary,
        apply: async () => {
          try {
            applied = { value: await mutation.apply() };
            return true;
          } catch (error) {
            reject(error);
            return false;
          }
        },
        settle: (outcome) => {
          if (applied) {
            resolve({ value: applied.value, outcome });
          }
        },
        fail: reject,
      });

      this.scheduleFlush();
    });
  }

  async syncNow(): Promise<SyncOutcome> {
    this.clearTimer();
    return this.enqueueCycle(true);
  }

  getState(): SyncState {
    return {
      ...this.state,
      lastError: this.state.lastError ? { ...this.state.lastError } : null,
      conflictedFiles: [...this.state.conflictedFiles],
    };
  }

  async close(): Promise<void> {
    this.clearTimer();
    if (this.queue.length > 0) {
      await this.enqueueCycle(false).catch((error: unknown) => {
        this.logger.error(`Final sync cycle failed: ${errorMessage(error)}`);
      });
    }
    await this.cycleChain;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CYCLE
  // ═══════════════════════════════════════════════════════════════════════

  private scheduleFlush(): void {
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.enqueueCycle(false).catch((error: unknown) => {
        this.logger.error(`Sync cycle failed: ${errorMessage(error)}`);
      });
    }, this.batchWindowMs);
  }

  private clearTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  /**
   * Cycles never overlap within a process. The batch is taken when the
   * cycle starts, so writes submitted during a cycle join the next one.
   */
  private enqueueCycle(manual: boolean): Promise<SyncOutcome> {
    const run = this.cycleChain.then(() => this.runCycle(this.queue.splice(0), manual));
    this.cycleChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runCycle(batch: QueuedMutation[], manual: boolean): Promise<SyncOutcome> {
    if (batch.length === 0 && !manual) {
      return this.outcome();
    }

    let handle: LockHandle;
    try {
      handle = await this.lock.acquire(this.lockTimeoutMs);
    } catch (error) {
      for (const entry of batch) entry.fail(error);
      throw error;
    }

    try {
      const published = await this.runLocked(batch, manual);
      const outcome = this.outcome();
      if (published) {
        this.state.lastSyncedAt = this.now().toISOString();
      }
      for (const entry of batch) entry.settle(outcome);
      return outcome;
    } catch (error) {
      for (const entry of batch) entry.fail(error);
      throw error;
    } finally {
      await this.lock.release(handle);
    }
  }

  /** @returns whether the cycle reached the remote successfully */
  private async runLocked(batch: QueuedMutation[], manual: boolean): Promise<boolean> {
    const mode = this.state.mode;
    let canPush = mode === "remote";

    if (mode === "remote") {
      if (this.state.phase === "SyncBlocked" && !manual) {
        canPush = false;
      } else {
        canPush = await this.pull();
      }
    } else if (mode === "local" && manual && this.state.phase === "SyncBlocked") {
      if (!(await this.git.isRebaseInProgress())) {
        this.unblock();
      }
    }

    await this.store.reload();

    const summaries: string[] = [];
    for (const entry of batch) {
      if (await entry.apply()) {
        summaries.push(entry.summary);
      }
    }

    if (mode === "disabled") {
      return false;
    }

    const committed = await this.commit(summaries);
    if (!committed || this.state.phase === "SyncBlocked") {
      return false;
    }

    if (mode === "local") {
      this.setPhase("Idle");
      return false;
    }

    if (!canPush) {
      // The pull failed: the commit waits for the next cycle.
      this.setPhase("PendingRetry");
      return false;
    }

    if (this.state.pendingChanges === 0) {
      this.setPhase("Idle");
      return true;
    }

    return this.push();
  }

  /** @returns true when the pull succeeded (or had nothing to do) */
  private async pull(): Promise<boolean> {
    const blocked = this.state.phase === "SyncBlocked";
    this.setPhase("Pulling");

    try {
      await this.git.pullRebase({ timeoutMs: this.stepTimeoutMs });
    } catch (error) {
      if (error instanceof RebaseConflictError) {
        await this.abortRebase();
        this.block(error.conflictedFiles);
        return false;
      }
      this.retryLater(this.classify("pull", error));
      return false;
    }

    if (blocked) {
      this.unblock();
    }
    this.state.lastError = null;
    return true;
  }

  private unblock(): void {
    this.logger.info("Remote reconciled; leaving SyncBlocked");
    this.state.conflictedFiles = [];
    this.state.lastError = null;
    this.setPhase("Idle");
  }

  /** @returns false when the commit step failed */
  private async commit(summaries: string[]): Promise<boolean> {
    const blocked = this.state.phase === "SyncBlocked";

    try {
      if (summaries.length === 0 && !(await this.git.hasUncommittedChanges())) {
        return true;
      }
      if (!blocked) this.setPhase("Committing");

      await this.git.stageAll();
      const hash = await this.git.commit(buildCommitMessage(summaries));
      if (hash) {
        this.state.pendingChanges += Math.max(summaries.length, 1);
        this.logger.debug(`Committed ${hash.slice(0, 8)}: ${summaries.length} change(s)`);
      }
      return true;
    } catch (error) {
      if (!blocked) this.retryLater(this.classify("commit", error));
      else this.logger.error(`Local commit failed while blocked: ${errorMessage(error)}`);
      return false;
    }
  }

  private async push(): Promise<boolean> {
    this.setPhase("Pushing");

    try {
      await this.git.push({ timeoutMs: this.stepTimeoutMs });
    } catch (error) {
      this.retryLater(this.classify("push", error));
      return false;
    }

    this.state.pendingChanges = 0;
    this.state.lastError = null;
    this.setPhase("Idle");
    return true;
  }

  private async abortRebase(): Promise<void> {
    try {
      if (await this.git.isRebaseInProgress()) {
        await this.git.rebaseAbort();
      }
    } catch (error) {
      this.logger.error(`Could not abort the rebase: ${errorMessage(error)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STATE
  // ═══════════════════════════════════════════════════════════════════════

  private async detectMode(): Promise<SyncMode> {
    if (!this.enabled) {
      return "disabled";
    }

    if (!(await this.git.isRepository())) {
      if (!this.autoInit) {
        this.logger.info("Data directory is not a git repository; sync disabled");
        return "disabled";
      }
      await this.git.init();
    }

    return (await this.git.hasRemote()) ? "remote" : "local";
  }

  private classify(step: SyncStep, error: unknown): SyncError {
    if (error instanceof GitTimeoutError) {
      return new SyncTimeoutError(step, error.timeoutMs || this.stepTimeoutMs);
    }
    return new SyncNetworkError(step, errorMessage(error));
  }

  private retryLater(error: SyncError): void {
    this.logger.warn(error.message);
    this.state.lastError = { code: error.code, message: error.message };
    this.setPhase("PendingRetry");
  }

  private block(conflictedFiles: string[]): void {
    const error = new SyncConflictError(conflictedFiles);
    this.logger.warn(error.message);
    this.state.conflictedFiles = [...conflictedFiles];
    this.state.lastError = { code: error.code, message: error.message };
    this.setPhase("SyncBlocked");
  }

  private setPhase(to: SyncPhase): void {
    const from = this.state.phase;
    if (from === to) return;
    this.state.phase = to;
    this.logger.debug(`${from} -> ${to}`);

    this.eventBus?.publish({
      type: "sync.phase.changed",
      timestamp: this.now().getTime(),
      source: "sync_engine",
      payload: {
        from,
        to,
        pendingChanges: this.state.pendingChanges,
        ...(this.state.lastError ? { error: this.state.lastError.message } : {}),
      },
    });
  }

  private outcome(): SyncOutcome {
    const { phase, mode, lastError } = this.state;
    const error = lastError ? { error: lastError.message } : {};

    if (phase === "SyncBlocked") {
      return { status: "blocked", phase, ...error };
    }
    if (mode !== "remote") {
      return { status: "local", phase, ...error };
    }
    if (phase === "PendingRetry" || this.state.pendingChanges > 0) {
      return { status: "pending", phase, ...error };
    }
    return { status: "synced", phase };
  }
}

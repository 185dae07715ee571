/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setRepository(flag) / setRemote(flag): shape the repository
 * - setPullFailure(failure) / setPushFailure(failure): inject network,
 *   timeout or conflict failures
 * - onPull(hook): run code when a pull happens (simulate a remote edit)
 * - markDirty(): pretend the work directory has changes nobody staged
 * - commits / pushedCommits: what the engine produced
 *
 * @module git/memory
 */

import type { IGitModule } from '../git_module';
import type { NetworkOptions } from '../types';
import {
  GitCommandError,
  GitTimeoutError,
  RebaseConflictError,
  RebaseNotInProgressError,
} from '../errors';

export type InjectedFailure =
  | { kind: 'network'; message?: string }
  | { kind: 'timeout' }
  | { kind: 'conflict'; files: string[] };

export type MemoryCommit = {
  hash: string;
  message: string;
};

export class MemoryGitModule implements IGitModule {
  private repository: boolean;
  private remote: boolean;
  private dirty = false;
  private staged = false;
  private rebaseInProgress = false;
  private conflictedFiles: string[] = [];
  private pullFailure: InjectedFailure | null = null;
  private pushFailure: InjectedFailure | null = null;
  private pullHook: (() => void | Promise<void>) | null = null;
  private pushedCount = 0;

  readonly commits: MemoryCommit[] = [];
  readonly calls: string[] = [];

  constructor(options: { repository?: boolean; remote?: boolean } = {}) {
    this.repository = options.repository ?? true;
    this.remote = options.remote ?? true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setRepository(flag: boolean): void {
    this.repository = flag;
  }

  setRemote(flag: boolean): void {
    this.remote = flag;
  }

  setPullFailure(failure: InjectedFailure | null): void {
    this.pullFailure = failure;
  }

  setPushFailure(failure: InjectedFailure | null): void {
    this.pushFailure = failure;
  }

  onPull(hook: (() => void | Promise<void>) | null): void {
    this.pullHook = hook;
  }

  markDirty(): void {
    this.dirty = true;
  }

  get pushedCommits(): MemoryCommit[] {
    return this.commits.slice(0, this.pushedCount);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    return this.repository;
  }

  async init(): Promise<void> {
    this.calls.push('init');
    this.repository = true;
  }

  async hasRemote(): Promise<boolean> {
    return this.repository && this.remote;
  }

  async pullRebase(_options?: NetworkOptions): Promise<void> {
    this.calls.push('pull');
    this.raise(this.pullFailure, 'pull', true);
    if (this.pullHook) {
      await this.pullHook();
    }
  }

  async rebaseAbort(): Promise<void> {
    this.calls.push('rebase-abort');
    if (!this.rebaseInProgress) {
      throw new RebaseNotInProgressError();
    }
    this.rebaseInProgress = false;
    this.conflictedFiles = [];
  }

  async isRebaseInProgress(): Promise<boolean> {
    return this.rebaseInProgress;
  }

  async getConflictedFiles(): Promise<string[]> {
    return [...this.conflictedFiles];
  }

  async stageAll(): Promise<void> {
    this.calls.push('add');
    this.staged = true;
    this.dirty = false;
  }

  async commit(message: string): Promise<string | null> {
    this.calls.push('commit');
    if (!this.staged) {
      return null;
    }
    this.staged = false;
    const hash = (this.commits.length + 1).toString(16).padStart(40, '0');
    this.commits.push({ hash, message });
    return hash;
  }

  async push(_options?: NetworkOptions): Promise<void> {
    this.calls.push('push');
    this.raise(this.pushFailure, 'push', false);
    this.pushedCount = this.commits.length;
  }

  async countUnpushedCommits(): Promise<number> {
    return this.commits.length - this.pushedCount;
  }

  async hasUncommittedChanges(): Promise<boolean> {
    return this.dirty || this.staged;
  }

  private raise(failure: InjectedFailure | null, command: string, canConflict: boolean): void {
    if (!failure) return;
    switch (failure.kind) {
      case 'network':
        throw new GitCommandError(`Failed to ${command}`, failure.message ?? 'Could not resolve host: remote', command);
      case 'timeout':
        throw new GitTimeoutError(command, 15000);
      case 'conflict':
        if (!canConflict) {
          throw new GitCommandError(`Failed to ${command}`, 'rejected: non-fast-forward', command);
        }
        this.rebaseInProgress = true;
        this.conflictedFiles = [...failure.files];
        throw new RebaseConflictError(failure.files);
    }
  }
}

import type { NetworkOptions } from './types';

/**
 * IGitModule - the git operations the sync engine needs, scoped to the
 * data directory.
 */
export interface IGitModule {
  /** True when the work directory is inside a git repository. */
  isRepository(): Promise<boolean>;

  /** `git init` in the work directory. */
  init(): Promise<void>;

  /** True when at least one remote is configured. */
  hasRemote(): Promise<boolean>;

  /**
   * `git pull --rebase --autostash` against the upstream branch.
   * Does nothing when the current branch has no upstream yet.
   * @throws RebaseConflictError when the rebase stops on a conflict
   * @throws GitTimeoutError when the step exceeds `timeoutMs`
   * @throws GitCommandError for any other failure (network, auth, ...)
   */
  pullRebase(options?: NetworkOptions): Promise<void>;

  /** `git rebase --abort`: back to the state before the pull. */
  rebaseAbort(): Promise<void>;

  isRebaseInProgress(): Promise<boolean>;

  getConflictedFiles(): Promise<string[]>;

  /** Stages every change (additions, edits, removals) under the work directory. */
  stageAll(): Promise<void>;

  /**
   * Commits staged changes under the work directory.
   * @returns the new commit hash, or null when there was nothing to commit
   */
  commit(message: string): Promise<string | null>;

  /** Pushes HEAD, setting the upstream on the first push. */
  push(options?: NetworkOptions): Promise<void>;

  /** Commits on HEAD that the upstream does not have. */
  countUnpushedCommits(): Promise<number>;

  hasUncommittedChanges(): Promise<boolean>;
}

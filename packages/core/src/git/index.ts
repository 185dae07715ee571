/**
 * Git operations scoped to the data directory.
 *
 * @module git
 */

export type { IGitModule } from './git_module';
export { LocalGitModule } from './local/local_git_module';
export { createExecCommand } from './local/exec_command';
export { MemoryGitModule } from './memory/memory_git_module';
export type { InjectedFailure, MemoryCommit } from './memory/memory_git_module';

export type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  GitModuleDependencies,
  NetworkOptions,
} from './types';

export {
  GitError,
  GitCommandError,
  GitTimeoutError,
  RebaseConflictError,
  RebaseNotInProgressError,
} from './errors';

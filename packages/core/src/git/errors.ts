/**
 * Custom Error Classes for the git module
 */
import { TaskdeckError } from '../validation/errors';

/**
 * Base error class for all Git-related errors
 */
export class GitError extends TaskdeckError {
  constructor(message: string) {
    super(message, 'GIT_ERROR');
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string | undefined;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string, stdout?: string) {
    super(stderr.trim() ? `${message}: ${stderr.trim()}` : message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a command is killed by its timeout
 */
export class GitTimeoutError extends GitError {
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`git ${command} timed out after ${timeoutMs}ms`);
    this.name = 'GitTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, GitTimeoutError.prototype);
  }
}

/**
 * Error thrown when a rebase conflict occurs
 */
export class RebaseConflictError extends GitError {
  public readonly conflictedFiles: string[];

  constructor(conflictedFiles: string[]) {
    super(`Rebase conflict detected in ${conflictedFiles.length} file(s)`);
    this.name = 'RebaseConflictError';
    this.conflictedFiles = conflictedFiles;
    Object.setPrototypeOf(this, RebaseConflictError.prototype);
  }
}

/**
 * Error thrown when trying to abort a rebase that is not in progress
 */
export class RebaseNotInProgressError extends GitError {
  constructor() {
    super('No rebase in progress');
    this.name = 'RebaseNotInProgressError';
    Object.setPrototypeOf(this, RebaseNotInProgressError.prototype);
  }
}

/**
 * Local Git Module - CLI-based implementation
 *
 * Runs the git CLI through an injected execCommand, always from the data
 * directory and always limited to it (`-- .`), so a data directory that
 * sits inside a larger repository only ever commits its own files.
 *
 * @module git/local
 */

import * as fs from 'fs';
import * as path from 'path';
import type { IGitModule } from '../git_module';
import type { ExecCommand, ExecOptions, ExecResult, GitModuleDependencies, NetworkOptions } from '../types';
import {
  GitCommandError,
  GitTimeoutError,
  RebaseConflictError,
  RebaseNotInProgressError,
} from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('[GitModule] ');

const CONFLICT_MARKERS = [
  'CONFLICT',
  'could not apply',
  'Resolve all conflicts',
  'fix conflicts',
  'Applying autostash resulted in conflicts',
];

const NOTHING_TO_COMMIT_MARKERS = ['nothing to commit', 'no changes added to commit', 'nothing added to commit'];

/**
 * LocalGitModule class providing the git operations of IGitModule
 */
export class LocalGitModule implements IGitModule {
  private readonly workDir: string;
  private readonly execCommand: ExecCommand;

  constructor(dependencies: GitModuleDependencies) {
    this.workDir = dependencies.workDir;
    this.execCommand = dependencies.execCommand;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const result = await this.execCommand('git', args, { ...options, cwd: this.workDir });
    if (result.timedOut) {
      throw new GitTimeoutError(args[0] ?? 'command', options?.timeout ?? 0);
    }
    return result;
  }

  private async getUpstream(): Promise<string | null> {
    const result = await this.execGit(['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}']);
    return result.exitCode === 0 ? result.stdout.trim() : null;
  }

  private async getGitDir(): Promise<string> {
    const result = await this.execGit(['rev-parse', '--absolute-git-dir']);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Not in a Git repository', result.stderr, 'rev-parse');
    }
    return result.stdout.trim();
  }

  private async getFirstRemote(): Promise<string | null> {
    const result = await this.execGit(['remote']);
    if (result.exitCode !== 0) return null;
    const remotes = result.stdout.split('\n').map((r) => r.trim()).filter(Boolean);
    return remotes.includes('origin') ? 'origin' : remotes[0] ?? null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY STATE
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--git-dir']);
    return result.exitCode === 0;
  }

  async init(): Promise<void> {
    const result = await this.execGit(['init']);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to initialize Git repository', result.stderr, 'init');
    }
    logger.info(`Initialized git repository in ${this.workDir}`);
  }

  async hasRemote(): Promise<boolean> {
    return (await this.getFirstRemote()) !== null;
  }

  async isRebaseInProgress(): Promise<boolean> {
    const gitDir = await this.getGitDir();
    return fs.existsSync(path.join(gitDir, 'rebase-merge')) || fs.existsSync(path.join(gitDir, 'rebase-apply'));
  }

  async getConflictedFiles(): Promise<string[]> {
    const result = await this.execGit(['diff', '--name-only', '--diff-filter=U']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to get conflicted files', result.stderr, 'diff');
    }

    return result.stdout.split('\n').map((f) => f.trim()).filter(Boolean);
  }

  async hasUncommittedChanges(): Promise<boolean> {
    const result = await this.execGit(['status', '--porcelain', '--', '.']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to check for uncommitted changes', result.stderr, 'status');
    }

    return result.stdout.trim().length > 0;
  }

  async countUnpushedCommits(): Promise<number> {
    const upstream = await this.getUpstream();
    const range = upstream ? ['@{u}..HEAD'] : ['HEAD'];
    const result = await this.execGit(['rev-list', '--count', ...range]);
    // An empty repository has no HEAD yet.
    if (result.exitCode !== 0) return 0;
    const count = Number.parseInt(result.stdout.trim(), 10);
    return Number.isNaN(count) ? 0 : count;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SYNC OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async pullRebase(options: NetworkOptions = {}): Promise<void> {
    const upstream = await this.getUpstream();
    if (!upstream) {
      logger.debug('No upstream branch yet; skipping pull');
      return;
    }

    const timeout = options.timeoutMs;
    const result = await this.execGit(
      ['pull', '--rebase', '--autostash'],
      timeout !== undefined ? { timeout, env: { GIT_TERMINAL_PROMPT: '0' } } : { env: { GIT_TERMINAL_PROMPT: '0' } },
    );

    if (result.exitCode !== 0) {
      const output = result.stdout + result.stderr;
      if (CONFLICT_MARKERS.some((marker) => output.includes(marker)) || (await this.isRebaseInProgress())) {
        const conflictedFiles = await this.getConflictedFiles();
        throw new RebaseConflictError(conflictedFiles);
      }
      throw new GitCommandError(`Failed to pull --rebase from ${upstream}`, result.stderr, 'pull', result.stdout);
    }
  }

  async rebaseAbort(): Promise<void> {
    if (!(await this.isRebaseInProgress())) {
      throw new RebaseNotInProgressError();
    }

    const result = await this.execGit(['rebase', '--abort']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to abort rebase', result.stderr, 'rebase');
    }
  }

  async stageAll(): Promise<void> {
    const result = await this.execGit(['add', '--all', '--', '.']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to add files', result.stderr, 'add');
    }
  }

  async commit(message: string): Promise<string | null> {
    const result = await this.execGit(['commit', '-m', message, '--', '.']);

    if (result.exitCode !== 0) {
      const output = result.stdout + result.stderr;
      if (NOTHING_TO_COMMIT_MARKERS.some((marker) => output.includes(marker))) {
        return null;
      }
      throw new GitCommandError('Failed to commit', result.stderr, 'commit', result.stdout);
    }

    const head = await this.execGit(['rev-parse', 'HEAD']);
    return head.exitCode === 0 ? head.stdout.trim() : null;
  }

  async push(options: NetworkOptions = {}): Promise<void> {
    const upstream = await this.getUpstream();
    let args = ['push'];
    if (!upstream) {
      const remote = await this.getFirstRemote();
      if (!remote) {
        throw new GitCommandError('No remote configured', '', 'push');
      }
      args = ['push', '--set-upstream', remote, 'HEAD'];
    }

    const env = { GIT_TERMINAL_PROMPT: '0' };
    const result = await this.execGit(
      args,
      options.timeoutMs !== undefined ? { timeout: options.timeoutMs, env } : { env },
    );

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to push', result.stderr, 'push', result.stdout);
    }
  }
}

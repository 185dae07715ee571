/**
 * Type Definitions for the git module
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds; the process is killed when it expires */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
  /** Set when the command was killed by the timeout */
  timedOut?: boolean;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions,
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Directory the commands run in: the data directory */
  workDir: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

/** Per-call options for network-bound operations. */
export type NetworkOptions = {
  timeoutMs?: number;
};

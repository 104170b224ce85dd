/**
 * Type Definitions for the version-control capability
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
  /** Text written to the command's standard input */
  input?: string;
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
  /** Set when the command was killed for exceeding its timeout */
  timedOut?: boolean;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Path to the repository (or worktree) the module operates on */
  repoRoot: string;
  /** Function to execute shell commands */
  execCommand: ExecCommand;
  /** Timeout applied to every git invocation */
  timeoutMs?: number;
};

export type FetchOptions = {
  /** Fetch tags as well (default: git's own behaviour) */
  tags?: boolean;
};

export type CommitOptions = {
  /** Allow a commit that records no changes */
  allowEmpty?: boolean;
};

export type AddWorktreeOptions = {
  /** Create `branch` starting at this ref; omit to check out an existing branch */
  startRef?: string;
};

/**
 * Captured output of a push
 */
export type PushResult = {
  stdout: string;
  stderr: string;
};

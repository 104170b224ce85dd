/**
 * Custom Error Classes for the git capability
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
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
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }

  /** Message plus the tool's own output, as shown to humans */
  get diagnostic(): string {
    return [this.message, this.stdout, this.stderr]
      .map((part) => part?.trim())
      .filter((part): part is string => Boolean(part))
      .join('\n');
  }
}

/**
 * Error thrown when a Git command exceeds its timeout
 */
export class GitTimeoutError extends GitCommandError {
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`git ${command} timed out after ${timeoutMs}ms`, '', command);
    this.name = 'GitTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, GitTimeoutError.prototype);
  }
}

/**
 * Error thrown when a commit cannot be resolved
 */
export class CommitNotFoundError extends GitError {
  public readonly commit: string;

  constructor(commit: string) {
    super(`Commit not found: ${commit}`);
    this.name = 'CommitNotFoundError';
    this.commit = commit;
    Object.setPrototypeOf(this, CommitNotFoundError.prototype);
  }
}

/**
 * Error thrown when a build-tool command fails
 */
export class BuildToolError extends Error {
  public readonly command: string;
  public readonly stderr: string;
  public readonly exitCode: number | null;

  constructor(message: string, command: string, stderr: string = '', exitCode: number | null = null) {
    super(message);
    this.name = 'BuildToolError';
    this.command = command;
    this.stderr = stderr;
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, BuildToolError.prototype);
  }

  /** Message followed by the command's error output */
  get diagnostic(): string {
    return [this.message, this.stderr.trim()].filter(Boolean).join('\n');
  }
}

/**
 * Error thrown when a build-tool command exceeds its timeout
 */
export class BuildToolTimeoutError extends BuildToolError {
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`${command} timed out after ${timeoutMs}ms`, command);
    this.name = 'BuildToolTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, BuildToolTimeoutError.prototype);
  }
}

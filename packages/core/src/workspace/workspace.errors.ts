/**
 * Error thrown when a workspace cannot be created or removed
 */
export class WorkspaceError extends Error {
  constructor(
    public reason: string,
    public repository: string,
    public workspacePath: string,
    public underlyingError?: Error,
  ) {
    super(
      `${reason} for ${repository} at ${workspacePath}`
      + (underlyingError ? `: ${underlyingError.message}` : '')
    );
    this.name = 'WorkspaceError';
    Object.setPrototypeOf(this, WorkspaceError.prototype);
  }
}

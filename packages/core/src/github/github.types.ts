/**
 * Shared types for the GitHub forge client.
 */

/**
 * Error codes for GitHub API errors.
 * Semantic codes that abstract HTTP status codes.
 */
export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR';

/**
 * Typed error for GitHub API operations.
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

export type CommitStatusState = 'error' | 'failure' | 'pending' | 'success';

/**
 * The slice of Octokit the forge uses. An `Octokit` instance satisfies it.
 */
export type GitHubForgeClient = {
  rest: {
    pulls: {
      get(params: { owner: string; repo: string; pull_number: number }): Promise<{
        data: { number: number; title: string; body: string | null; head: { sha: string } };
      }>;
    };
    repos: {
      listPullRequestsAssociatedWithCommit(params: { owner: string; repo: string; commit_sha: string }): Promise<{
        data: Array<{ number: number; state: string }>;
      }>;
      createCommitStatus(params: {
        owner: string;
        repo: string;
        sha: string;
        state: CommitStatusState;
        context?: string;
        description?: string;
        target_url?: string;
      }): Promise<unknown>;
    };
  };
};

export type GitHubForgeOptions = {
  owner: string;
  repo: string;
};

/**
 * A change request as the sync engine needs it, plus its head revision
 */
export type PullRequestInfo = {
  changeRequestId: number;
  title: string;
  body: string;
  headSha: string;
};

export type CommitStatus = {
  sha: string;
  state: CommitStatusState;
  context: string;
  description?: string;
  targetUrl?: string;
};

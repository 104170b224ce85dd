import type {
  CommitStatus,
  GitHubForgeClient,
  GitHubForgeOptions,
  PullRequestInfo,
} from './github.types';
import { GitHubApiError } from './github.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && isRecord(error) && typeof error['status'] === 'number';
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError.
 */
export function mapOctokitError(error: unknown, context: string): GitHubApiError {
  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409 || status === 422) {
      return new GitHubApiError(`Conflict: ${context}`, 'CONFLICT', status);
    }
    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${message}`, 'NETWORK_ERROR');
}

/**
 * GitHubForge - change-request metadata and commit statuses on GitHub.
 *
 * Receives an `Octokit` instance for testability and shared auth config.
 *
 * @example
 * const forge = new GitHubForge({ owner: 'w3c', repo: 'web-platform-tests' }, new Octokit({ auth }));
 * const pr = await forge.getPullRequest(9);
 */
export class GitHubForge {
  private readonly owner: string;
  private readonly repo: string;
  private readonly octokit: GitHubForgeClient;

  constructor(options: GitHubForgeOptions, octokit: GitHubForgeClient) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.octokit = octokit;
  }

  async getPullRequest(changeRequestId: number): Promise<PullRequestInfo> {
    const context = `pull request #${changeRequestId} in ${this.owner}/${this.repo}`;
    let data: Awaited<ReturnType<GitHubForgeClient['rest']['pulls']['get']>>['data'];
    try {
      ({ data } = await this.octokit.rest.pulls.get({
        owner: this.owner,
        repo: this.repo,
        pull_number: changeRequestId,
      }));
    } catch (error) {
      throw mapOctokitError(error, context);
    }

    return {
      changeRequestId: data.number,
      title: data.title,
      body: data.body ?? '',
      headSha: data.head.sha,
    };
  }

  /** Open pull requests whose commits include `sha` */
  async openPullRequestsForCommit(sha: string): Promise<number[]> {
    try {
      const { data } = await this.octokit.rest.repos.listPullRequestsAssociatedWithCommit({
        owner: this.owner,
        repo: this.repo,
        commit_sha: sha,
      });
      return data.filter((pr) => pr.state === 'open').map((pr) => pr.number);
    } catch (error) {
      throw mapOctokitError(error, `pull requests for ${sha}`);
    }
  }

  async postStatus(status: CommitStatus): Promise<void> {
    try {
      await this.octokit.rest.repos.createCommitStatus({
        owner: this.owner,
        repo: this.repo,
        sha: status.sha,
        state: status.state,
        context: status.context,
        ...(status.description !== undefined && { description: status.description }),
        ...(status.targetUrl !== undefined && { target_url: status.targetUrl }),
      });
    } catch (error) {
      throw mapOctokitError(error, `status ${status.context} on ${status.sha}`);
    }
  }
}

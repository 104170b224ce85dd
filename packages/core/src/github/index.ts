/**
 * GitHub forge client
 */
export { GitHubForge, mapOctokitError, isOctokitRequestError } from './github_forge';
export { GitHubApiError } from './github.types';
export type {
  CommitStatus,
  CommitStatusState,
  GitHubApiErrorCode,
  GitHubForgeClient,
  GitHubForgeOptions,
  PullRequestInfo,
} from './github.types';

/**
 * Network clients for @wpt-sync/core/github
 *
 * Each client receives its transport (an `Octokit` instance, a `fetch`
 * function) for testability and shared auth configuration.
 */

export type { Octokit } from '@octokit/rest';

// Forge
export {
  GitHubForge,
  GitHubApiError,
  mapOctokitError,
  isOctokitRequestError,
} from './github/index';
export type {
  CommitStatus,
  CommitStatusState,
  GitHubApiErrorCode,
  GitHubForgeClient,
  GitHubForgeOptions,
  PullRequestInfo,
} from './github/index';

// Tracker
export { BugzillaTracker } from './tracker/bugzilla';
export type { BugzillaTrackerOptions } from './tracker/bugzilla';

// Webhooks
export { GithubWebhookHandler } from './webhook';
export type { WebhookPayload, WebhookResult } from './webhook';

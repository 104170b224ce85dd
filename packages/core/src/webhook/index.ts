export { GithubWebhookHandler } from './github_webhook';
export type {
  GithubWebhookOptions,
  WebhookPayload,
  WebhookResult,
} from './github_webhook.types';

/**
 * Types for GithubWebhookHandler.
 *
 * @module webhook
 */

import type { ChangeRequestEvent, StatusEvent } from '../events';

/**
 * Configuration for GithubWebhookHandler.
 */
export type GithubWebhookOptions = {
  /** Webhook secret for HMAC-SHA256 signature verification */
  secret: string;
};

/**
 * Input data extracted from the HTTP request by the consumer.
 * The consumer is responsible for extracting these fields from
 * the framework-specific Request object.
 */
export type WebhookPayload = {
  /** Value of x-hub-signature-256 header (e.g., 'sha256=abc123...') */
  signature: string;
  /** Value of x-github-event header (e.g., 'pull_request', 'status', 'ping') */
  event: string;
  /** Value of x-github-delivery header (unique delivery UUID) */
  deliveryId: string;
  /** Raw JSON body as string (needed for HMAC verification) */
  rawBody: string;
};

/**
 * Decision returned by the webhook handler.
 * The consumer acts on this decision; the handler never runs a sync.
 */
export type WebhookResult =
  | {
      /** A change request was opened: record a new sync */
      action: 'intake';
      event: ChangeRequestEvent;
      reason: string;
      deliveryId: string;
    }
  | {
      /** CI reported on a revision: hand it to the status reactor */
      action: 'status';
      event: StatusEvent;
      reason: string;
      deliveryId: string;
    }
  | {
      action: 'ignore' | 'error';
      /** Human-readable reason (for logging) */
      reason: string;
      /** Delivery ID echoed back (for correlation) */
      deliveryId: string;
    };

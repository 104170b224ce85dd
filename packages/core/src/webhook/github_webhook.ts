/**
 * GithubWebhookHandler - GitHub webhook processor for downstream syncs.
 *
 * Pure logic module that verifies HMAC-SHA256 signatures of GitHub
 * deliveries and turns `pull_request` and `status` payloads into typed
 * decisions for the orchestrator and the status reactor.
 *
 * @module webhook
 */

import crypto from 'crypto';
import { parseChangeRequestEvent, parseStatusEvent } from '../events';
import { SchemaValidationError } from '../validation';
import type {
  GithubWebhookOptions,
  WebhookPayload,
  WebhookResult,
} from './github_webhook.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * GithubWebhookHandler - Processes GitHub webhook deliveries.
 *
 * Framework-agnostic: receives extracted payload data, returns a decision.
 * Never throws; all error paths return WebhookResult with action: 'error'.
 */
export class GithubWebhookHandler {
  private readonly secret: string;

  constructor(options: GithubWebhookOptions) {
    this.secret = options.secret;
  }

  /**
   * Process a GitHub webhook delivery.
   * Returns a decision (intake/status/ignore/error) and never throws.
   */
  handle(payload: WebhookPayload): WebhookResult {
    const { deliveryId } = payload;

    if (!this.verifySignature(payload.rawBody, payload.signature)) {
      return { action: 'error', reason: 'Invalid signature', deliveryId };
    }

    if (payload.event === 'ping') {
      return { action: 'ignore', reason: 'Ping event', deliveryId };
    }

    if (payload.event !== 'pull_request' && payload.event !== 'status') {
      return { action: 'ignore', reason: `Unsupported event: ${payload.event}`, deliveryId };
    }

    let body: unknown;
    try {
      body = JSON.parse(payload.rawBody);
    } catch {
      return { action: 'error', reason: 'Invalid JSON payload', deliveryId };
    }
    if (!isRecord(body)) {
      return { action: 'error', reason: 'Invalid JSON payload', deliveryId };
    }

    try {
      return payload.event === 'pull_request'
        ? this.pullRequest(body, deliveryId)
        : this.status(body, deliveryId);
    } catch (error) {
      if (error instanceof SchemaValidationError) {
        return { action: 'error', reason: `Malformed ${payload.event} event: ${error.message}`, deliveryId };
      }
      return {
        action: 'error',
        reason: error instanceof Error ? error.message : String(error),
        deliveryId,
      };
    }
  }

  private pullRequest(body: Record<string, unknown>, deliveryId: string): WebhookResult {
    if (body['action'] !== 'opened') {
      return { action: 'ignore', reason: `Unhandled pull_request action: ${String(body['action'])}`, deliveryId };
    }
    const pullRequest = isRecord(body['pull_request']) ? body['pull_request'] : {};
    const event = parseChangeRequestEvent({
      changeRequestId: pullRequest['number'],
      title: pullRequest['title'],
      // GitHub sends null for an empty description
      body: pullRequest['body'] ?? '',
    });
    return {
      action: 'intake',
      event,
      reason: `PR ${event.changeRequestId} opened`,
      deliveryId,
    };
  }

  private status(body: Record<string, unknown>, deliveryId: string): WebhookResult {
    const event = parseStatusEvent({
      context: body['context'],
      state: body['state'],
      sha: body['sha'],
    });
    return {
      action: 'status',
      event,
      reason: `${event.state} status for ${event.sha}`,
      deliveryId,
    };
  }

  /**
   * Verify HMAC-SHA256 signature using constant-time comparison.
   */
  private verifySignature(rawBody: string, signature: string): boolean {
    if (!signature) {
      return false;
    }

    // Expect format: sha256=<hex>
    const prefix = 'sha256=';
    if (!signature.startsWith(prefix)) {
      return false;
    }

    const receivedHex = signature.slice(prefix.length);
    const expectedHex = crypto
      .createHmac('sha256', this.secret)
      .update(rawBody, 'utf8')
      .digest('hex');

    const receivedBuf = Buffer.from(receivedHex, 'hex');
    const expectedBuf = Buffer.from(expectedHex, 'hex');

    if (receivedBuf.length !== expectedBuf.length) {
      return false;
    }

    return crypto.timingSafeEqual(receivedBuf, expectedBuf);
  }
}

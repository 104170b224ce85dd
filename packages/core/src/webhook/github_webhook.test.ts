import crypto from 'crypto';
import { GithubWebhookHandler } from './github_webhook';
import type { WebhookPayload } from './github_webhook.types';

const TEST_SECRET = 'test-secret';
const SHA = 'a000000000000000000000000000000000000002';

function sign(body: string, secret: string = TEST_SECRET): string {
  const hmac = crypto.createHmac('sha256', secret).update(body, 'utf8').digest('hex');
  return `sha256=${hmac}`;
}

function makePayload(event: string, body: unknown, overrides: Partial<WebhookPayload> = {}): WebhookPayload {
  const rawBody = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    signature: sign(rawBody),
    event,
    deliveryId: 'delivery-001',
    rawBody,
    ...overrides,
  };
}

function pullRequestBody(action: string = 'opened', body: string | null = 'blah blah body') {
  return {
    action,
    number: 9,
    pull_request: { number: 9, title: 'Test PR', body, head: { sha: SHA } },
  };
}

describe('GithubWebhookHandler', () => {
  let handler: GithubWebhookHandler;

  beforeEach(() => {
    handler = new GithubWebhookHandler({ secret: TEST_SECRET });
  });

  // ─────────────────────────────────────────────────────────
  // Signature verification
  // ─────────────────────────────────────────────────────────

  describe('signature verification', () => {
    it('should reject a signature made with another secret', () => {
      const payload = makePayload('pull_request', pullRequestBody());

      const result = handler.handle({ ...payload, signature: sign(payload.rawBody, 'other-secret') });

      expect(result).toEqual({ action: 'error', reason: 'Invalid signature', deliveryId: 'delivery-001' });
    });

    it('should reject missing and wrongly prefixed signatures', () => {
      const body = pullRequestBody();

      expect(handler.handle(makePayload('pull_request', body, { signature: '' })).reason).toBe('Invalid signature');
      expect(handler.handle(makePayload('pull_request', body, { signature: 'sha1=abcdef' })).reason).toBe('Invalid signature');
    });

    it('should reject a body changed after signing', () => {
      const payload = makePayload('pull_request', pullRequestBody());

      const result = handler.handle({ ...payload, rawBody: payload.rawBody.replace('Test PR', 'Other PR') });

      expect(result.action).toBe('error');
    });

    it('should compare signatures in constant time', () => {
      const spy = jest.spyOn(crypto, 'timingSafeEqual');

      handler.handle(makePayload('pull_request', pullRequestBody()));

      expect(spy).toHaveBeenCalledTimes(1);
      spy.mockRestore();
    });
  });

  // ─────────────────────────────────────────────────────────
  // Event filtering
  // ─────────────────────────────────────────────────────────

  describe('event filtering', () => {
    it('should ignore ping events', () => {
      expect(handler.handle(makePayload('ping', { zen: 'Keep it simple.' }))).toEqual({
        action: 'ignore',
        reason: 'Ping event',
        deliveryId: 'delivery-001',
      });
    });

    it('should ignore unsupported events', () => {
      expect(handler.handle(makePayload('push', { ref: 'refs/heads/master' })).reason)
        .toBe('Unsupported event: push');
    });

    it('should ignore pull request actions other than opened', () => {
      expect(handler.handle(makePayload('pull_request', pullRequestBody('synchronize'))).reason)
        .toBe('Unhandled pull_request action: synchronize');
    });
  });

  // ─────────────────────────────────────────────────────────
  // Decisions
  // ─────────────────────────────────────────────────────────

  describe('decisions', () => {
    it('should turn an opened pull request into an intake decision', () => {
      expect(handler.handle(makePayload('pull_request', pullRequestBody()))).toEqual({
        action: 'intake',
        event: { changeRequestId: 9, title: 'Test PR', body: 'blah blah body' },
        reason: 'PR 9 opened',
        deliveryId: 'delivery-001',
      });
    });

    it('should treat a missing description as an empty body', () => {
      const result = handler.handle(makePayload('pull_request', pullRequestBody('opened', null)));

      expect(result.action === 'intake' && result.event.body).toBe('');
    });

    it('should turn a status into a status decision', () => {
      const body = {
        sha: SHA,
        state: 'pending',
        context: 'continuous-integration/travis-ci/pr',
        target_url: 'https://ci.example.test/builds/1',
      };

      expect(handler.handle(makePayload('status', body))).toEqual({
        action: 'status',
        event: { sha: SHA, state: 'pending', context: 'continuous-integration/travis-ci/pr' },
        reason: `pending status for ${SHA}`,
        deliveryId: 'delivery-001',
      });
    });
  });

  // ─────────────────────────────────────────────────────────
  // Malformed deliveries
  // ─────────────────────────────────────────────────────────

  describe('malformed deliveries', () => {
    it('should report invalid JSON', () => {
      expect(handler.handle(makePayload('status', '{not json')).reason).toBe('Invalid JSON payload');
    });

    it('should report a JSON body that is not an object', () => {
      expect(handler.handle(makePayload('status', '[1, 2]')).reason).toBe('Invalid JSON payload');
    });

    it('should report a pull request without a number', () => {
      const result = handler.handle(makePayload('pull_request', {
        action: 'opened',
        pull_request: { title: 'Test PR', body: '' },
      }));

      expect(result).toEqual({
        action: 'error',
        reason: "Malformed pull_request event: Invalid change_request_event: /: must have required property 'changeRequestId'",
        deliveryId: 'delivery-001',
      });
    });

    it('should report a status with an invalid sha', () => {
      const result = handler.handle(makePayload('status', { sha: 'HEAD', state: 'pending', context: 'ci' }));

      expect(result.action).toBe('error');
      expect(result.reason).toBe('Malformed status event: Invalid status_event: /sha: must match pattern "^[0-9a-f]{7,40}$"');
    });
  });
});

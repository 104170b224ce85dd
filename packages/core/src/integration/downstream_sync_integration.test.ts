/**
 * Downstream sync, end to end over in-memory collaborators: a pull request
 * is opened, CI reports it pending, and the same report arrives again.
 */

import crypto from 'crypto';
import { GithubWebhookHandler } from '../webhook';
import type { WebhookPayload } from '../webhook';
import {
  CENTRAL_SHA,
  createMemoryEngine,
  fileDiff,
  regenerationChangesMetadata,
  servePullRequest,
} from './memory_engine.helpers';
import type { MemoryEngine } from './memory_engine.helpers';

const TEST_SECRET = 'test-secret';
const HEAD_SHA = 'd000000000000000000000000000000000000002';

function delivery(event: string, body: unknown, deliveryId: string): WebhookPayload {
  const rawBody = JSON.stringify(body);
  const signature = `sha256=${crypto.createHmac('sha256', TEST_SECRET).update(rawBody, 'utf8').digest('hex')}`;
  return { signature, event, deliveryId, rawBody };
}

describe('Downstream sync integration', () => {
  let engine: MemoryEngine;
  let webhook: GithubWebhookHandler;

  beforeEach(() => {
    engine = createMemoryEngine();
    webhook = new GithubWebhookHandler({ secret: TEST_SECRET });
    servePullRequest(engine, 9, [
      { hash: 'd000000000000000000000000000000000000001', message: 'Add css test', diff: fileDiff('css/a.html') },
      { hash: HEAD_SHA, message: 'Fix typo', diff: fileDiff('css/a.html') },
    ]);
    engine.buildTool.setFilesChanged(['css/a.html']);
    engine.buildTool.setClassificationReport('Core :: CSS Parsing and Computation\n  testing/web-platform/tests/css/a.html\n');
    regenerationChangesMetadata(engine);
  });

  it('should intake, port and route a pull request, then ignore the repeated status', async () => {
    // ─── PR opened ───
    const opened = webhook.handle(delivery('pull_request', {
      action: 'opened',
      number: 9,
      pull_request: { number: 9, title: 'Test PR', body: 'blah blah body' },
    }, 'delivery-1'));
    if (opened.action !== 'intake') {
      throw new Error(`Unexpected decision: ${opened.reason}`);
    }
    const intake = await engine.orchestrator.newSync(opened.event);
    if (intake.action !== 'created') {
      throw new Error(`Unexpected intake: ${intake.action}`);
    }
    expect(engine.tracker.getIssue('1')).toMatchObject({
      summary: '[wpt-sync] PR 9 - Test PR',
      body: 'blah blah body',
      product: 'Testing',
      component: 'web-platform-tests',
    });

    // ─── CI pending ───
    const status = delivery('status', {
      sha: HEAD_SHA,
      state: 'pending',
      context: 'continuous-integration/travis-ci/pr',
    }, 'delivery-2');
    const pending = webhook.handle(status);
    if (pending.action !== 'status') {
      throw new Error(`Unexpected decision: ${pending.reason}`);
    }

    const first = await engine.reactor.onStatus(intake.sync.id, pending.event);

    expect(first.action).toBe('updated');
    const history = engine.targetGit.getHistory('PR_9');
    expect(history[0]).toBe(CENTRAL_SHA);
    expect(history.slice(1).map((hash) => engine.targetGit.getCommitMessage(hash))).toEqual([
      'Add css test',
      'Fix typo',
      '[wpt-sync] downstream PR_9: update manifest',
    ]);
    expect(engine.tracker.getIssue('1')).toMatchObject({
      product: 'Core',
      component: 'CSS Parsing and Computation',
      comments: [],
    });

    // ─── Same status again ───
    const callsBefore = engine.upstreamGit.getCalls().length;
    const second = await engine.reactor.onStatus(intake.sync.id, pending.event);

    expect(second).toEqual({ action: 'up-to-date', reason: `Workspace PR_9 is at ${HEAD_SHA}` });
    expect(engine.upstreamGit.getCalls()).toHaveLength(callsBefore);
    expect(engine.targetGit.getHistory('PR_9')).toEqual(history);
  });

  it('should not file a second issue when the opened event is delivered twice', async () => {
    const body = { action: 'opened', number: 9, pull_request: { number: 9, title: 'Test PR', body: '' } };

    for (const id of ['delivery-1', 'delivery-1-retry']) {
      const decision = webhook.handle(delivery('pull_request', body, id));
      if (decision.action === 'intake') {
        await engine.orchestrator.newSync(decision.event);
      }
    }

    expect(engine.tracker.listIssues()).toHaveLength(1);
    expect(engine.store.snapshot().syncs).toHaveLength(1);
  });
});

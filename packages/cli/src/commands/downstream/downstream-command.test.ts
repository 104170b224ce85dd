// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '@wpt-sync/core';
import type { SyncStore } from '@wpt-sync/core';
import { GithubWebhookHandler } from '@wpt-sync/core/github';
import { MemoryGitModule } from '@wpt-sync/core/memory';
import { DownstreamCommand, TRY_STATUS_CONTEXT } from './downstream-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const HEAD_SHA = 'a000000000000000000000000000000000000002';
const TRY_REVISION = 'f000000000000000000000000000000000000001';

const sampleSync: SyncStore.SyncRecord = {
  id: 1,
  repository: 'web-platform-tests',
  changeRequestId: 9,
  direction: 'downstream',
  issueRef: '1',
  worktrees: { 'web-platform-tests': '/work/web-platform-tests/PR_9', gecko: '/work/gecko/PR_9' },
  createdAt: '2024-03-01T12:00:00.000Z',
  updatedAt: '2024-03-01T12:00:00.000Z',
};

// Mock console and process.exit at module level
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('DownstreamCommand', () => {
  let command: DownstreamCommand;
  let tx: { findSync: jest.Mock; listSyncs: jest.Mock };
  let engine: {
    config: {
      upstream: { remote: string; branch: string };
      ci: { context: string };
      try: { remote: string; resultsUrl: string };
    };
    store: { transaction: jest.Mock };
    workspaces: { find: jest.Mock };
    buildTool: { testsAffected: jest.Mock };
    orchestrator: {
      upstream: { name: string };
      target: { name: string };
      newSync: jest.Mock;
      cleanup: jest.Mock;
    };
    reactor: { onStatus: jest.Mock };
    logger: Logger.Logger;
  };
  let forge: { getPullRequest: jest.Mock; postStatus: jest.Mock; openPullRequestsForCommit: jest.Mock };
  let mockDependencyService: {
    configure: jest.Mock;
    getEngine: jest.Mock;
    getForge: jest.Mock;
    getWebhookHandler: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();

    tx = {
      findSync: jest.fn().mockResolvedValue(sampleSync),
      listSyncs: jest.fn().mockResolvedValue([sampleSync]),
    };
    engine = {
      config: {
        upstream: { remote: 'origin', branch: 'master' },
        ci: { context: 'continuous-integration/travis-ci/pr' },
        try: { remote: 'try', resultsUrl: 'https://treeherder.example.test/#/jobs?repo=try&revision=' },
      },
      store: { transaction: jest.fn((work: (t: typeof tx) => Promise<unknown>) => work(tx)) },
      workspaces: { find: jest.fn().mockResolvedValue(null) },
      buildTool: { testsAffected: jest.fn().mockResolvedValue('') },
      orchestrator: {
        upstream: { name: 'web-platform-tests' },
        target: { name: 'gecko' },
        newSync: jest.fn().mockResolvedValue({ action: 'created', sync: sampleSync }),
        cleanup: jest.fn().mockResolvedValue([]),
      },
      reactor: { onStatus: jest.fn() },
      logger: Logger.createLogger('[Test] '),
    };
    forge = {
      getPullRequest: jest.fn().mockResolvedValue({
        changeRequestId: 9,
        title: 'Test PR',
        body: 'blah blah body',
        headSha: HEAD_SHA,
      }),
      postStatus: jest.fn().mockResolvedValue(undefined),
      openPullRequestsForCommit: jest.fn().mockResolvedValue([9]),
    };
    mockDependencyService = {
      configure: jest.fn(),
      getEngine: jest.fn().mockResolvedValue(engine),
      getForge: jest.fn().mockResolvedValue(forge),
      getWebhookHandler: jest.fn().mockResolvedValue(new GithubWebhookHandler({ secret: 'test-secret' })),
    };

    // Set up mock BEFORE constructing command (BaseCommand reads DI on construction)
    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    command = new DownstreamCommand();
  });

  // ─────────────────────────────────────────────────────────
  // pr
  // ─────────────────────────────────────────────────────────

  describe('pr', () => {
    it('should record the PR fetched from GitHub', async () => {
      await command.executePr('9', { config: 'wpt-sync.test.yaml' });

      expect(mockDependencyService.configure).toHaveBeenCalledWith({
        configPath: 'wpt-sync.test.yaml',
        verbose: false,
        quiet: false,
      });
      expect(forge.getPullRequest).toHaveBeenCalledWith(9);
      expect(engine.orchestrator.newSync).toHaveBeenCalledWith({
        changeRequestId: 9,
        title: 'Test PR',
        body: 'blah blah body',
      });
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Sync 1 created for PR 9 (issue 1)');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should report a PR that is already tracked', async () => {
      engine.orchestrator.newSync.mockResolvedValue({ action: 'exists', sync: sampleSync });

      await command.executePr('9', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ PR 9 is already tracked by sync 1');
    });

    it('should fail with the intake message', async () => {
      engine.orchestrator.newSync.mockResolvedValue({
        action: 'error',
        kind: 'TrackerFailure',
        message: 'Recording PR 9 failed: create failed',
        issueRef: null,
      });

      await command.executePr('9', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Recording PR 9 failed: create failed');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should reject a PR number that is not a positive integer', async () => {
      await command.executePr('nine', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Invalid PR number: nine');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockDependencyService.getEngine).not.toHaveBeenCalled();
    });

    it('should reject a PR GitHub describes under another number', async () => {
      forge.getPullRequest.mockResolvedValue({ changeRequestId: 10, title: 'Other', body: '', headSha: HEAD_SHA });

      await command.executePr('9', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Payload describes PR 10, not PR 9');
      expect(engine.orchestrator.newSync).not.toHaveBeenCalled();
    });

    it('should print a JSON result', async () => {
      await command.executePr('9', { json: true });

      expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({
        success: true,
        data: { action: 'created', sync: sampleSync },
      }, null, 2));
    });
  });

  // ─────────────────────────────────────────────────────────
  // status
  // ─────────────────────────────────────────────────────────

  describe('status', () => {
    it('should hand the status to the reactor under the configured context', async () => {
      engine.reactor.onStatus.mockResolvedValue({
        action: 'up-to-date',
        reason: `Workspace PR_9 is at ${HEAD_SHA}`,
      });

      await command.executeStatus('9', { sha: HEAD_SHA, state: 'pending' });

      expect(tx.findSync).toHaveBeenCalledWith({
        repository: 'web-platform-tests',
        changeRequestId: 9,
        direction: 'downstream',
      });
      expect(engine.reactor.onStatus).toHaveBeenCalledWith(1, {
        context: 'continuous-integration/travis-ci/pr',
        state: 'pending',
        sha: HEAD_SHA,
      });
      expect(mockConsoleLog).toHaveBeenCalledWith(`✅ up-to-date: Workspace PR_9 is at ${HEAD_SHA}`);
    });

    it('should fail when the sync run failed', async () => {
      engine.reactor.onStatus.mockResolvedValue({
        action: 'updated',
        reason: 'Downstreaming from web-platform-tests failed because obtaining PR 9 failed:\nfetch failed',
        outcome: { success: false },
      });

      await command.executeStatus('9', { sha: HEAD_SHA, state: 'pending' });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Downstreaming from web-platform-tests failed because obtaining PR 9 failed:\nfetch failed'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should fail for a PR without a sync', async () => {
      tx.findSync.mockResolvedValue(null);

      await command.executeStatus('9', { sha: HEAD_SHA, state: 'pending' });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ No sync found for PR 9');
      expect(engine.reactor.onStatus).not.toHaveBeenCalled();
    });

    it('should reject a revision that is not a sha', async () => {
      await command.executeStatus('9', { sha: 'HEAD', state: 'pending' });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to handle status for PR 9: Invalid status_event: /sha: must match pattern "^[0-9a-f]{7,40}$"'
      );
    });
  });

  // ─────────────────────────────────────────────────────────
  // webhook
  // ─────────────────────────────────────────────────────────

  describe('webhook', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wpt-sync-webhook-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function delivery(event: string, body: object, secret: string = 'test-secret') {
      const rawBody = JSON.stringify(body);
      const bodyFile = path.join(dir, 'body.json');
      fs.writeFileSync(bodyFile, rawBody);
      const signature = `sha256=${crypto.createHmac('sha256', secret).update(rawBody, 'utf8').digest('hex')}`;
      return { bodyFile, options: { event, delivery: 'delivery-001', signature } };
    }

    const opened = {
      action: 'opened',
      pull_request: { number: 9, title: 'Test PR', body: 'blah blah body' },
    };
    const pendingStatus = { context: 'continuous-integration/travis-ci/pr', state: 'pending', sha: HEAD_SHA };

    it('should record the PR from an opened delivery', async () => {
      const { bodyFile, options } = delivery('pull_request', opened);

      await command.executeWebhook(bodyFile, options);

      expect(engine.orchestrator.newSync).toHaveBeenCalledWith({
        changeRequestId: 9,
        title: 'Test PR',
        body: 'blah blah body',
      });
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Sync 1 created for PR 9 (issue 1)');
    });

    it('should reject a delivery signed with another secret', async () => {
      const { bodyFile, options } = delivery('pull_request', opened, 'other-secret');

      await command.executeWebhook(bodyFile, options);

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Delivery delivery-001 rejected: Invalid signature');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(engine.orchestrator.newSync).not.toHaveBeenCalled();
    });

    it('should acknowledge ignored events', async () => {
      const { bodyFile, options } = delivery('ping', { zen: 'Keep it logically awesome.' });

      await command.executeWebhook(bodyFile, options);

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Ignored delivery delivery-001: Ping event');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should hand a status to the reactor for the PR containing the revision', async () => {
      engine.reactor.onStatus.mockResolvedValue({ action: 'updated', reason: 'Sync updated', outcome: { success: true } });
      const { bodyFile, options } = delivery('status', pendingStatus);

      await command.executeWebhook(bodyFile, options);

      expect(forge.openPullRequestsForCommit).toHaveBeenCalledWith(HEAD_SHA);
      expect(engine.reactor.onStatus).toHaveBeenCalledWith(1, pendingStatus);
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ updated: Sync updated');
    });

    it('should use the PR given on the command line for a status', async () => {
      engine.reactor.onStatus.mockResolvedValue({ action: 'up-to-date', reason: 'Workspace PR_9 is current' });
      const { bodyFile, options } = delivery('status', pendingStatus);

      await command.executeWebhook(bodyFile, { ...options, pr: '9' });

      expect(forge.openPullRequestsForCommit).not.toHaveBeenCalled();
      expect(tx.findSync).toHaveBeenCalledWith({
        repository: 'web-platform-tests',
        changeRequestId: 9,
        direction: 'downstream',
      });
    });

    it('should ignore a status no open PR contains', async () => {
      forge.openPullRequestsForCommit.mockResolvedValue([]);
      const { bodyFile, options } = delivery('status', pendingStatus);

      await command.executeWebhook(bodyFile, options);

      expect(mockConsoleLog).toHaveBeenCalledWith(
        `✅ Ignored delivery delivery-001: no open PR contains ${HEAD_SHA}`
      );
      expect(engine.reactor.onStatus).not.toHaveBeenCalled();
    });

    it('should fail when no webhook secret is configured', async () => {
      mockDependencyService.getWebhookHandler.mockRejectedValue(
        new Error('No webhook secret configured (set github.webhookSecret or GITHUB_WEBHOOK_SECRET)')
      );
      const { bodyFile, options } = delivery('pull_request', opened);

      await command.executeWebhook(bodyFile, options);

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to handle delivery delivery-001: No webhook secret configured (set github.webhookSecret or GITHUB_WEBHOOK_SECRET)'
      );
    });
  });

  // ─────────────────────────────────────────────────────────
  // list and cleanup
  // ─────────────────────────────────────────────────────────

  describe('list', () => {
    it('should print the syncs as a table', async () => {
      await command.executeList({});

      expect(mockConsoleLog).toHaveBeenNthCalledWith(1, 'ID     PR       DIRECTION    ISSUE      UPDATED');
      expect(mockConsoleLog).toHaveBeenNthCalledWith(2, '1      9        downstream   1          2024-03-01T12:00:00.000Z');
    });

    it('should print only PR numbers when quiet', async () => {
      await command.executeList({ quiet: true });

      expect(mockConsoleLog).toHaveBeenCalledTimes(1);
      expect(mockConsoleLog).toHaveBeenCalledWith('9');
    });

    it('should say when there are no syncs', async () => {
      tx.listSyncs.mockResolvedValue([]);

      await command.executeList({});

      expect(mockConsoleLog).toHaveBeenCalledWith('No syncs found.');
    });
  });

  describe('cleanup', () => {
    it('should remove the workspaces of the PR', async () => {
      engine.orchestrator.cleanup.mockResolvedValue(['/work/web-platform-tests/PR_9', '/work/gecko/PR_9']);

      await command.executeCleanup('9', {});

      expect(engine.orchestrator.cleanup).toHaveBeenCalledWith(tx, sampleSync);
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Removed 2 workspace(s) for PR 9');
    });

    it('should fail for a PR without a sync', async () => {
      tx.findSync.mockResolvedValue(null);

      await command.executeCleanup('9', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ No sync found for PR 9');
    });
  });

  // ─────────────────────────────────────────────────────────
  // try-message
  // ─────────────────────────────────────────────────────────

  describe('try-message', () => {
    const expectedMessage = 'try: -b do -p win32,win64,linux64,linux '
      + '-u web-platform-tests[linux64-stylo,Ubuntu,10.10,Windows 7,Windows 8,Windows 10],'
      + 'web-platform-tests-e10s[linux64-stylo,Ubuntu,10.10,Windows 7,Windows 8,Windows 10] '
      + '-t none --artifact --try-test-paths web-platform-tests:dom/a.html';
    let upstreamGit: MemoryGitModule;
    let targetGit: MemoryGitModule;

    beforeEach(() => {
      upstreamGit = new MemoryGitModule('/work/web-platform-tests/PR_9', undefined, 'PR_9');
      upstreamGit.setRef('PR_9', [HEAD_SHA]);
      targetGit = new MemoryGitModule('/work/gecko/PR_9', undefined, 'PR_9');
      targetGit.setRef('PR_9', ['c000000000000000000000000000000000000001']);
      engine.workspaces.find
        .mockResolvedValueOnce({ repository: 'web-platform-tests', name: 'PR_9', path: '/work/web-platform-tests/PR_9', git: upstreamGit })
        .mockResolvedValueOnce({ repository: 'gecko', name: 'PR_9', path: '/work/gecko/PR_9', git: targetGit });
      engine.buildTool.testsAffected.mockResolvedValue('dom/a.html\ttestharness\n');
    });

    it('should print the try directive for the affected tests', async () => {
      await command.executeTryMessage('9', {});

      expect(engine.buildTool.testsAffected).toHaveBeenCalledWith('/work/web-platform-tests/PR_9', 'origin/master');
      expect(mockConsoleLog).toHaveBeenCalledWith(expectedMessage);
      expect(targetGit.getCalls()).toEqual([]);
    });

    it('should push the directive and post a pending status', async () => {
      targetGit.setPushOutput({ stdout: '', stderr: `remote: View your changes here:\nremote:   revision=${TRY_REVISION}\n` });

      await command.executeTryMessage('9', { push: true });

      expect(targetGit.getCalls()).toEqual([
        '/work/gecko/PR_9: checkout PR_9',
        `/work/gecko/PR_9: commit --allow-empty ${expectedMessage}`,
        '/work/gecko/PR_9: push try',
        '/work/gecko/PR_9: reset HEAD~',
      ]);
      expect(targetGit.getHistory('PR_9')).toEqual(['c000000000000000000000000000000000000001']);
      expect(forge.postStatus).toHaveBeenCalledWith({
        sha: HEAD_SHA,
        state: 'pending',
        context: TRY_STATUS_CONTEXT,
        description: 'Try push f00000000000',
        targetUrl: `https://treeherder.example.test/#/jobs?repo=try&revision=${TRY_REVISION}`,
      });
      expect(mockConsoleLog).toHaveBeenCalledWith(
        `✅ Pushed to try: https://treeherder.example.test/#/jobs?repo=try&revision=${TRY_REVISION}`
      );
    });

    it('should fail for a PR that was never synced', async () => {
      engine.workspaces.find.mockReset().mockResolvedValue(null);

      await command.executeTryMessage('9', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ PR 9 has not been synced yet');
      expect(engine.buildTool.testsAffected).not.toHaveBeenCalled();
    });
  });
});

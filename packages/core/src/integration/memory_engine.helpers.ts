import { MemoryBuildTool } from '../build_tool/memory';
import { RoutingClassifier } from '../classifier';
import { StatusReactor } from '../ci_reactor';
import { MemoryGitModule } from '../git/memory';
import { createLogger } from '../logger';
import { SyncOrchestrator } from '../orchestrator';
import type { SyncConfig } from '../sync_config';
import { MemorySyncStore } from '../sync_store/memory';
import { MemoryTracker } from '../tracker/memory';
import { CommitTranslator } from '../translator';
import { WorkspaceManager } from '../workspace';

// ===== Fixture Data =====

export const BASE_SHA = 'b000000000000000000000000000000000000001';
export const CENTRAL_SHA = 'c000000000000000000000000000000000000001';

export const TEST_CONFIG: SyncConfig = {
  upstream: { name: 'web-platform-tests', root: '/repos/wpt', remote: 'origin', branch: 'master' },
  target: {
    name: 'gecko',
    root: '/repos/gecko',
    remote: 'mozilla',
    baselineRef: 'mozilla/central',
    upstreamPath: 'testing/web-platform/tests',
    metadataPath: 'testing/web-platform/meta',
  },
  worktreeRoot: '/work',
  stateDir: '/state',
  ci: { context: 'continuous-integration/travis-ci/pr' },
  tracker: { url: 'https://bugzilla.example.test', product: 'Testing', component: 'web-platform-tests' },
  github: { owner: 'test-org', repo: 'test-repo' },
  try: { remote: 'try', resultsUrl: 'https://treeherder.example.test/#/jobs?repo=try&revision=' },
};

export type PullRequestCommit = {
  hash: string;
  message: string;
  /** Empty for a commit without file changes */
  diff: string;
};

export type MemoryEngine = {
  config: SyncConfig;
  upstreamGit: MemoryGitModule;
  targetGit: MemoryGitModule;
  buildTool: MemoryBuildTool;
  tracker: MemoryTracker;
  store: MemorySyncStore;
  workspaces: WorkspaceManager;
  orchestrator: SyncOrchestrator;
  reactor: StatusReactor;
};

// ===== Builders =====

/** A file diff as it appears in a rendered patch */
export function fileDiff(file: string): string {
  return `diff --git a/${file} b/${file}\n--- a/${file}\n+++ b/${file}\n@@ -0,0 +1 @@\n+test`;
}

/**
 * Wires the whole engine over in-memory collaborators. Upstream serves
 * origin/master at BASE_SHA; the target serves mozilla/central at
 * CENTRAL_SHA.
 */
export function createMemoryEngine(): MemoryEngine {
  const config = TEST_CONFIG;
  const logger = createLogger('[Test] ');

  const upstreamGit = new MemoryGitModule(config.upstream.root, undefined, 'master');
  upstreamGit.addCommit('scratch', BASE_SHA, 'Base', fileDiff('README.md'));
  upstreamGit.setRemoteRef('origin', 'master', [BASE_SHA]);

  const targetGit = new MemoryGitModule(config.target.root, undefined, 'central');
  targetGit.addCommit('scratch', CENTRAL_SHA, 'Central', fileDiff('README'));
  targetGit.setRemoteRef('mozilla', 'central', [CENTRAL_SHA]);

  const buildTool = new MemoryBuildTool();
  const tracker = new MemoryTracker();
  const store = new MemorySyncStore({ now: () => new Date('2024-03-01T12:00:00.000Z') });
  const workspaces = new WorkspaceManager({ worktreeRoot: config.worktreeRoot, logger });

  const orchestrator = new SyncOrchestrator({
    config,
    upstreamGit,
    targetGit,
    store,
    workspaces,
    translator: new CommitTranslator({ upstreamPath: config.target.upstreamPath, logger }),
    classifier: new RoutingClassifier({ buildTool, upstreamPath: config.target.upstreamPath, logger }),
    buildTool,
    tracker,
    logger,
  });
  const reactor = new StatusReactor({
    context: config.ci.context,
    store,
    workspaces,
    orchestrator,
    logger,
  });

  return { config, upstreamGit, targetGit, buildTool, tracker, store, workspaces, orchestrator, reactor };
}

/** Makes `origin` serve pull/<id>/head as BASE_SHA followed by `commits` */
export function servePullRequest(engine: MemoryEngine, changeRequestId: number, commits: PullRequestCommit[]): void {
  for (const commit of commits) {
    engine.upstreamGit.addCommit('scratch', commit.hash, commit.message, commit.diff);
  }
  engine.upstreamGit.setRemoteRef('origin', `pull/${changeRequestId}/head`, [
    BASE_SHA,
    ...commits.map((commit) => commit.hash),
  ]);
}

/** Metadata regeneration leaves the target workspace modified */
export function regenerationChangesMetadata(engine: MemoryEngine): void {
  engine.buildTool.onRegenerate((targetRoot) => engine.targetGit.open(targetRoot).setDirty(true));
}

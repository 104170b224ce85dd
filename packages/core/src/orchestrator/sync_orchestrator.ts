import type { IBuildTool } from '../build_tool';
import type { RoutingClassifier, RoutingDecision } from '../classifier';
import type { ChangeRequestEvent } from '../events';
import type { Logger } from '../logger';
import { DuplicateSyncError, SyncNotFoundError } from '../sync_store';
import type { ISyncStore, SyncRecord, SyncStoreTransaction } from '../sync_store';
import type { ITrackerClient } from '../tracker';
import type { CommitTranslator, TranslationResult } from '../translator';
import type { Workspace, WorkspaceManager, WorkspaceRepository } from '../workspace';
import type { SyncConfig } from '../sync_config';
import { diagnosticOf, failureKindOf } from './failures';
import type {
  FailureKind,
  IntakeResult,
  SyncOrchestratorDependencies,
  SyncOutcome,
  SyncPhase,
} from './orchestrator.types';

type Failure = {
  kind: FailureKind;
  diagnostic: string;
};

type Step<T> = { ok: true; value: T } | { ok: false; failure: Failure };

/** Summary of the tracker issue filed for a change request */
export function issueSummary(event: Pick<ChangeRequestEvent, 'changeRequestId' | 'title'>): string {
  return `[wpt-sync] PR ${event.changeRequestId} - ${event.title}`;
}

/** Message of the commit holding regenerated metadata */
export function manifestCommitMessage(branch: string): string {
  return `[wpt-sync] downstream ${branch}: update manifest`;
}

function translationReason(result: Extract<TranslationResult, { success: false }>, changeRequestId: number): string {
  if (result.commit === null) {
    return `listing the commits of PR ${changeRequestId} failed`;
  }
  if (result.kind === 'PatchApplyFailure') {
    return `applying patch from ${result.commit} failed`;
  }
  if (result.kind === 'TimeoutFailure') {
    return `porting ${result.commit} timed out`;
  }
  return `creating patch from ${result.commit} failed`;
}

/**
 * SyncOrchestrator - drives a downstream sync from fetching the change
 * request to reporting its routing on the tracker issue.
 *
 * `run` does all of its work through the caller's store transaction; it
 * never throws, and reports every failure on the tracker issue (except a
 * failing tracker) before returning it.
 */
export class SyncOrchestrator {
  readonly upstream: WorkspaceRepository;
  readonly target: WorkspaceRepository;

  private readonly config: Pick<SyncConfig, 'upstream' | 'target' | 'tracker'>;
  private readonly store: ISyncStore;
  private readonly workspaces: WorkspaceManager;
  private readonly translator: CommitTranslator;
  private readonly classifier: RoutingClassifier;
  private readonly buildTool: IBuildTool;
  private readonly tracker: ITrackerClient;
  private readonly logger: Logger;

  constructor(deps: SyncOrchestratorDependencies) {
    this.config = deps.config;
    this.upstream = { name: deps.config.upstream.name, git: deps.upstreamGit };
    this.target = { name: deps.config.target.name, git: deps.targetGit };
    this.store = deps.store;
    this.workspaces = deps.workspaces;
    this.translator = deps.translator;
    this.classifier = deps.classifier;
    this.buildTool = deps.buildTool;
    this.tracker = deps.tracker;
    this.logger = deps.logger;
  }

  private get upstreamBaseline(): string {
    return `${this.config.upstream.remote}/${this.config.upstream.branch}`;
  }

  private get defaultRouting(): RoutingDecision {
    return { primary: this.config.tracker.product, secondary: this.config.tracker.component };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTAKE
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Records a newly opened change request as a downstream sync and files
   * its tracker issue. Nothing is recorded unless the issue was filed; an
   * issue filed by a transaction that then fails to commit is commented on
   * and returned with the error.
   */
  async newSync(event: ChangeRequestEvent): Promise<IntakeResult> {
    const key = {
      repository: this.upstream.name,
      changeRequestId: event.changeRequestId,
      direction: 'downstream' as const,
    };
    const filed: { issueRef: string | null } = { issueRef: null };

    try {
      return await this.store.transaction(async (tx): Promise<IntakeResult> => {
        await tx.getOrCreateRepository(this.upstream.name);
        await tx.getOrCreateRepository(this.target.name);

        const existing = await tx.findSync(key);
        if (existing) {
          return { action: 'exists', sync: existing };
        }

        const created = await tx.createSync(key);
        const issueRef = await this.tracker.create({
          summary: issueSummary(event),
          body: event.body,
          product: this.config.tracker.product,
          component: this.config.tracker.component,
        });
        filed.issueRef = issueRef;
        const sync = await tx.updateSync(created.id, { issueRef });
        this.logger.info(`Created sync ${sync.id} for PR ${event.changeRequestId} with issue ${issueRef}`);
        return { action: 'created', sync };
      });
    } catch (error) {
      if (error instanceof DuplicateSyncError) {
        const sync = await this.store.transaction((tx) => tx.findSync(key));
        if (sync) {
          return { action: 'exists', sync };
        }
      }
      const kind = failureKindOf(error, 'StateStoreFailure') === 'TrackerFailure'
        ? 'TrackerFailure'
        : 'StateStoreFailure';
      const message = `Recording PR ${event.changeRequestId} failed: ${diagnosticOf(error)}`;
      this.logger.error(message);
      if (filed.issueRef !== null) {
        await this.reportOrphanedIssue(filed.issueRef, message);
      }
      return { action: 'error', kind, message, issueRef: filed.issueRef };
    }
  }

  private async reportOrphanedIssue(issueRef: string, message: string): Promise<void> {
    try {
      await this.tracker.comment(issueRef, `${message}\nNo sync was recorded for this issue.`);
    } catch (error) {
      this.logger.error(`Commenting on orphaned issue ${issueRef} failed: ${diagnosticOf(error)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PROCESSING
  // ═══════════════════════════════════════════════════════════════════════

  /** Runs the sync in a transaction of its own */
  async updateSync(syncId: number): Promise<SyncOutcome> {
    const progress: { outcome: SyncOutcome | null } = { outcome: null };
    try {
      return await this.store.transaction(async (tx) => {
        const sync = await tx.getSync(syncId);
        if (!sync) {
          throw new SyncNotFoundError(syncId);
        }
        progress.outcome = await this.run(tx, sync);
        return progress.outcome;
      });
    } catch (error) {
      const phases: SyncPhase[] = progress.outcome
        ? progress.outcome.phases.filter((phase) => phase !== 'error')
        : ['pending-intake'];
      const failedPhase = phases[phases.length - 1] ?? 'pending-intake';
      const message = `Processing sync ${syncId} failed: ${diagnosticOf(error)}`;
      this.logger.error(message);
      return {
        success: false,
        syncId,
        phase: 'error',
        phases: [...phases, 'error'],
        failedPhase,
        kind: 'StateStoreFailure',
        commit: null,
        message,
      };
    }
  }

  /**
   * Fetches the change request, ports its commits onto the target tree,
   * regenerates metadata and routes the tracker issue.
   */
  async run(tx: SyncStoreTransaction, sync: SyncRecord): Promise<SyncOutcome> {
    const id = sync.changeRequestId;
    const logger = this.logger.child(`[PR ${id}] `);
    const phases: SyncPhase[] = ['pending-intake'];
    const enter = (phase: SyncPhase) => {
      phases.push(phase);
      logger.debug(`Entering ${phase}`);
    };
    const fail = (failure: Failure, reason: string, commit: string | null = null) =>
      this.fail(sync, phases, failure, reason, commit, logger);

    // fetching-source
    enter('fetching-source');
    const upstream = await this.attempt('FetchFailure', () => this.obtainChangeRequest(tx, sync, logger));
    if (!upstream.ok) {
      return fail(upstream.failure, `obtaining PR ${id} failed`);
    }
    const changedPaths = await this.changedPaths(upstream.value, logger);

    const target = await this.attempt('FetchFailure', () => this.prepareTarget(tx, sync, logger));
    if (!target.ok) {
      return fail(target.failure, `preparing ${this.target.name} failed`);
    }

    // translating
    enter('translating');
    const translation = await this.translator.translate(
      upstream.value.git,
      this.upstreamBaseline,
      target.value.git,
    );
    if (!translation.success) {
      return fail(
        { kind: translation.kind, diagnostic: translation.diagnostic },
        translationReason(translation, id),
        translation.commit,
      );
    }

    // updating-metadata
    enter('updating-metadata');
    const manifest = await this.attempt('MetadataRegenFailure', () => this.commitManifestUpdate(target.value));
    if (!manifest.ok) {
      return fail(manifest.failure, 'updating the manifest failed');
    }

    // classifying
    enter('classifying');
    const routing = await this.classifier.classify(target.value.path, changedPaths, this.defaultRouting);

    // reported
    const reported = await this.attempt('TrackerFailure', async () => {
      if (!sync.issueRef) {
        throw new Error(`Sync ${sync.id} has no tracker issue`);
      }
      await this.tracker.setRouting(sync.issueRef, routing.primary, routing.secondary);
    });
    if (!reported.ok) {
      return fail({ ...reported.failure, kind: 'TrackerFailure' }, 'routing the issue failed');
    }
    enter('reported');
    logger.info(`Ported ${translation.applied.length} commit(s), routed to ${routing.primary} :: ${routing.secondary}`);

    return {
      success: true,
      syncId: sync.id,
      phase: 'reported',
      phases,
      routing,
      applied: translation.applied,
      skipped: translation.skipped,
      manifestCommitted: manifest.value,
    };
  }

  /**
   * Tears down the sync's workspaces.
   *
   * @throws WorkspaceError
   */
  async cleanup(tx: SyncStoreTransaction, sync: SyncRecord): Promise<string[]> {
    return this.workspaces.remove(tx, sync, [this.upstream, this.target]);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STEPS
  // ═══════════════════════════════════════════════════════════════════════

  private async obtainChangeRequest(
    tx: SyncStoreTransaction,
    sync: SyncRecord,
    logger: Logger,
  ): Promise<Workspace> {
    const { remote, branch } = this.config.upstream;
    const id = sync.changeRequestId;

    logger.info(`Fetching ${this.upstream.name} ${this.upstreamBaseline}`);
    await this.upstream.git.fetch(remote, branch, { tags: false });

    const { workspace } = await this.workspaces.ensure(tx, sync, this.upstream, this.upstreamBaseline);
    await workspace.git.resetHard(this.upstreamBaseline);
    await workspace.git.fetch(remote, `pull/${id}/head:heads/pull_${id}`, { tags: false });
    await workspace.git.merge(`heads/pull_${id}`);
    return workspace;
  }

  /** Paths the change request touches; unknown paths only cost the routing */
  private async changedPaths(workspace: Workspace, logger: Logger): Promise<string[]> {
    try {
      return await this.buildTool.filesChanged(workspace.path);
    } catch (error) {
      logger.warn(`Could not list changed files, routing will use the default: ${diagnosticOf(error)}`);
      return [];
    }
  }

  private async prepareTarget(
    tx: SyncStoreTransaction,
    sync: SyncRecord,
    logger: Logger,
  ): Promise<Workspace> {
    const { remote, baselineRef } = this.config.target;

    logger.info(`Fetching ${this.target.name} ${remote}`);
    await this.target.git.fetch(remote);

    const { workspace } = await this.workspaces.ensure(tx, sync, this.target, baselineRef);
    await workspace.git.resetHard(baselineRef);
    return workspace;
  }

  /** Returns whether a metadata commit was made */
  private async commitManifestUpdate(workspace: Workspace): Promise<boolean> {
    await workspace.git.resetHard('HEAD');
    await this.buildTool.regenerateMetadata(workspace.path);
    if (!(await workspace.git.isDirty())) {
      return false;
    }
    await workspace.git.add([this.config.target.metadataPath]);
    await workspace.git.commit(manifestCommitMessage(workspace.name));
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // FAILURES
  // ═══════════════════════════════════════════════════════════════════════

  private async attempt<T>(otherwise: FailureKind, work: () => Promise<T>): Promise<Step<T>> {
    try {
      return { ok: true, value: await work() };
    } catch (error) {
      return {
        ok: false,
        failure: { kind: failureKindOf(error, otherwise), diagnostic: diagnosticOf(error) },
      };
    }
  }

  private async fail(
    sync: SyncRecord,
    phases: SyncPhase[],
    failure: Failure,
    reason: string,
    commit: string | null,
    logger: Logger,
  ): Promise<SyncOutcome> {
    const failedPhase = phases[phases.length - 1] ?? 'pending-intake';
    const message = `Downstreaming from ${this.upstream.name} failed because ${reason}:\n${failure.diagnostic}`;
    logger.error(`${failure.kind} in ${failedPhase}: ${message}`);

    if (failure.kind !== 'TrackerFailure' && sync.issueRef) {
      try {
        await this.tracker.comment(sync.issueRef, message);
      } catch (error) {
        logger.error(`Could not comment on issue ${sync.issueRef}: ${diagnosticOf(error)}`);
      }
    }

    return {
      success: false,
      syncId: sync.id,
      phase: 'error',
      phases: [...phases, 'error'],
      failedPhase,
      kind: failure.kind,
      commit,
      message,
    };
  }
}

import { promises as fs } from 'fs';
import { Command } from 'commander';
import { Events, TryPush } from '@wpt-sync/core';
import type { CiReactor, Orchestrator, SyncStore } from '@wpt-sync/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { SyncEngine } from '../../services/dependency-injection';
import type {
  CleanupOptions,
  ListOptions,
  PrOptions,
  StatusOptions,
  TryMessageOptions,
  WebhookOptions,
} from './downstream-command.types';

/** Commit status context of try pushes */
export const TRY_STATUS_CONTEXT = 'wpt-sync/try';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * DownstreamCommand - drives downstream syncs from the command line.
 *
 * Delegates all sync logic to the orchestrator and the status reactor.
 */
export class DownstreamCommand extends BaseCommand<BaseCommandOptions> {

  register(program: Command): void {
    // Not used; registration happens via registerDownstreamCommands()
  }

  /**
   * wpt-sync pr <number> - record a newly opened PR and file its issue
   */
  async executePr(number: string, options: PrOptions): Promise<void> {
    const changeRequestId = this.parseNumber(number, options);
    if (changeRequestId === null) {
      return;
    }
    try {
      this.configure(options);
      const engine = await this.dependencyService.getEngine();
      const event = options.payload
        ? await this.readPayload(options.payload)
        : await this.fetchPullRequest(changeRequestId);

      if (event.changeRequestId !== changeRequestId) {
        this.handleError(`Payload describes PR ${event.changeRequestId}, not PR ${changeRequestId}`, options);
        return;
      }

      this.reportIntake(changeRequestId, await engine.orchestrator.newSync(event), options);
    } catch (error) {
      this.handleError(`Failed to record PR ${number}: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * wpt-sync status <number> - feed a CI status to the reactor
   */
  async executeStatus(number: string, options: StatusOptions): Promise<void> {
    const changeRequestId = this.parseNumber(number, options);
    if (changeRequestId === null) {
      return;
    }
    try {
      this.configure(options);
      const engine = await this.dependencyService.getEngine();
      const event = Events.parseStatusEvent({
        context: options.context ?? engine.config.ci.context,
        state: options.state,
        sha: options.sha,
      });

      const sync = await this.findSync(engine, changeRequestId);
      if (!sync) {
        this.handleError(`No sync found for PR ${changeRequestId}`, options);
        return;
      }

      this.reportDecision(await engine.reactor.onStatus(sync.id, event), options);
    } catch (error) {
      this.handleError(`Failed to handle status for PR ${number}: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * wpt-sync webhook <body-file> - verify a GitHub delivery and act on it
   */
  async executeWebhook(bodyFile: string, options: WebhookOptions): Promise<void> {
    try {
      this.configure(options);
      const handler = await this.dependencyService.getWebhookHandler();
      const rawBody = await fs.readFile(bodyFile, 'utf-8');
      const result = handler.handle({
        signature: options.signature,
        event: options.event,
        deliveryId: options.delivery,
        rawBody,
      });

      switch (result.action) {
        case 'error':
          this.handleError(`Delivery ${result.deliveryId} rejected: ${result.reason}`, options);
          return;
        case 'ignore':
          this.handleSuccess(result, options, `Ignored delivery ${result.deliveryId}: ${result.reason}`);
          return;
        case 'intake': {
          const engine = await this.dependencyService.getEngine();
          const intake = await engine.orchestrator.newSync(result.event);
          this.reportIntake(result.event.changeRequestId, intake, options);
          return;
        }
        case 'status': {
          const changeRequestId = options.pr !== undefined
            ? this.parseNumber(options.pr, options)
            : await this.pullRequestForRevision(result.event.sha);
          if (changeRequestId === null) {
            if (options.pr === undefined) {
              this.handleSuccess(
                { action: 'ignore', deliveryId: result.deliveryId },
                options,
                `Ignored delivery ${result.deliveryId}: no open PR contains ${result.event.sha}`,
              );
            }
            return;
          }

          const engine = await this.dependencyService.getEngine();
          const sync = await this.findSync(engine, changeRequestId);
          if (!sync) {
            this.handleError(`No sync found for PR ${changeRequestId}`, options);
            return;
          }
          this.reportDecision(await engine.reactor.onStatus(sync.id, result.event), options);
          return;
        }
      }
    } catch (error) {
      this.handleError(`Failed to handle delivery ${options.delivery}: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * wpt-sync list - list known syncs
   */
  async executeList(options: ListOptions): Promise<void> {
    try {
      this.configure(options);
      const engine = await this.dependencyService.getEngine();
      const syncs = await engine.store.transaction((tx) => tx.listSyncs());

      if (options.json) {
        this.handleSuccess({ total: syncs.length, syncs }, options);
        return;
      }
      if (options.quiet) {
        syncs.forEach((sync) => console.log(String(sync.changeRequestId)));
        return;
      }
      if (syncs.length === 0) {
        console.log('No syncs found.');
        return;
      }

      console.log(`${'ID'.padEnd(6)} ${'PR'.padEnd(8)} ${'DIRECTION'.padEnd(12)} ${'ISSUE'.padEnd(10)} UPDATED`);
      for (const sync of syncs) {
        console.log(
          `${String(sync.id).padEnd(6)} ${String(sync.changeRequestId).padEnd(8)} `
          + `${sync.direction.padEnd(12)} ${(sync.issueRef ?? '-').padEnd(10)} ${sync.updatedAt}`
        );
      }
    } catch (error) {
      this.handleError(`Failed to list syncs: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * wpt-sync cleanup <number> - tear down a sync's workspaces
   */
  async executeCleanup(number: string, options: CleanupOptions): Promise<void> {
    const changeRequestId = this.parseNumber(number, options);
    if (changeRequestId === null) {
      return;
    }
    try {
      this.configure(options);
      const engine = await this.dependencyService.getEngine();
      const removed = await engine.store.transaction(async (tx) => {
        const sync = await tx.findSync(this.keyFor(engine, changeRequestId));
        return sync ? engine.orchestrator.cleanup(tx, sync) : null;
      });

      if (removed === null) {
        this.handleError(`No sync found for PR ${changeRequestId}`, options);
        return;
      }
      this.handleSuccess({ removed }, options, removed.length === 0
        ? `PR ${changeRequestId} has no workspaces`
        : `Removed ${removed.length} workspace(s) for PR ${changeRequestId}`);
    } catch (error) {
      this.handleError(`Failed to clean up PR ${number}: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * wpt-sync try-message <number> - print or push the try directive for
   * the tests a PR affects
   */
  async executeTryMessage(number: string, options: TryMessageOptions): Promise<void> {
    const changeRequestId = this.parseNumber(number, options);
    if (changeRequestId === null) {
      return;
    }
    try {
      this.configure(options);
      const engine = await this.dependencyService.getEngine();
      const sync = await this.findSync(engine, changeRequestId);
      const upstream = sync ? await engine.workspaces.find(sync, engine.orchestrator.upstream) : null;
      const target = sync ? await engine.workspaces.find(sync, engine.orchestrator.target) : null;
      if (!sync || !upstream || !target) {
        this.handleError(`PR ${changeRequestId} has not been synced yet`, options);
        return;
      }

      const { remote, branch } = engine.config.upstream;
      const output = await engine.buildTool.testsAffected(upstream.path, `${remote}/${branch}`);
      const message = TryPush.constructTryMessage(TryPush.parseAffectedTests(output));

      if (!options.push) {
        if (options.json) {
          this.handleSuccess({ message }, options);
        } else {
          console.log(message);
        }
        return;
      }

      const pushed = await TryPush.pushToTry(target.git, target.name, message, {
        remote: engine.config.try.remote,
        resultsUrl: engine.config.try.resultsUrl,
        logger: engine.logger.child('[Try] '),
      });
      const forge = await this.dependencyService.getForge();
      await forge.postStatus({
        sha: await upstream.git.currentTip(),
        state: 'pending',
        context: TRY_STATUS_CONTEXT,
        description: `Try push ${pushed.revision.slice(0, 12)}`,
        targetUrl: pushed.resultsUrl,
      });
      this.handleSuccess({ message, ...pushed }, options, `Pushed to try: ${pushed.resultsUrl}`);
    } catch (error) {
      this.handleError(`Failed to build try run for PR ${number}: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
    }
  }

  // ─────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────

  private reportIntake(changeRequestId: number, result: Orchestrator.IntakeResult, options: BaseCommandOptions): void {
    if (result.action === 'error') {
      this.handleError(result.message, options);
      return;
    }
    this.handleSuccess(result, options, result.action === 'created'
      ? `Sync ${result.sync.id} created for PR ${changeRequestId} (issue ${result.sync.issueRef ?? 'none'})`
      : `PR ${changeRequestId} is already tracked by sync ${result.sync.id}`);
  }

  private reportDecision(decision: CiReactor.StatusDecision, options: BaseCommandOptions): void {
    if (decision.action === 'error' || (decision.action === 'updated' && !decision.outcome.success)) {
      this.handleError(decision.reason, options);
      return;
    }
    this.handleSuccess(decision, options, `${decision.action}: ${decision.reason}`);
  }

  private async pullRequestForRevision(sha: string): Promise<number | null> {
    const forge = await this.dependencyService.getForge();
    const [changeRequestId] = await forge.openPullRequestsForCommit(sha);
    return changeRequestId ?? null;
  }

  private keyFor(engine: SyncEngine, changeRequestId: number): SyncStore.SyncKey {
    return { repository: engine.orchestrator.upstream.name, changeRequestId, direction: 'downstream' };
  }

  private async findSync(engine: SyncEngine, changeRequestId: number): Promise<SyncStore.SyncRecord | null> {
    return engine.store.transaction((tx) => tx.findSync(this.keyFor(engine, changeRequestId)));
  }

  private async fetchPullRequest(changeRequestId: number): Promise<Events.ChangeRequestEvent> {
    const forge = await this.dependencyService.getForge();
    const pullRequest = await forge.getPullRequest(changeRequestId);
    return Events.parseChangeRequestEvent(pullRequest);
  }

  /** Accepts a pull_request webhook body or a bare change request event */
  private async readPayload(file: string): Promise<Events.ChangeRequestEvent> {
    const data: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
    if (isRecord(data) && isRecord(data['pull_request'])) {
      const pullRequest = data['pull_request'];
      return Events.parseChangeRequestEvent({
        changeRequestId: pullRequest['number'],
        title: pullRequest['title'],
        body: pullRequest['body'] ?? '',
      });
    }
    return Events.parseChangeRequestEvent(data);
  }
}

import type { StatusEvent } from '../events';
import type { Logger } from '../logger';
import type { SyncOrchestrator } from '../orchestrator';
import { diagnosticOf } from '../orchestrator';
import type { ISyncStore } from '../sync_store';
import type { WorkspaceManager } from '../workspace';
import type { StatusDecision, StatusReactorDependencies } from './ci_reactor.types';

/**
 * StatusReactor - re-runs a sync when CI reports a revision its upstream
 * workspace does not hold yet.
 *
 * The revision check and the re-run share one store transaction, so a
 * second event for the same revision waits for the first and then finds
 * the workspace up to date.
 */
export class StatusReactor {
  private readonly context: string;
  private readonly store: ISyncStore;
  private readonly workspaces: WorkspaceManager;
  private readonly orchestrator: SyncOrchestrator;
  private readonly logger: Logger;

  constructor(deps: StatusReactorDependencies) {
    this.context = deps.context;
    this.store = deps.store;
    this.workspaces = deps.workspaces;
    this.orchestrator = deps.orchestrator;
    this.logger = deps.logger;
  }

  /** Never throws */
  async onStatus(syncId: number, event: StatusEvent): Promise<StatusDecision> {
    if (event.context !== this.context) {
      this.logger.info(`Ignoring status for context ${event.context}`);
      return { action: 'ignore', reason: `Unrecognised context: ${event.context}` };
    }
    if (event.state === 'passed') {
      return { action: 'ignore', reason: 'Nothing to do for passed status' };
    }
    if (event.state !== 'pending') {
      this.logger.info(`Ignoring ${event.state} status for ${event.sha}`);
      return { action: 'ignore', reason: `Unhandled state: ${event.state}` };
    }

    try {
      return await this.store.transaction(async (tx): Promise<StatusDecision> => {
        const sync = await tx.getSync(syncId);
        if (!sync) {
          return { action: 'error', reason: `Sync not found: ${syncId}` };
        }

        const workspace = await this.workspaces.find(sync, this.orchestrator.upstream);
        if (workspace && await this.workspaces.isAtRevision(workspace, event.sha)) {
          this.logger.debug(`Sync ${syncId} is already at ${event.sha}`);
          return { action: 'up-to-date', reason: `Workspace ${workspace.name} is at ${event.sha}` };
        }

        this.logger.info(`Updating sync ${syncId} for ${event.sha}`);
        const outcome = await this.orchestrator.run(tx, sync);
        return {
          action: 'updated',
          reason: outcome.success ? 'Sync updated' : outcome.message,
          outcome,
        };
      });
    } catch (error) {
      const reason = `Handling status for sync ${syncId} failed: ${diagnosticOf(error)}`;
      this.logger.error(reason);
      return { action: 'error', reason };
    }
  }
}

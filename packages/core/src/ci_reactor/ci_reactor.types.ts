import type { Logger } from '../logger';
import type { SyncOrchestrator, SyncOutcome } from '../orchestrator';
import type { ISyncStore } from '../sync_store';
import type { WorkspaceManager } from '../workspace';

/**
 * What the reactor did with a status event
 */
export type StatusDecision =
  | {
      /** Context or state the reactor does not act on */
      action: 'ignore';
      reason: string;
    }
  | {
      /** The upstream workspace already holds the reported revision */
      action: 'up-to-date';
      reason: string;
    }
  | {
      action: 'updated';
      reason: string;
      outcome: SyncOutcome;
    }
  | {
      action: 'error';
      reason: string;
    };

export type StatusReactorDependencies = {
  /** The one CI context acted on */
  context: string;
  store: ISyncStore;
  workspaces: WorkspaceManager;
  orchestrator: SyncOrchestrator;
  logger: Logger;
};

import type { IBuildTool } from '../build_tool';
import type { RoutingClassifier, RoutingDecision } from '../classifier';
import type { IGitModule } from '../git';
import type { Logger } from '../logger';
import type { SyncConfig } from '../sync_config';
import type { ISyncStore, SyncRecord } from '../sync_store';
import type { ITrackerClient } from '../tracker';
import type { CommitTranslator } from '../translator';
import type { WorkspaceManager } from '../workspace';

/**
 * States a sync passes through while being processed
 */
export type SyncPhase =
  | 'pending-intake'
  | 'fetching-source'
  | 'translating'
  | 'updating-metadata'
  | 'classifying'
  | 'reported'
  | 'error';

export type FailureKind =
  | 'FetchFailure'
  | 'WorkspaceFailure'
  | 'PatchRenderFailure'
  | 'PatchApplyFailure'
  | 'MetadataRegenFailure'
  | 'StateStoreFailure'
  | 'TimeoutFailure'
  | 'TrackerFailure';

/**
 * Result of one processing run of a sync
 */
export type SyncOutcome =
  | {
      success: true;
      syncId: number;
      phase: 'reported';
      /** Phases visited, in order */
      phases: SyncPhase[];
      routing: RoutingDecision;
      /** Upstream commits ported, oldest first */
      applied: string[];
      skipped: string[];
      /** Whether regenerated metadata was committed */
      manifestCommitted: boolean;
    }
  | {
      success: false;
      syncId: number;
      phase: 'error';
      phases: SyncPhase[];
      /** Phase the run stopped in */
      failedPhase: SyncPhase;
      kind: FailureKind;
      /** Upstream commit involved, when there is one */
      commit: string | null;
      /** Human-readable description, as posted to the tracker issue */
      message: string;
    };

/**
 * Result of recording a newly opened change request
 */
export type IntakeResult =
  | { action: 'created'; sync: SyncRecord }
  | { action: 'exists'; sync: SyncRecord }
  | {
      action: 'error';
      kind: 'StateStoreFailure' | 'TrackerFailure';
      message: string;
      /** Issue filed before the failure; it carries a comment saying no sync backs it */
      issueRef: string | null;
    };

export type SyncOrchestratorDependencies = {
  config: Pick<SyncConfig, 'upstream' | 'target' | 'tracker'>;
  /** Module bound to the upstream main clone */
  upstreamGit: IGitModule;
  /** Module bound to the target main clone */
  targetGit: IGitModule;
  store: ISyncStore;
  workspaces: WorkspaceManager;
  translator: CommitTranslator;
  classifier: RoutingClassifier;
  buildTool: IBuildTool;
  tracker: ITrackerClient;
  logger: Logger;
};

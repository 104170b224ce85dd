export { SyncOrchestrator, issueSummary, manifestCommitMessage } from './sync_orchestrator';
export { diagnosticOf, failureKindOf } from './failures';
export type {
  FailureKind,
  IntakeResult,
  SyncOrchestratorDependencies,
  SyncOutcome,
  SyncPhase,
} from './orchestrator.types';

import { BuildToolError, BuildToolTimeoutError } from '../build_tool';
import { GitCommandError, GitTimeoutError } from '../git';
import { SyncStoreError } from '../sync_store';
import { TrackerError } from '../tracker';
import { WorkspaceError } from '../workspace';
import type { FailureKind } from './orchestrator.types';

/** Failure kind for an error raised while working in a phase */
export function failureKindOf(error: unknown, otherwise: FailureKind): FailureKind {
  if (error instanceof GitTimeoutError || error instanceof BuildToolTimeoutError) {
    return 'TimeoutFailure';
  }
  if (error instanceof WorkspaceError) {
    return 'WorkspaceFailure';
  }
  if (error instanceof SyncStoreError) {
    return 'StateStoreFailure';
  }
  if (error instanceof TrackerError) {
    return 'TrackerFailure';
  }
  return otherwise;
}

/** Error text including the output of the tool that failed */
export function diagnosticOf(error: unknown): string {
  if (error instanceof GitCommandError || error instanceof BuildToolError) {
    return error.diagnostic;
  }
  return error instanceof Error ? error.message : String(error);
}

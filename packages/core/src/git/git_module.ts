/**
 * IGitModule - version-control capability consumed by the sync engine
 *
 * Each instance is bound to one working copy (the main clone of a
 * repository or one of its worktrees). `at(path)` returns an instance bound
 * to another working copy of the same repository.
 *
 * Failing commands raise GitCommandError (GitTimeoutError on timeout),
 * except `applyPatch`, whose exit status is part of its result.
 *
 * @module git
 */

import type {
  AddWorktreeOptions,
  CommitOptions,
  ExecResult,
  FetchOptions,
  PushResult,
} from './types';

export interface IGitModule {
  /** Absolute path of the working copy this module operates on */
  getRepoRoot(): string;

  /** Returns a module bound to another working copy of the same repository */
  at(path: string): IGitModule;

  // Remote operations
  fetch(remote: string, refspec?: string, options?: FetchOptions): Promise<void>;
  push(remote: string, refspec?: string): Promise<PushResult>;

  // History
  merge(ref: string): Promise<void>;
  resetHard(ref: string): Promise<void>;
  resetMixed(ref: string): Promise<void>;
  checkout(branch: string): Promise<void>;
  add(paths: string[]): Promise<void>;
  commit(message: string, options?: CommitOptions): Promise<void>;
  isDirty(): Promise<boolean>;

  // Inspection
  currentTip(): Promise<string>;
  getCurrentBranch(): Promise<string>;
  /** Tip of a local branch, or null when the branch does not exist */
  branchTip(branch: string): Promise<string | null>;
  /** Commits reachable from `headRef` but not from `baseRef`, oldest first */
  commitsBetween(baseRef: string, headRef?: string): Promise<string[]>;

  // Patches
  /** Renders one commit as a mailbox-format patch */
  renderPatch(commit: string): Promise<string>;
  /** Applies a mailbox patch under `directoryPrefix`, committing it */
  applyPatch(patch: string, directoryPrefix: string): Promise<ExecResult>;

  // Worktrees
  addWorktree(path: string, branch: string, options?: AddWorktreeOptions): Promise<void>;
  removeWorktree(path: string): Promise<void>;
  listWorktrees(): Promise<string[]>;
  deleteBranch(branch: string): Promise<void>;
}

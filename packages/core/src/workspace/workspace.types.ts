import type { IGitModule } from '../git';
import type { Logger } from '../logger';

/**
 * A repository the engine keeps per-sync workspaces for
 */
export type WorkspaceRepository = {
  /** Repository name, also the key in SyncRecord.worktrees */
  name: string;
  /** Module bound to the repository's main clone */
  git: IGitModule;
};

/**
 * An isolated checkout of one repository owned by one sync
 */
export type Workspace = {
  repository: string;
  /** Deterministic name, also the branch checked out in the workspace */
  name: string;
  path: string;
  /** Module bound to the workspace directory */
  git: IGitModule;
};

export type EnsureWorkspaceResult = {
  workspace: Workspace;
  /** False when an existing workspace was returned */
  created: boolean;
};

export type WorkspaceManagerDependencies = {
  /** Directory holding `<repository>/<name>` workspaces */
  worktreeRoot: string;
  logger: Logger;
};

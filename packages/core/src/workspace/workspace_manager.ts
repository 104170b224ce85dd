import * as path from 'path';
import type { SyncRecord, SyncStoreTransaction } from '../sync_store';
import type { Logger } from '../logger';
import { WorkspaceError } from './workspace.errors';
import type {
  EnsureWorkspaceResult,
  Workspace,
  WorkspaceManagerDependencies,
  WorkspaceRepository,
} from './workspace.types';

/** Workspace (and branch) name for a change request */
export function workspaceName(changeRequestId: number): string {
  return `PR_${changeRequestId}`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * WorkspaceManager - per-sync isolated checkouts built on git worktrees.
 *
 * Workspaces are created lazily and kept after failures; only `remove`
 * tears them down. The path of each workspace is recorded on the sync
 * through the caller's store transaction.
 */
export class WorkspaceManager {
  private readonly worktreeRoot: string;
  private readonly logger: Logger;

  constructor(deps: WorkspaceManagerDependencies) {
    this.worktreeRoot = path.resolve(deps.worktreeRoot);
    this.logger = deps.logger;
  }

  /** Path a sync's workspace for `repository` lives at */
  pathFor(sync: SyncRecord, repository: string): string {
    return path.join(this.worktreeRoot, repository, workspaceName(sync.changeRequestId));
  }

  /**
   * Returns the sync's workspace for `repository`, creating it at
   * `baselineRef` when none exists. Repeated calls return the same
   * workspace untouched.
   *
   * @throws WorkspaceError when the workspace cannot be created
   */
  async ensure(
    tx: SyncStoreTransaction,
    sync: SyncRecord,
    repository: WorkspaceRepository,
    baselineRef: string,
  ): Promise<EnsureWorkspaceResult> {
    const name = workspaceName(sync.changeRequestId);
    const workspacePath = this.pathFor(sync, repository.name);
    let created = false;

    try {
      const existing = await repository.git.listWorktrees();
      if (!existing.includes(workspacePath)) {
        // A branch left behind by a removed worktree is checked out again
        const branchTip = await repository.git.branchTip(name);
        this.logger.info(`Creating workspace ${workspacePath} (${branchTip ? name : baselineRef})`);
        await repository.git.addWorktree(
          workspacePath,
          name,
          branchTip ? undefined : { startRef: baselineRef },
        );
        created = true;
      } else {
        this.logger.debug(`Reusing workspace ${workspacePath}`);
      }
    } catch (error) {
      throw new WorkspaceError(
        'Failed to create workspace',
        repository.name,
        workspacePath,
        toError(error),
      );
    }

    if (sync.worktrees[repository.name] !== workspacePath) {
      await tx.updateSync(sync.id, { worktrees: { [repository.name]: workspacePath } });
    }

    return {
      workspace: {
        repository: repository.name,
        name,
        path: workspacePath,
        git: repository.git.at(workspacePath),
      },
      created,
    };
  }

  /** The sync's existing workspace for `repository`, or null */
  async find(sync: SyncRecord, repository: WorkspaceRepository): Promise<Workspace | null> {
    const workspacePath = sync.worktrees[repository.name];
    if (!workspacePath) {
      return null;
    }
    const existing = await repository.git.listWorktrees();
    if (!existing.includes(workspacePath)) {
      return null;
    }
    return {
      repository: repository.name,
      name: workspaceName(sync.changeRequestId),
      path: workspacePath,
      git: repository.git.at(workspacePath),
    };
  }

  /**
   * Whether the workspace branch already points at `revision`.
   * Abbreviated revisions match by prefix.
   */
  async isAtRevision(workspace: Workspace, revision: string): Promise<boolean> {
    const tip = await workspace.git.branchTip(workspace.name);
    if (!tip) {
      return false;
    }
    return tip === revision || (revision.length >= 7 && tip.startsWith(revision));
  }

  /**
   * Tears down every workspace the sync owns and deletes their branches.
   *
   * @throws WorkspaceError when a workspace cannot be removed
   */
  async remove(
    tx: SyncStoreTransaction,
    sync: SyncRecord,
    repositories: WorkspaceRepository[],
  ): Promise<string[]> {
    const name = workspaceName(sync.changeRequestId);
    const removed: string[] = [];
    const cleared: Record<string, null> = {};

    for (const repository of repositories) {
      const workspacePath = sync.worktrees[repository.name];
      if (!workspacePath) {
        continue;
      }
      try {
        await repository.git.removeWorktree(workspacePath);
        if (await repository.git.branchTip(name)) {
          await repository.git.deleteBranch(name);
        }
      } catch (error) {
        throw new WorkspaceError(
          'Failed to remove workspace',
          repository.name,
          workspacePath,
          toError(error),
        );
      }
      this.logger.info(`Removed workspace ${workspacePath}`);
      removed.push(workspacePath);
      cleared[repository.name] = null;
    }

    if (removed.length > 0) {
      await tx.updateSync(sync.id, { worktrees: cleared });
    }
    return removed;
  }
}

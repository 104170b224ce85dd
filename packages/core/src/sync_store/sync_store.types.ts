/**
 * Records kept by the Sync State Store.
 *
 * @module sync_store
 */

export type SyncDirection = 'downstream' | 'upstream';

export type RepositoryRecord = {
  id: number;
  name: string;
};

/**
 * One change request's journey through the system.
 * Unique on (repository, changeRequestId, direction).
 */
export type SyncRecord = {
  id: number;
  /** Name of the repository the change request belongs to */
  repository: string;
  changeRequestId: number;
  direction: SyncDirection;
  /** Tracker issue created together with the sync */
  issueRef: string | null;
  /** Workspace path per repository name, set once materialized */
  worktrees: Record<string, string | null>;
  createdAt: string;
  updatedAt: string;
};

export type SyncKey = {
  repository: string;
  changeRequestId: number;
  direction: SyncDirection;
};

export type NewSync = SyncKey & {
  issueRef?: string | null;
};

export type SyncUpdate = {
  issueRef?: string | null;
  /** Merged into the existing map */
  worktrees?: Record<string, string | null>;
};

/**
 * Operations available inside one transaction. Writes become visible to
 * other transactions only when the enclosing transaction completes.
 */
export interface SyncStoreTransaction {
  getRepository(name: string): Promise<RepositoryRecord | null>;
  getOrCreateRepository(name: string): Promise<RepositoryRecord>;
  getSync(id: number): Promise<SyncRecord | null>;
  findSync(key: SyncKey): Promise<SyncRecord | null>;
  listSyncs(): Promise<SyncRecord[]>;
  /** @throws DuplicateSyncError */
  createSync(input: NewSync): Promise<SyncRecord>;
  /** @throws SyncNotFoundError */
  updateSync(id: number, update: SyncUpdate): Promise<SyncRecord>;
}

/**
 * Transactional store of repositories and syncs.
 *
 * `transaction` runs `work` in isolation from other transactions on the same
 * store. If `work` throws, nothing it wrote is kept and the error is
 * rethrown.
 */
export interface ISyncStore {
  transaction<T>(work: (tx: SyncStoreTransaction) => Promise<T>): Promise<T>;
}

/**
 * Serialized form shared by the document-backed stores
 */
export type SyncStoreDocument = {
  version: 1;
  nextRepositoryId: number;
  nextSyncId: number;
  repositories: RepositoryRecord[];
  syncs: SyncRecord[];
};

import type { SyncKey } from './sync_store.types';

/**
 * Base error class for all state-store errors
 */
export class SyncStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncStoreError';
    Object.setPrototypeOf(this, SyncStoreError.prototype);
  }
}

/**
 * Error thrown when a sync already exists for the same change request and direction
 */
export class DuplicateSyncError extends SyncStoreError {
  public readonly key: SyncKey;

  constructor(key: SyncKey) {
    super(
      `A ${key.direction} sync already exists for ${key.repository} change request ${key.changeRequestId}`
    );
    this.name = 'DuplicateSyncError';
    this.key = key;
    Object.setPrototypeOf(this, DuplicateSyncError.prototype);
  }
}

/**
 * Error thrown when a sync id does not exist
 */
export class SyncNotFoundError extends SyncStoreError {
  public readonly syncId: number;

  constructor(syncId: number) {
    super(`Sync not found: ${syncId}`);
    this.name = 'SyncNotFoundError';
    this.syncId = syncId;
    Object.setPrototypeOf(this, SyncNotFoundError.prototype);
  }
}

/**
 * Error thrown when a sync references a repository that was never registered
 */
export class UnknownRepositoryError extends SyncStoreError {
  public readonly repository: string;

  constructor(repository: string) {
    super(`Unknown repository: ${repository}`);
    this.name = 'UnknownRepositoryError';
    this.repository = repository;
    Object.setPrototypeOf(this, UnknownRepositoryError.prototype);
  }
}

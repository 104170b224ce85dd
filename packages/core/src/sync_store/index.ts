export type {
  ISyncStore,
  NewSync,
  RepositoryRecord,
  SyncDirection,
  SyncKey,
  SyncRecord,
  SyncStoreDocument,
  SyncStoreTransaction,
  SyncUpdate,
} from './sync_store.types';
export * from './sync_store.errors';
export { DocumentSyncStore, emptyDocument } from './document_sync_store';
export type { DocumentSyncStoreOptions } from './document_sync_store';

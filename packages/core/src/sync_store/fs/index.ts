export { FsSyncStore, STATE_FILENAME, isSyncStoreDocument } from './fs_sync_store';
export type { FsSyncStoreOptions } from './fs_sync_store';

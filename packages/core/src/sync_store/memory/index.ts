export { MemorySyncStore } from './memory_sync_store';
export type { MemorySyncStoreOptions } from './memory_sync_store';

export { MemoryTracker } from './memory_tracker';
export type { MemoryIssue } from './memory_tracker';

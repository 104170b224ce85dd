/**
 * In-memory implementations (no filesystem or processes required)
 *
 * This module exports the stand-ins used by tests and dry runs.
 */

// SyncStore
export { MemorySyncStore } from './sync_store/memory';
export type { MemorySyncStoreOptions } from './sync_store/memory';

// GitModule
export { MemoryGitModule, formatMemoryPatch } from './git/memory';

// BuildTool
export { MemoryBuildTool } from './build_tool/memory';

// Tracker
export { MemoryTracker } from './tracker/memory';
export type { MemoryIssue } from './tracker/memory';

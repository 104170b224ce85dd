/**
 * Filesystem- and process-dependent implementations
 *
 * Use @wpt-sync/core/memory for in-memory alternatives.
 */

// SyncStore
export { FsSyncStore, STATE_FILENAME } from './sync_store/fs';
export type { FsSyncStoreOptions } from './sync_store/fs';

// LocalGitModule (CLI-based, uses execCommand for git operations)
export { LocalGitModule } from './git/local';
export { createExecCommand } from './git/exec';
export type { IGitModule, GitModuleDependencies } from './git';

// LocalBuildTool (mach and wpt commands)
export { LocalBuildTool } from './build_tool/local';
export type { LocalBuildToolDependencies } from './build_tool/local';

// Config file loading
export { loadSyncConfig, DEFAULT_CONFIG_FILENAME } from './sync_config';

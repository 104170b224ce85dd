/**
 * Git - version-control capability
 *
 * @module git
 */

export type { IGitModule } from './git_module';

export type {
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  FetchOptions,
  CommitOptions,
  AddWorktreeOptions,
  PushResult,
} from './types';

export {
  GitError,
  GitCommandError,
  GitTimeoutError,
  CommitNotFoundError,
} from './errors';

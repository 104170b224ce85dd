export { WorkspaceManager, workspaceName } from './workspace_manager';
export { WorkspaceError } from './workspace.errors';
export type {
  EnsureWorkspaceResult,
  Workspace,
  WorkspaceManagerDependencies,
  WorkspaceRepository,
} from './workspace.types';

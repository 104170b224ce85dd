export { LocalBuildTool } from './local_build_tool';
export type { LocalBuildToolDependencies } from './local_build_tool';

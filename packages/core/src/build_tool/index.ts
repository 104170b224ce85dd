export type { IBuildTool } from './build_tool';
export { BuildToolError, BuildToolTimeoutError } from './build_tool.errors';

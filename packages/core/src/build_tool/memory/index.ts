export { MemoryBuildTool } from './memory_build_tool';

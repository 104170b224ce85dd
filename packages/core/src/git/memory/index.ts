export { MemoryGitModule, formatMemoryPatch } from './memory_git_module';

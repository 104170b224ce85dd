import type { IBuildTool } from '../build_tool';
import { BuildToolError } from '../build_tool.errors';

type Operation = 'regenerateMetadata' | 'filesChanged' | 'classifyPaths' | 'testsAffected';

/**
 * MemoryBuildTool - scripted IBuildTool for tests
 *
 * Outputs are set up front; every call is recorded with its arguments.
 */
export class MemoryBuildTool implements IBuildTool {
  private changedFiles: string[] = [];
  private classificationReport = '';
  private affectedTests = '';
  private regenerateHook: ((targetRoot: string) => void) | null = null;
  private readonly failures = new Map<Operation, Error>();
  private readonly calls: string[] = [];

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  setFilesChanged(paths: string[]): void {
    this.changedFiles = [...paths];
  }

  setClassificationReport(report: string): void {
    this.classificationReport = report;
  }

  setTestsAffected(output: string): void {
    this.affectedTests = output;
  }

  /** Runs `hook` whenever metadata is regenerated, e.g. to dirty the tree */
  onRegenerate(hook: (targetRoot: string) => void): void {
    this.regenerateHook = hook;
  }

  failOn(operation: Operation, error: Error = new BuildToolError(`${operation} failed`, operation)): void {
    this.failures.set(operation, error);
  }

  getCalls(): string[] {
    return [...this.calls];
  }

  private record(operation: Operation, call: string): void {
    this.calls.push(call);
    const failure = this.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }

  // ─────────────────────────────────────────────────────────
  // IBuildTool
  // ─────────────────────────────────────────────────────────

  async regenerateMetadata(targetRoot: string): Promise<void> {
    this.record('regenerateMetadata', `regenerateMetadata ${targetRoot}`);
    this.regenerateHook?.(targetRoot);
  }

  async filesChanged(upstreamRoot: string): Promise<string[]> {
    this.record('filesChanged', `filesChanged ${upstreamRoot}`);
    return [...this.changedFiles];
  }

  async classifyPaths(targetRoot: string, paths: string[]): Promise<string> {
    this.record('classifyPaths', `classifyPaths ${targetRoot} ${paths.join(' ')}`);
    return this.classificationReport;
  }

  async testsAffected(upstreamRoot: string, revish?: string): Promise<string> {
    this.record('testsAffected', `testsAffected ${upstreamRoot}${revish ? ` ${revish}` : ''}`);
    return this.affectedTests;
  }
}

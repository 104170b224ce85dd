import type { IBuildTool } from '../build_tool';
import { BuildToolError, BuildToolTimeoutError } from '../build_tool.errors';
import type { ExecCommand, ExecResult } from '../../git/types';
import type { Logger } from '../../logger';

export type LocalBuildToolDependencies = {
  execCommand: ExecCommand;
  logger: Logger;
  /** Timeout applied to every command */
  timeoutMs?: number;
};

/**
 * LocalBuildTool - IBuildTool backed by the target tree's `mach` and the
 * upstream project's `wpt` front ends.
 */
export class LocalBuildTool implements IBuildTool {
  private readonly execCommand: ExecCommand;
  private readonly logger: Logger;
  private readonly timeoutMs: number | undefined;

  constructor(deps: LocalBuildToolDependencies) {
    this.execCommand = deps.execCommand;
    this.logger = deps.logger;
    this.timeoutMs = deps.timeoutMs;
  }

  private async run(cwd: string, tool: string, args: string[]): Promise<string> {
    const command = [tool, ...args].join(' ');
    this.logger.debug(`Running ${command} in ${cwd}`);

    const result: ExecResult = await this.execCommand(tool, args, {
      cwd,
      ...(this.timeoutMs !== undefined && { timeout: this.timeoutMs }),
    });

    if (result.timedOut && this.timeoutMs !== undefined) {
      throw new BuildToolTimeoutError(command, this.timeoutMs);
    }
    if (result.exitCode !== 0) {
      throw new BuildToolError(
        `${command} exited with code ${result.exitCode}`,
        command,
        result.stderr,
        result.exitCode,
      );
    }
    return result.stdout;
  }

  async regenerateMetadata(targetRoot: string): Promise<void> {
    await this.run(targetRoot, './mach', ['wpt-manifest-update']);
  }

  async filesChanged(upstreamRoot: string): Promise<string[]> {
    const output = await this.run(upstreamRoot, './wpt', ['files-changed']);
    return [...new Set(output.split('\n').map((line) => line.trim()).filter(Boolean))];
  }

  async classifyPaths(targetRoot: string, paths: string[]): Promise<string> {
    return this.run(targetRoot, './mach', ['file-info', 'bugzilla-component', ...paths]);
  }

  async testsAffected(upstreamRoot: string, revish?: string): Promise<string> {
    await this.run(upstreamRoot, './wpt', ['manifest']);
    const args = ['tests-affected', '--show-type', '--new'];
    if (revish) {
      args.push(revish);
    }
    return this.run(upstreamRoot, './wpt', args);
  }
}

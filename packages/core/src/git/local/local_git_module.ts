/**
 * LocalGitModule - git CLI implementation of IGitModule
 *
 * Runs `git` through an injected execCommand so tests can substitute the
 * process layer. Non-zero exits become GitCommandError; timed-out commands
 * become GitTimeoutError.
 *
 * @module git/local
 */

import * as path from 'path';
import type { IGitModule } from '../git_module';
import type {
  AddWorktreeOptions,
  CommitOptions,
  ExecCommand,
  ExecOptions,
  ExecResult,
  FetchOptions,
  GitModuleDependencies,
  PushResult,
} from '../types';
import { GitCommandError, GitTimeoutError, CommitNotFoundError } from '../errors';

export class LocalGitModule implements IGitModule {
  private readonly repoRoot: string;
  private readonly execCommand: ExecCommand;
  private readonly timeoutMs: number | undefined;

  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }
    if (!dependencies.repoRoot) {
      throw new Error('repoRoot is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = path.resolve(dependencies.repoRoot);
    this.timeoutMs = dependencies.timeoutMs;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Executes a git command in this working copy.
   * Only timeouts are raised here; exit codes are left to the caller.
   */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const result = await this.execCommand('git', args, {
      ...options,
      cwd: this.repoRoot,
      ...(this.timeoutMs !== undefined ? { timeout: this.timeoutMs } : {}),
    });

    if (result.timedOut) {
      throw new GitTimeoutError(args[0] ?? '', this.timeoutMs ?? 0);
    }
    return result;
  }

  /** Executes a git command and throws GitCommandError on non-zero exit */
  private async execGitChecked(args: string[], failure: string, options?: ExecOptions): Promise<ExecResult> {
    const result = await this.execGit(args, options);
    if (result.exitCode !== 0) {
      throw new GitCommandError(failure, result.stderr, `git ${args.join(' ')}`, result.stdout);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WORKING COPY
  // ═══════════════════════════════════════════════════════════════════════

  getRepoRoot(): string {
    return this.repoRoot;
  }

  at(worktreePath: string): IGitModule {
    return new LocalGitModule({
      repoRoot: worktreePath,
      execCommand: this.execCommand,
      ...(this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}),
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Fetches from a remote
   *
   * @example
   * await git.fetch('origin', 'pull/9/head:heads/pull_9', { tags: false });
   */
  async fetch(remote: string, refspec?: string, options?: FetchOptions): Promise<void> {
    const args = ['fetch'];
    if (options?.tags === false) {
      args.push('--no-tags');
    } else if (options?.tags === true) {
      args.push('--tags');
    }
    args.push(remote);
    if (refspec) {
      args.push(refspec);
    }

    await this.execGitChecked(args, `Failed to fetch ${refspec ?? 'all refs'} from ${remote}`);
  }

  /**
   * Pushes to a remote and returns the captured output, which some remotes
   * use to report where the push landed.
   */
  async push(remote: string, refspec?: string): Promise<PushResult> {
    const args = ['push', remote];
    if (refspec) {
      args.push(refspec);
    }
    const result = await this.execGitChecked(args, `Failed to push to ${remote}`);
    return { stdout: result.stdout, stderr: result.stderr };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // HISTORY
  // ═══════════════════════════════════════════════════════════════════════

  async merge(ref: string): Promise<void> {
    await this.execGitChecked(['merge', '--no-edit', ref], `Failed to merge ${ref}`);
  }

  async resetHard(ref: string): Promise<void> {
    await this.execGitChecked(['reset', '--hard', ref], `Failed to reset --hard to ${ref}`);
  }

  async resetMixed(ref: string): Promise<void> {
    await this.execGitChecked(['reset', ref], `Failed to reset to ${ref}`);
  }

  async checkout(branch: string): Promise<void> {
    await this.execGitChecked(['checkout', branch], `Failed to checkout branch ${branch}`);
  }

  async add(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.execGitChecked(['add', '--', ...paths], 'Failed to add files');
  }

  async commit(message: string, options?: CommitOptions): Promise<void> {
    const args = ['commit'];
    if (options?.allowEmpty) {
      args.push('--allow-empty');
    }
    args.push('-F', '-');
    await this.execGitChecked(args, 'Failed to create commit', { input: message });
  }

  async isDirty(): Promise<boolean> {
    const result = await this.execGitChecked(['status', '--porcelain'], 'Failed to read status');
    return result.stdout.trim().length > 0;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INSPECTION
  // ═══════════════════════════════════════════════════════════════════════

  async currentTip(): Promise<string> {
    const result = await this.execGitChecked(['rev-parse', 'HEAD'], 'Failed to resolve HEAD');
    return result.stdout.trim();
  }

  async getCurrentBranch(): Promise<string> {
    const result = await this.execGitChecked(
      ['rev-parse', '--abbrev-ref', 'HEAD'],
      'Failed to get current branch',
    );
    return result.stdout.trim();
  }

  async branchTip(branch: string): Promise<string | null> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`]);
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.trim() || null;
  }

  async commitsBetween(baseRef: string, headRef: string = 'HEAD'): Promise<string[]> {
    const result = await this.execGitChecked(
      ['rev-list', '--reverse', `${baseRef}..${headRef}`],
      `Failed to list commits in ${baseRef}..${headRef}`,
    );
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PATCHES
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Renders a commit in mailbox format, terminated by a newline so that a
   * commit without content ends in a blank line.
   */
  async renderPatch(commit: string): Promise<string> {
    const result = await this.execGit(['show', '--pretty=email', commit]);
    if (result.exitCode !== 0) {
      if (/unknown revision|bad object|bad revision/.test(result.stderr)) {
        throw new CommitNotFoundError(commit);
      }
      throw new GitCommandError(`Failed to create patch from ${commit}`, result.stderr, `git show ${commit}`);
    }
    return `${result.stdout}\n`;
  }

  async applyPatch(patch: string, directoryPrefix: string): Promise<ExecResult> {
    const result = await this.execGit(['am', `--directory=${directoryPrefix}`, '-'], { input: patch });
    if (result.exitCode !== 0) {
      // git am keeps its session open on failure
      await this.execGit(['am', '--abort']);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WORKTREES
  // ═══════════════════════════════════════════════════════════════════════

  async addWorktree(worktreePath: string, branch: string, options?: AddWorktreeOptions): Promise<void> {
    const args = options?.startRef
      ? ['worktree', 'add', '-b', branch, worktreePath, options.startRef]
      : ['worktree', 'add', worktreePath, branch];
    await this.execGitChecked(args, `Failed to create worktree at ${worktreePath}`);
  }

  async removeWorktree(worktreePath: string): Promise<void> {
    const result = await this.execGit(['worktree', 'remove', '--force', worktreePath]);
    if (result.exitCode !== 0) {
      await this.execGitChecked(['worktree', 'prune'], `Failed to remove worktree at ${worktreePath}`);
    }
  }

  async listWorktrees(): Promise<string[]> {
    const result = await this.execGitChecked(['worktree', 'list', '--porcelain'], 'Failed to list worktrees');
    return result.stdout
      .split('\n')
      .filter((line) => line.startsWith('worktree '))
      .map((line) => path.resolve(line.slice('worktree '.length).trim()));
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.execGitChecked(['branch', '-D', branch], `Failed to delete branch ${branch}`);
  }
}

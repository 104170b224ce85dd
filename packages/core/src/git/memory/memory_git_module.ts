/**
 * MemoryGitModule - In-memory IGitModule for tests
 *
 * All state is kept in memory with no filesystem or process access. Modules
 * returned by `at()` share the repository state (refs, commits, worktrees)
 * and each keep their own checked-out branch, like git worktrees do.
 *
 * Test Helpers:
 * - addCommit(ref, hash, message, diff): append a commit to a ref
 * - setRemoteRef(remote, name, hashes): state a remote will serve on fetch
 * - failOn(operation, error): make an operation throw
 * - rejectPatch(hash, stderr): make applying that commit's patch fail
 * - setDirty(dirty): mark the working copy as modified
 * - getCalls(): operations performed, in order
 *
 * @module git/memory
 */

import type { IGitModule } from '../git_module';
import type {
  AddWorktreeOptions,
  CommitOptions,
  ExecResult,
  FetchOptions,
  PushResult,
} from '../types';
import { CommitNotFoundError, GitCommandError } from '../errors';

interface MemoryCommit {
  hash: string;
  message: string;
  patch: string;
}

interface MemoryRepoState {
  commits: Map<string, MemoryCommit>;
  /** Every ref (local branch, remote-tracking ref) to its history, oldest first */
  refs: Map<string, string[]>;
  remotes: Map<string, Map<string, string[]>>;
  /** Worktree path to the branch checked out there */
  worktrees: Map<string, string>;
  /** Working copies with uncommitted changes */
  dirty: Set<string>;
  failures: Map<string, Error>;
  rejectedPatches: Map<string, string>;
  pushOutput: PushResult;
  calls: string[];
  counter: number;
}

/**
 * Builds the mailbox-format patch MemoryGitModule renders for a commit.
 * An empty diff yields a patch that ends in a blank line, like `git show`.
 */
export function formatMemoryPatch(hash: string, message: string, diff: string): string {
  const body = diff ? `---\n${diff}\n` : '';
  return `From ${hash} Mon Sep 17 00:00:00 2001\nSubject: [PATCH] ${message}\n\n${body}\n`;
}

export class MemoryGitModule implements IGitModule {
  private readonly root: string;
  private readonly state: MemoryRepoState;
  private branch: string;

  constructor(repoRoot: string = '/test/repo', state?: MemoryRepoState, branch: string = 'main') {
    this.root = repoRoot;
    this.branch = branch;
    this.state = state ?? {
      commits: new Map(),
      refs: new Map([['main', []]]),
      remotes: new Map(),
      worktrees: new Map(),
      dirty: new Set(),
      failures: new Map(),
      rejectedPatches: new Map(),
      pushOutput: { stdout: '', stderr: '' },
      calls: [],
      counter: 0,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  addCommit(ref: string, hash: string, message: string, diff: string = ''): void {
    this.state.commits.set(hash, { hash, message, patch: formatMemoryPatch(hash, message, diff) });
    const history = this.state.refs.get(ref) ?? [];
    this.state.refs.set(ref, [...history, hash]);
  }

  setRef(ref: string, hashes: string[]): void {
    this.state.refs.set(ref, [...hashes]);
  }

  setRemoteRef(remote: string, name: string, hashes: string[]): void {
    const refs = this.state.remotes.get(remote) ?? new Map<string, string[]>();
    refs.set(name, [...hashes]);
    this.state.remotes.set(remote, refs);
  }

  /** Operation names: fetch, push, merge, resetHard, commit, renderPatch, addWorktree, ... */
  failOn(operation: string, error: Error = new GitCommandError(`${operation} failed`)): void {
    this.state.failures.set(operation, error);
  }

  clearFailure(operation: string): void {
    this.state.failures.delete(operation);
  }

  rejectPatch(hash: string, stderr: string): void {
    this.state.rejectedPatches.set(hash, stderr);
  }

  setDirty(dirty: boolean): void {
    if (dirty) {
      this.state.dirty.add(this.root);
    } else {
      this.state.dirty.delete(this.root);
    }
  }

  setPushOutput(output: PushResult): void {
    this.state.pushOutput = output;
  }

  getCalls(): string[] {
    return [...this.state.calls];
  }

  getHistory(ref: string = this.branch): string[] {
    return [...(this.state.refs.get(ref) ?? [])];
  }

  getCommitMessage(hash: string): string | undefined {
    return this.state.commits.get(hash)?.message;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private record(call: string, operation: string): void {
    this.state.calls.push(`${this.root}: ${call}`);
    const failure = this.state.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }

  private resolve(ref: string): string[] {
    if (ref === 'HEAD') {
      return this.getHistory();
    }
    if (ref === 'HEAD~' || ref === 'HEAD~1') {
      return this.getHistory().slice(0, -1);
    }
    const history = this.state.refs.get(ref);
    if (history) {
      return [...history];
    }
    const index = this.getHistory().indexOf(ref);
    if (index !== -1) {
      return this.getHistory().slice(0, index + 1);
    }
    throw new GitCommandError(`unknown revision ${ref}`, `fatal: ambiguous argument '${ref}'`);
  }

  private newCommit(message: string): string {
    this.state.counter += 1;
    const hash = `m${String(this.state.counter).padStart(39, '0')}`;
    this.state.commits.set(hash, { hash, message, patch: formatMemoryPatch(hash, message, '') });
    this.state.refs.set(this.branch, [...this.getHistory(), hash]);
    return hash;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  getRepoRoot(): string {
    return this.root;
  }

  at(path: string): IGitModule {
    return this.open(path);
  }

  /** Same as `at`, typed for tests that need the helpers */
  open(path: string): MemoryGitModule {
    return new MemoryGitModule(path, this.state, this.state.worktrees.get(path) ?? this.branch);
  }

  async fetch(remote: string, refspec?: string, options?: FetchOptions): Promise<void> {
    const tags = options?.tags === false ? ' --no-tags' : '';
    this.record(`fetch${tags} ${remote}${refspec ? ` ${refspec}` : ''}`, 'fetch');

    const served = this.state.remotes.get(remote) ?? new Map<string, string[]>();
    if (!refspec) {
      for (const [name, history] of served) {
        this.state.refs.set(`${remote}/${name}`, [...history]);
      }
      return;
    }

    const [source = refspec, destination] = refspec.split(':');
    const history = served.get(source);
    if (!history) {
      throw new GitCommandError(`Failed to fetch ${refspec} from ${remote}`, `fatal: couldn't find remote ref ${source}`);
    }
    this.state.refs.set(destination ?? `${remote}/${source}`, [...history]);
  }

  async push(remote: string, refspec?: string): Promise<PushResult> {
    this.record(`push ${remote}${refspec ? ` ${refspec}` : ''}`, 'push');
    return { ...this.state.pushOutput };
  }

  async merge(ref: string): Promise<void> {
    this.record(`merge ${ref}`, 'merge');
    const head = this.getHistory();
    const incoming = this.resolve(ref).filter((hash) => !head.includes(hash));
    this.state.refs.set(this.branch, [...head, ...incoming]);
  }

  async resetHard(ref: string): Promise<void> {
    this.record(`reset --hard ${ref}`, 'resetHard');
    this.state.refs.set(this.branch, this.resolve(ref));
    this.setDirty(false);
  }

  async resetMixed(ref: string): Promise<void> {
    this.record(`reset ${ref}`, 'resetMixed');
    this.state.refs.set(this.branch, this.resolve(ref));
  }

  async checkout(branch: string): Promise<void> {
    this.record(`checkout ${branch}`, 'checkout');
    if (!this.state.refs.has(branch)) {
      throw new GitCommandError(`Failed to checkout branch ${branch}`, `error: pathspec '${branch}' did not match`);
    }
    this.branch = branch;
  }

  async add(paths: string[]): Promise<void> {
    this.record(`add ${paths.join(' ')}`, 'add');
  }

  async commit(message: string, options?: CommitOptions): Promise<void> {
    this.record(`commit${options?.allowEmpty ? ' --allow-empty' : ''} ${message}`, 'commit');
    if (!this.state.dirty.has(this.root) && !options?.allowEmpty) {
      throw new GitCommandError('Failed to create commit', 'nothing to commit, working tree clean');
    }
    this.newCommit(message);
    this.setDirty(false);
  }

  async isDirty(): Promise<boolean> {
    return this.state.dirty.has(this.root);
  }

  async currentTip(): Promise<string> {
    const history = this.getHistory();
    const tip = history[history.length - 1];
    if (!tip) {
      throw new GitCommandError('Failed to resolve HEAD', `fatal: ambiguous argument 'HEAD'`);
    }
    return tip;
  }

  async getCurrentBranch(): Promise<string> {
    return this.branch;
  }

  async branchTip(branch: string): Promise<string | null> {
    const history = this.state.refs.get(branch);
    if (!history || history.length === 0) {
      return null;
    }
    return history[history.length - 1] ?? null;
  }

  async commitsBetween(baseRef: string, headRef: string = 'HEAD'): Promise<string[]> {
    this.record(`rev-list --reverse ${baseRef}..${headRef}`, 'commitsBetween');
    const base = new Set(this.resolve(baseRef));
    return this.resolve(headRef).filter((hash) => !base.has(hash));
  }

  async renderPatch(commit: string): Promise<string> {
    this.record(`show --pretty=email ${commit}`, `renderPatch:${commit}`);
    const found = this.state.commits.get(commit);
    if (!found) {
      throw new CommitNotFoundError(commit);
    }
    return found.patch;
  }

  async applyPatch(patch: string, directoryPrefix: string): Promise<ExecResult> {
    const source = /^From (\S+)/.exec(patch)?.[1] ?? 'unknown';
    this.record(`am --directory=${directoryPrefix} ${source}`, 'applyPatch');

    const rejection = this.state.rejectedPatches.get(source);
    if (rejection !== undefined) {
      return { exitCode: 128, stdout: '', stderr: rejection };
    }

    const subject = /^Subject: \[PATCH\] (.*)$/m.exec(patch)?.[1] ?? source;
    this.newCommit(subject);
    return { exitCode: 0, stdout: `Applying: ${subject}\n`, stderr: '' };
  }

  async addWorktree(path: string, branch: string, options?: AddWorktreeOptions): Promise<void> {
    this.record(`worktree add ${options?.startRef ? `-b ${branch} ${path} ${options.startRef}` : `${path} ${branch}`}`, 'addWorktree');
    if (this.state.worktrees.has(path)) {
      throw new GitCommandError(`Failed to create worktree at ${path}`, `fatal: '${path}' already exists`);
    }
    if (options?.startRef) {
      if (this.state.refs.has(branch)) {
        throw new GitCommandError(`Failed to create worktree at ${path}`, `fatal: a branch named '${branch}' already exists`);
      }
      this.state.refs.set(branch, this.resolve(options.startRef));
    } else if (!this.state.refs.has(branch)) {
      throw new GitCommandError(`Failed to create worktree at ${path}`, `fatal: invalid reference: ${branch}`);
    }
    this.state.worktrees.set(path, branch);
  }

  async removeWorktree(path: string): Promise<void> {
    this.record(`worktree remove --force ${path}`, 'removeWorktree');
    this.state.worktrees.delete(path);
  }

  async listWorktrees(): Promise<string[]> {
    return [this.root, ...this.state.worktrees.keys()];
  }

  async deleteBranch(branch: string): Promise<void> {
    this.record(`branch -D ${branch}`, 'deleteBranch');
    this.state.refs.delete(branch);
  }
}

import type { IGitModule } from '../git';
import { GitCommandError, GitTimeoutError } from '../git';
import type { Logger } from '../logger';
import type {
  CommitTranslatorDependencies,
  TranslationFailureKind,
  TranslationResult,
} from './translator.types';

/** A rendered patch with no file diff (only headers and message) */
export function isEmptyPatch(patch: string): boolean {
  return !/^diff --git /m.test(patch);
}

function describeError(error: unknown): string {
  if (error instanceof GitCommandError) {
    return error.diagnostic;
  }
  return error instanceof Error ? error.message : String(error);
}

function failureKind(error: unknown, otherwise: TranslationFailureKind): TranslationFailureKind {
  return error instanceof GitTimeoutError ? 'TimeoutFailure' : otherwise;
}

/**
 * CommitTranslator - ports upstream commits onto the target tree one patch
 * at a time, oldest first, stopping at the first commit that fails.
 */
export class CommitTranslator {
  private readonly upstreamPath: string;
  private readonly logger: Logger;

  constructor(deps: CommitTranslatorDependencies) {
    this.upstreamPath = deps.upstreamPath;
    this.logger = deps.logger;
  }

  /**
   * Applies every commit in `upstreamBaseline..HEAD` of `upstream` to
   * `target`. Never throws; failures are described by the result.
   */
  async translate(
    upstream: IGitModule,
    upstreamBaseline: string,
    target: IGitModule,
  ): Promise<TranslationResult> {
    const applied: string[] = [];
    const skipped: string[] = [];

    let commits: string[];
    try {
      commits = await upstream.commitsBetween(upstreamBaseline);
    } catch (error) {
      return {
        success: false,
        kind: failureKind(error, 'PatchRenderFailure'),
        commit: null,
        diagnostic: describeError(error),
        applied,
        skipped,
      };
    }
    this.logger.info(`Porting ${commits.length} commit(s) since ${upstreamBaseline}`);

    for (const commit of commits) {
      let patch: string;
      try {
        patch = await upstream.renderPatch(commit);
      } catch (error) {
        this.logger.error(`Failed to create patch from ${commit}:`, describeError(error));
        return {
          success: false,
          kind: failureKind(error, 'PatchRenderFailure'),
          commit,
          diagnostic: describeError(error),
          applied,
          skipped,
        };
      }

      if (isEmptyPatch(patch)) {
        this.logger.debug(`Skipping empty patch from ${commit}`);
        skipped.push(commit);
        continue;
      }

      let diagnostic: string | null = null;
      let kind: TranslationFailureKind = 'PatchApplyFailure';
      try {
        const result = await target.applyPatch(patch, this.upstreamPath);
        if (result.exitCode !== 0) {
          diagnostic = new GitCommandError(
            `git am --directory=${this.upstreamPath} - exited with code ${result.exitCode}`,
            result.stderr,
            undefined,
            result.stdout,
          ).diagnostic;
        }
      } catch (error) {
        kind = failureKind(error, 'PatchApplyFailure');
        diagnostic = describeError(error);
      }

      if (diagnostic !== null) {
        this.logger.error(`Failed to apply patch from ${commit}:`, diagnostic);
        return { success: false, kind, commit, diagnostic, applied, skipped };
      }
      applied.push(commit);
    }

    return { success: true, applied, skipped };
  }
}

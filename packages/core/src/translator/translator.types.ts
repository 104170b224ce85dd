import type { Logger } from '../logger';

export type TranslationFailureKind = 'PatchRenderFailure' | 'PatchApplyFailure' | 'TimeoutFailure';

/**
 * Outcome of porting a run of upstream commits onto the target tree.
 * Commits applied before a failure stay applied.
 */
export type TranslationResult =
  | {
      success: true;
      /** Upstream commits ported, oldest first */
      applied: string[];
      /** Upstream commits whose patch carried no change */
      skipped: string[];
    }
  | {
      success: false;
      kind: TranslationFailureKind;
      /** Upstream commit that failed; null when the commits could not be listed */
      commit: string | null;
      /** What failed, including the tool's output */
      diagnostic: string;
      applied: string[];
      skipped: string[];
    };

export type CommitTranslatorDependencies = {
  /** Subdirectory of the target tree patches are applied under */
  upstreamPath: string;
  logger: Logger;
};

/**
 * IBuildTool - the target tree's build tooling as used by the sync engine
 *
 * Every operation takes the working copy it runs in: the target workspace
 * for metadata and classification, the upstream workspace for change and
 * affected-test queries.
 *
 * @module build_tool
 */
export interface IBuildTool {
  /** Regenerates the test manifest and metadata in the target tree */
  regenerateMetadata(targetRoot: string): Promise<void>;

  /** Paths (relative to the upstream root) touched by the checked-out change */
  filesChanged(upstreamRoot: string): Promise<string[]>;

  /**
   * Line-oriented classification report for `paths`: a header line per
   * classification followed by one indented line per path attributed to it
   */
  classifyPaths(targetRoot: string, paths: string[]): Promise<string>;

  /** Tab-separated `path\ttype` lines for tests affected since `revish` */
  testsAffected(upstreamRoot: string, revish?: string): Promise<string>;
}
